import { Collection } from '../records/collection';
import { isRecord, recordTypeOf } from '../records/record-type';
import {
  isNaNValue,
  isNegativeZeroValue,
  isPlainObject
} from '../utils/type-guards';
import { ABSENT } from './types';
import { Tag, richTypeTag, unbox } from './utils';

/**
 * Canonical keys for multiset matching
 * ------------------------------------
 * Collection reconciliation indexes normalized values and identities in
 * `Map`s. JavaScript maps compare objects by reference, so two equal tuples
 * (or two equal `Date`s) would never meet. Every value is therefore encoded
 * into a JSON-serializable tree of type-tagged nodes and stringified once.
 *
 * Tagging keeps `1`, `'1'` and `1n` apart. JSON cannot represent non-finite
 * numbers (`JSON.stringify([NaN]) === "[null]"`), so those become string
 * tokens. Unordered containers (plain objects, `Map`, `Set`, set
 * collections) sort their encoded members so insertion order does not leak
 * into the key.
 */
type Encoded = string | number | boolean | null | Encoded[];

/**
 * Numeric canonicalization: `-0` folds into `0`; non-finite numbers become
 * stable string tokens.
 */
function encodeNumber(value: number): Encoded {
  if (isNaNValue(value)) return ['n', 'NaN'];
  if (value === Infinity) return ['n', 'Infinity'];
  if (value === -Infinity) return ['n', '-Infinity'];
  if (isNegativeZeroValue(value)) return ['n', 0];
  return ['n', value];
}

const referenceIds = new WeakMap<WeakKey, number>();
let nextReferenceId = 0;

/**
 * Values without structure (functions, class instances, unregistered
 * symbols) are keyed by reference: equal only to themselves. Ids are held
 * weakly, so keying a value never keeps it alive.
 */
function referenceId(value: WeakKey): number {
  let id = referenceIds.get(value);
  if (id === undefined) {
    id = nextReferenceId++;
    referenceIds.set(value, id);
  }
  return id;
}

/** Registered symbols cannot be held weakly; their registry key names them. */
function encodeSymbol(value: symbol): Encoded {
  const registered = Symbol.keyFor(value);
  return registered === undefined
    ? ['sym', referenceId(value)]
    : ['sym', 'for', registered];
}

function sortEncoded(members: Encoded[]): Encoded[] {
  return members
    .map(member => [JSON.stringify(member), member] as const)
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([, member]) => member);
}

function encodeRich(value: object, tag: string): Encoded {
  switch (tag) {
    case Tag.Number: {
      const unboxed = unbox(value);
      return typeof unboxed === 'number' ? encodeNumber(unboxed) : null;
    }
    case Tag.Date: {
      const time = unbox(value);
      return ['date', typeof time === 'number' ? encodeNumber(time) : null];
    }
    case Tag.RegExp:
      return ['re', value.toString()];
    default:
      // Boxed String, Boolean and BigInt compare like their primitives.
      return encode(unbox(value), []);
  }
}

function encode(value: unknown, ancestors: readonly object[]): Encoded {
  if (value === ABSENT) return ['absent'];

  switch (typeof value) {
    case 'string':
      return ['s', value];
    case 'number':
      return encodeNumber(value);
    case 'bigint':
      return ['b', value.toString()];
    case 'boolean':
      return ['t', value];
    case 'undefined':
      return ['u'];
    case 'symbol':
      return encodeSymbol(value);
    case 'function':
      return ['ref', referenceId(value)];
  }

  if (value === null || typeof value !== 'object') return ['null'];

  // Back-edge in a cyclic structure: encode by depth instead of recursing.
  const depth = ancestors.indexOf(value);
  if (depth !== -1) return ['cycle', depth];

  const tag = richTypeTag(value);
  if (tag) return encodeRich(value, tag);

  const path = [...ancestors, value];

  if (Array.isArray(value)) {
    return ['arr', ...value.map(item => encode(item, path))];
  }

  if (isRecord(value)) {
    const type = recordTypeOf(value);
    const fields = [...type.fields.keys()]
      .sort()
      .filter(field => value[field] !== undefined)
      .map((field): Encoded => [field, encode(value[field], path)]);
    return ['rec', type.name, ...fields];
  }

  if (value instanceof Collection) {
    const members = [...value.entries()].map(
      ([key, item]): Encoded => [key, encode(item, path)]
    );
    return [
      'coll',
      value.kind,
      ...(value.kind === 'set' ? sortEncoded(members) : members)
    ];
  }

  if (value instanceof Set) {
    return ['set', ...sortEncoded([...value].map(item => encode(item, path)))];
  }

  if (value instanceof Map) {
    const entries = [...value].map(
      ([key, item]): Encoded => [encode(key, path), encode(item, path)]
    );
    return ['map', ...sortEncoded(entries)];
  }

  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key): Encoded => [key, encode(value[key], path)]);
    return ['obj', ...entries];
  }

  return ['ref', referenceId(value)];
}

/**
 * Produces the canonical string key used for multiset and equality lookups.
 * Two values share a key exactly when they are structurally equal.
 *
 * @param value - A normalized value or identity.
 * @returns A stable string key.
 */
export function canonicalKey(value: unknown): string {
  return JSON.stringify(encode(value, []));
}

/**
 * Default value equality: structural, with `NaN` equal to itself, `Date`s by
 * timestamp and boxed primitives by their primitive value.
 */
export function valuesEqual(left: unknown, right: unknown): boolean {
  return Object.is(left, right) || canonicalKey(left) === canonicalKey(right);
}
