import { Collection } from '../records/collection';
import {
  isRecord,
  readOwnProperty,
  recordTypeOf
} from '../records/record-type';
import {
  isObjectLike,
  isPlainObject,
  isUndefined
} from '../utils/type-guards';
import { ABSENT, type Absent } from './types';

/**
 * Internal tag strings for built-in types that are compared as atomic values
 * rather than walked as containers.
 *
 * Uses the tags returned by `Object.prototype.toString` (e.g. "[object Date]")
 * instead of `constructor.name`, which minifiers rename and callers can spoof.
 */
export const Tag = {
  String: '[object String]',
  Number: '[object Number]',
  Boolean: '[object Boolean]',
  BigInt: '[object BigInt]',
  Date: '[object Date]',
  RegExp: '[object RegExp]'
} as const;

export type RichTag = (typeof Tag)[keyof typeof Tag];

const RICH_TYPES = new Set<string>([
  // Boxed Primitives
  Tag.String,
  Tag.Number,
  Tag.Boolean,
  Tag.BigInt,
  // Complex Types
  Tag.Date,
  Tag.RegExp
]);

function isRichTag(tag: string): tag is RichTag {
  return RICH_TYPES.has(tag);
}

/**
 * Returns the rich-type tag of an object (Date, RegExp, boxed primitives),
 * or `undefined` for anything else.
 */
export function richTypeTag(value: object): RichTag | undefined {
  const tag = Object.prototype.toString.call(value);
  return isRichTag(tag) ? tag : undefined;
}

/**
 * Extracts the underlying primitive value from a wrapper object.
 *
 * Precondition:
 * The input must be a wrapper (`Number`, `String`, `Boolean`, `BigInt`) or a
 * `Date`, all of which implement `.valueOf()`.
 */
export function unbox(wrapper: object): unknown {
  return wrapper.valueOf();
}

/**
 * Reads a field for comparison.
 *
 * Records and plain objects are read through own properties only. Any other
 * object (a foreign class instance under duck typing) is read by name, so
 * getters and prototype properties count.
 *
 * Returns {@link ABSENT} when:
 * - the source is not an object,
 * - the property cannot be found,
 * - the stored value is `undefined`.
 */
export function readField(source: unknown, field: string): unknown | Absent {
  if (!isObjectLike(source)) return ABSENT;

  const value =
    isRecord(source) || isPlainObject(source)
      ? readOwnProperty(source, field)
      : field in source
        ? Reflect.get(source, field)
        : undefined;
  return isUndefined(value) ? ABSENT : value;
}

/**
 * Display name of a compared value's type, used in diff summaries and error
 * messages: the record type name, the collection name, or the built-in tag
 * (`Array`, `Object`, `Map`, ...) for anything else.
 */
export function typeNameOf(value: unknown): string {
  if (isRecord(value)) return recordTypeOf(value).name;
  if (value instanceof Collection) return value.name;
  return Object.prototype.toString.call(value).slice('[object '.length, -1);
}
