import { DiffConfigurationError } from '../errors';
import { createDifferLogger } from '../logger';
import { Collection } from '../records/collection';
import { collectionEntries } from '../records/iteration';
import {
  isRecord,
  recordTypeOf,
  type RecordType
} from '../records/record-type';
import type { FieldSelector } from '../selectors/field-selector';
import { isObjectLike } from '../utils/type-guards';
import {
  ChangeKind,
  createAdded,
  createRemoved,
  createUnchanged,
  type ChangeEntry
} from './change-entry';
import { compareRecords } from './compare-records';
import { extractIdentity } from './identity';
import { OccurrenceMultiset } from './multiset';
import { normalizeItem, normalizeSlot } from './normalize';
import { memberFilter } from './options';
import {
  ABSENT,
  type DiffOptions,
  type Identity,
  type IdentityContext
} from './types';

const log = createDifferLogger('keyed-comparer');

/**
 * Arity of an identity: scalar, or a tuple of a given length.
 */
type IdentityArity = { composite: false } | { composite: true; length: number };

function arityOf(identity: Identity): IdentityArity {
  return Array.isArray(identity)
    ? { composite: true, length: identity.length }
    : { composite: false };
}

function sameArity(left: IdentityArity, right: IdentityArity): boolean {
  if (left.composite && right.composite) return left.length === right.length;
  return left.composite === right.composite;
}

function describeArity(arity: IdentityArity): string {
  return arity.composite ? `a ${arity.length}-tuple` : 'a scalar';
}

/**
 * Tracks the arity fixed by the first identity seen on either side.
 */
class ArityGuard {
  private expected: IdentityArity | undefined;

  constructor(private readonly path: FieldSelector) {}

  /**
   * @throws {DiffConfigurationError} When `identity` has another arity than
   * the first identity seen.
   */
  check(identity: Identity, side: 'base' | 'other'): void {
    const current = arityOf(identity);
    if (!this.expected) {
      this.expected = current;
      return;
    }
    if (!sameArity(this.expected, current)) {
      throw new DiffConfigurationError(
        `Mixed-arity identities in ${side} collection at "${this.path.path}": expected ${describeArity(this.expected)}, found ${describeArity(current)}`
      );
    }
  }

  get composite(): boolean {
    return this.expected?.composite ?? false;
  }
}

/**
 * Only `Collection`s carry a `compareItemAs` hook.
 */
export function itemHookOf(container: unknown): Collection | undefined {
  return container instanceof Collection ? container : undefined;
}

/**
 * The record type foreign members are read through under `duckType`: the
 * collection's declared `itemType`, else the type of its first record member.
 */
function memberTypeOf(container: unknown): RecordType | undefined {
  if (container instanceof Collection && container.itemType) {
    return container.itemType;
  }
  for (const [, item] of collectionEntries(container)) {
    if (isRecord(item)) return recordTypeOf(item);
  }
  return undefined;
}

/**
 * Derives the identity of one member.
 *
 * Order of precedence:
 * 1. the `recordId` option, when configured;
 * 2. {@link extractIdentity} for records (and for any object when a declared
 *    member type is given under `duckType`);
 * 3. the normalized member itself.
 */
function identify(
  item: unknown,
  container: unknown,
  context: IdentityContext,
  options: DiffOptions
): Identity {
  if (options.recordId) return options.recordId(item, context, options);

  if (isRecord(item) || (context.type && isObjectLike(item))) {
    return extractIdentity(item, {
      ...context,
      normalizeSlot: (value, field) => normalizeSlot(value, field, options)
    });
  }

  return normalizeItem(item, itemHookOf(container), options);
}

/**
 * Reconciles two identity-bearing collections.
 *
 * Logic:
 * 1. Indexing:
 *    Every member of each side is indexed in an {@link OccurrenceMultiset}
 *    under its identity. The n-th member sharing an identity is a distinct
 *    multiset member, so duplicates are matched one by one.
 * 2. Arity check:
 *    The first identity fixes whether identities are scalar or composite (and
 *    the tuple length). A later identity of another arity is rejected.
 * 3. Emission:
 *    - `REMOVED` for base-only members, at (base + key, other);
 *    - `ADDED` for other-only members, at (base, other + key);
 *    - matched members: for composite identities, the records are compared
 *      field by field (same identity does not mean same content); for scalar
 *      identities, membership already implies equality.
 *
 * With `unchanged`, a matched pair whose comparison finds nothing but
 * `UNCHANGED` entries is reported as one `UNCHANGED` entry at the pair's keys,
 * followed by its field-level entries. This buffers the field-level entries of
 * that one pair.
 *
 * @throws {DiffConfigurationError} On mixed-arity identities.
 */
export function* compareKeyed(
  base: unknown,
  other: unknown,
  basePath: FieldSelector,
  otherPath: FieldSelector,
  options: DiffOptions
): Generator<ChangeEntry, void, undefined> {
  const context: IdentityContext = {};
  if (options.duckType) {
    const type = memberTypeOf(base);
    if (type) context.type = type;
  }
  const selector = memberFilter(options, basePath);
  if (selector) context.selector = selector;

  const arity = new ArityGuard(basePath);

  const index = (container: unknown, side: 'base' | 'other') => {
    const hookSource = options.duckType ? base : container;
    const members = new OccurrenceMultiset<unknown>();

    for (const [key, item] of collectionEntries(container)) {
      const identity = identify(item, hookSource, context, options);
      if (identity === ABSENT && options.ignoreEmptySlots) continue;

      arity.check(identity, side);
      members.add(identity, key, item);
    }
    return members;
  };

  const baseMembers = index(base, 'base');
  const otherMembers = index(other, 'other');

  const removed = baseMembers.difference(otherMembers);
  const added = otherMembers.difference(baseMembers);
  const matched = baseMembers.intersection(otherMembers);

  log.trace(
    {
      path: basePath.path,
      removed: removed.length,
      added: added.length,
      matched: matched.length
    },
    'reconciled keyed collection'
  );

  for (const entry of removed) {
    yield createRemoved(basePath.extend(entry.collectionKey), otherPath);
  }

  for (const entry of added) {
    yield createAdded(basePath, otherPath.extend(entry.collectionKey));
  }

  for (const [mine, theirs] of matched) {
    const pairBase = basePath.extend(mine.collectionKey);
    const pairOther = otherPath.extend(theirs.collectionKey);

    if (!arity.composite || !isRecord(mine.item)) {
      if (options.unchanged) yield createUnchanged(pairBase, pairOther);
      continue;
    }

    const nested = compareRecords(
      mine.item,
      theirs.item,
      pairBase,
      pairOther,
      options
    );

    if (!options.unchanged) {
      yield* nested;
      continue;
    }

    const entries = [...nested];
    if (entries.every(entry => entry.kind === ChangeKind.UNCHANGED)) {
      yield createUnchanged(pairBase, pairOther);
    }
    yield* entries;
  }
}
