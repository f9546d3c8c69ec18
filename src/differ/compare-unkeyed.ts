import { createDifferLogger } from '../logger';
import { collectionEntries } from '../records/iteration';
import type { FieldSelector } from '../selectors/field-selector';
import {
  createAdded,
  createRemoved,
  createUnchanged,
  type ChangeEntry
} from './change-entry';
import { itemHookOf } from './compare-keyed';
import { OccurrenceMultiset } from './multiset';
import { normalizeItem } from './normalize';
import { ABSENT, type DiffOptions } from './types';

const log = createDifferLogger('unkeyed-comparer');

function indexMembers(
  container: unknown,
  hookSource: unknown,
  options: DiffOptions
): OccurrenceMultiset<unknown> {
  const members = new OccurrenceMultiset<unknown>();
  const hook = itemHookOf(hookSource);

  for (const [key, item] of collectionEntries(container)) {
    const normalized = normalizeItem(item, hook, options);
    if (normalized === ABSENT && options.ignoreEmptySlots) continue;
    members.add(normalized, key, item);
  }
  return members;
}

/**
 * Multiset reconciliation shared by sequences and mappings.
 *
 * Members are matched by normalized value, never by position or key: the
 * n-th occurrence of a value in `base` pairs with the n-th occurrence in
 * `other`. Unmatched occurrences become `REMOVED` (at base + key) and
 * `ADDED` (at other + key), in that order; matched pairs are `UNCHANGED` and
 * only reported when `unchanged` is on.
 */
function* reconcile(
  label: string,
  base: unknown,
  other: unknown,
  basePath: FieldSelector,
  otherPath: FieldSelector,
  options: DiffOptions
): Generator<ChangeEntry, void, undefined> {
  const baseMembers = indexMembers(base, base, options);
  const otherMembers = indexMembers(
    other,
    options.duckType ? base : other,
    options
  );

  const removed = baseMembers.difference(otherMembers);
  const added = otherMembers.difference(baseMembers);

  log.trace(
    {
      path: basePath.path,
      removed: removed.length,
      added: added.length
    },
    `reconciled ${label}`
  );

  for (const entry of removed) {
    yield createRemoved(basePath.extend(entry.collectionKey), otherPath);
  }

  for (const entry of added) {
    yield createAdded(basePath, otherPath.extend(entry.collectionKey));
  }

  if (!options.unchanged) return;

  for (const [mine, theirs] of baseMembers.intersection(otherMembers)) {
    yield createUnchanged(
      basePath.extend(mine.collectionKey),
      otherPath.extend(theirs.collectionKey)
    );
  }
}

/**
 * Compares two sequences (arrays, `Set`s, list and set `Collection`s) as
 * multisets. Order does not matter; repeated values are counted.
 *
 * Example: `['x', 'x', 'y']` against `['x', 'y', 'y']` yields `REMOVED` at
 * base `[1]` and `ADDED` at other `[2]`.
 */
export function compareSequence(
  base: unknown,
  other: unknown,
  basePath: FieldSelector,
  otherPath: FieldSelector,
  options: DiffOptions
): Generator<ChangeEntry, void, undefined> {
  return reconcile('sequence', base, other, basePath, otherPath, options);
}

/**
 * Compares two mappings (plain objects, `Map`s) by their values. Keys only
 * locate the entries; a value moved to another key is not a change.
 */
export function compareMapping(
  base: unknown,
  other: unknown,
  basePath: FieldSelector,
  otherPath: FieldSelector,
  options: DiffOptions
): Generator<ChangeEntry, void, undefined> {
  return reconcile('mapping', base, other, basePath, otherPath, options);
}
