import { DiffConfigurationError } from '../errors';
import { createDifferLogger } from '../logger';
import { FieldSelector } from '../selectors/field-selector';
import type { ChangeEntry } from './change-entry';
import { assertComparableRecords, compareByShape } from './compare-records';
import { Diff } from './diff-result';
import { resolveDiffOptions } from './options';
import { classifyShape } from './shapes';
import type { DiffSettings } from './types';
import { typeNameOf } from './utils';

const log = createDifferLogger('orchestrator');

/**
 * Lazily compares two values and yields their differences.
 *
 * Logic:
 * 1. Options:
 *    `settings` holds inline option values or a pre-built `options` object.
 *    Both together throw before anything is compared.
 * 2. Dispatch:
 *    The root is classified once (record, keyed collection, sequence,
 *    mapping) and handed to the matching comparer with root selectors.
 * 3. Eager checks:
 *    Root records are type-checked here, so a mismatch throws from
 *    `diffIter` itself rather than from the first `next()`.
 *
 * The returned iterator is single-pass; entries are computed as they are
 * pulled, and abandoning it early leaves nothing behind.
 *
 * Example:
 * ```ts
 * for (const entry of diffIter(before, after, { ignoreCase: true })) {
 *   console.log(entry.toString()); // <ChangeEntry: MODIFIED .name>
 * }
 * ```
 *
 * @throws {DiffOptionsConflictError} When `options` is mixed with inline
 * values.
 * @throws {DiffConfigurationError} For invalid options, or when the root has
 * no comparable shape.
 * @throws {TypeMismatchError} When root records have different declared types
 * and `duckType` is off.
 */
export function diffIter(
  base: unknown,
  other: unknown,
  settings?: DiffSettings
): Iterator<ChangeEntry> & Iterable<ChangeEntry> {
  const options = resolveDiffOptions(settings);
  const shape = classifyShape(base);

  if (shape === 'scalar') {
    throw new DiffConfigurationError(
      `Cannot compare values of type ${typeNameOf(base)}; expected a record or a collection`
    );
  }
  if (shape === 'record') assertComparableRecords(base, other, options);

  log.debug(
    {
      shape,
      base: typeNameOf(base),
      other: typeNameOf(other)
    },
    'starting comparison'
  );

  return compareByShape(
    shape,
    base,
    other,
    FieldSelector.root,
    FieldSelector.root,
    options
  );
}

/**
 * Eager variant of {@link diffIter}: collects every entry into a {@link Diff}
 * tagged with the operands' type names.
 */
export function diff(
  base: unknown,
  other: unknown,
  settings?: DiffSettings
): Diff {
  return new Diff(
    diffIter(base, other, settings),
    typeNameOf(base),
    typeNameOf(other)
  );
}
