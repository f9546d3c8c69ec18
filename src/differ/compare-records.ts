import { DiffConfigurationError, TypeMismatchError } from '../errors';
import {
  isRecord,
  recordTypeOf,
  type RecordValue
} from '../records/record-type';
import type { FieldSelector } from '../selectors/field-selector';
import { valuesEqual } from './canonical-key';
import {
  createAdded,
  createModified,
  createRemoved,
  createUnchanged,
  type ChangeEntry
} from './change-entry';
import { compareKeyed } from './compare-keyed';
import { compareMapping, compareSequence } from './compare-unkeyed';
import { normalizeSlot } from './normalize';
import { isFiltered } from './options';
import { getFieldStrategy } from './shapes';
import { ABSENT, type DiffOptions, type Shape } from './types';
import { readField, typeNameOf } from './utils';

/**
 * Verifies that two values may be compared as records.
 *
 * @throws {DiffConfigurationError} If `base` is not a record.
 * @throws {TypeMismatchError} If the declared types differ and `duckType` is
 * off.
 */
export function assertComparableRecords(
  base: unknown,
  other: unknown,
  options: DiffOptions
): asserts base is RecordValue {
  if (!isRecord(base)) {
    throw new DiffConfigurationError(
      `Expected a record to compare, received ${typeNameOf(base)}`
    );
  }
  if (options.duckType) return;
  if (!isRecord(other) || recordTypeOf(other) !== recordTypeOf(base)) {
    throw new TypeMismatchError(typeNameOf(base), typeNameOf(other));
  }
}

function itemsEqual(
  options: DiffOptions,
  base: unknown,
  other: unknown
): boolean {
  return (options.itemsEqual ?? valuesEqual)(base, other);
}

/**
 * Compares two records field by field.
 *
 * Logic, per field (sorted by name):
 * 1. Skip fields excluded by the compare filter, and extraneous fields unless
 *    `extraneous` is on.
 * 2. Read and normalize both sides (`compareAs` hook, then text policy).
 * 3. Decide, in order:
 *    - absent on both sides: nothing (not a difference);
 *    - absent in base: `ADDED`;
 *    - absent in other: `REMOVED`;
 *    - structured values of a compatible type: descend and yield the nested
 *      differences (a nested record never reports one blunt `MODIFIED`);
 *    - not equal: `MODIFIED`;
 *    - equal: `UNCHANGED`, only when `unchanged` is on.
 *
 * The sequence is lazy: fields are visited only as entries are pulled.
 *
 * @param base - The base record; entry kinds are relative to it.
 * @param other - The other record (any object under `duckType`).
 * @param basePath - Location of `base` in the base tree.
 * @param otherPath - Location of `other` in the other tree.
 * @param options - The active options.
 */
export function* compareRecords(
  base: unknown,
  other: unknown,
  basePath: FieldSelector,
  otherPath: FieldSelector,
  options: DiffOptions
): Generator<ChangeEntry, void, undefined> {
  assertComparableRecords(base, other, options);

  const fields = [...recordTypeOf(base).fields].sort(([left], [right]) =>
    left < right ? -1 : left > right ? 1 : 0
  );

  for (const [field, meta] of fields) {
    const baseField = basePath.extend(field);
    if (isFiltered(options, baseField)) continue;
    if (meta.extraneous && !options.extraneous) continue;

    const otherField = otherPath.extend(field);
    const baseValue = normalizeSlot(readField(base, field), meta, options);
    const otherValue = normalizeSlot(readField(other, field), meta, options);

    if (baseValue === ABSENT && otherValue === ABSENT) continue;

    if (baseValue === ABSENT) {
      yield createAdded(baseField, otherField);
      continue;
    }

    if (otherValue === ABSENT) {
      yield createRemoved(baseField, otherField);
      continue;
    }

    const strategy = getFieldStrategy(baseValue, otherValue, options);
    if (strategy.mode === 'descend') {
      yield* compareByShape(
        strategy.shape,
        baseValue,
        otherValue,
        baseField,
        otherField,
        options
      );
      continue;
    }

    if (!itemsEqual(options, baseValue, otherValue)) {
      yield createModified(baseField, otherField);
    } else if (options.unchanged) {
      yield createUnchanged(baseField, otherField);
    }
  }
}

/**
 * Dispatches a pair of values to the comparer for their shape.
 *
 * @param shape - The shape of `base`, as classified by `classifyShape`.
 */
export function compareByShape(
  shape: Exclude<Shape, 'scalar'>,
  base: unknown,
  other: unknown,
  basePath: FieldSelector,
  otherPath: FieldSelector,
  options: DiffOptions
): Generator<ChangeEntry, void, undefined> {
  switch (shape) {
    case 'record':
      return compareRecords(base, other, basePath, otherPath, options);
    case 'keyed':
      return compareKeyed(base, other, basePath, otherPath, options);
    case 'sequence':
      return compareSequence(base, other, basePath, otherPath, options);
    case 'mapping':
      return compareMapping(base, other, basePath, otherPath, options);
  }
}
