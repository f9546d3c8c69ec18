import { Collection } from '../records/collection';
import { isRecord, recordTypeOf } from '../records/record-type';
import { isPlainObject } from '../utils/type-guards';
import type { DiffOptions, Shape } from './types';

/**
 * Classifies a (normalized) value into one of the comparable shapes.
 *
 * | shape      | values                                   |
 * | ---------- | ---------------------------------------- |
 * | `record`   | record instances                         |
 * | `keyed`    | `Collection` instances                   |
 * | `sequence` | arrays and `Set`s                        |
 * | `mapping`  | plain objects and `Map`s                 |
 * | `scalar`   | everything else (primitives, Date, ...)  |
 *
 * Records are checked before plain objects: a record is a branded plain
 * object.
 */
export function classifyShape(value: unknown): Shape {
  if (isRecord(value)) return 'record';
  if (value instanceof Collection) return 'keyed';
  if (Array.isArray(value) || value instanceof Set) return 'sequence';
  if (value instanceof Map || isPlainObject(value)) return 'mapping';
  return 'scalar';
}

/**
 * `true` when both values have the same runtime type, which is what the
 * record comparer requires before descending into a field.
 *
 * - records: same declared `RecordType`;
 * - keyed collections: same collection kind;
 * - sequences and mappings: same container class (array/Set, object/Map).
 */
function haveSameRuntimeType(base: unknown, other: unknown): boolean {
  if (isRecord(base) && isRecord(other)) {
    return recordTypeOf(base) === recordTypeOf(other);
  }
  if (base instanceof Collection && other instanceof Collection) {
    return base.kind === other.kind;
  }
  if (Array.isArray(base)) return Array.isArray(other);
  if (base instanceof Set) return other instanceof Set;
  if (base instanceof Map) return other instanceof Map;
  if (isPlainObject(base)) return isPlainObject(other) && !isRecord(other);
  return false;
}

/**
 * The outcome of dispatching one field: either descend with the comparer for
 * `shape`, or fall back to value equality.
 */
export type FieldStrategy =
  | {
      /**
       * Descend structurally; the comparer is chosen by `shape`.
       */
      mode: 'descend';
      shape: Exclude<Shape, 'scalar'>;
    }
  | {
      /**
       * Compare as opaque values using the configured equality.
       */
      mode: 'equality';
    };

/**
 * Picks how a pair of present field values is compared.
 *
 * Without `duckType`, only values of the same runtime type are descended
 * into. With `duckType`, the base value's shape decides; a record may then be
 * compared against any object (its fields are read by name), while
 * collections still need a counterpart of the same shape.
 *
 * @param base - The normalized base value.
 * @param other - The normalized other value.
 * @param options - The active options.
 */
export function getFieldStrategy(
  base: unknown,
  other: unknown,
  options: DiffOptions
): FieldStrategy {
  const shape = classifyShape(base);
  if (shape === 'scalar') return { mode: 'equality' };

  if (!options.duckType) {
    return haveSameRuntimeType(base, other)
      ? { mode: 'descend', shape }
      : { mode: 'equality' };
  }

  const otherShape = classifyShape(other);
  const compatible =
    otherShape === shape ||
    (shape === 'record' && otherShape === 'mapping');

  return compatible ? { mode: 'descend', shape } : { mode: 'equality' };
}
