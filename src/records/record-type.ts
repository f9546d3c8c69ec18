import type { StandardSchemaV1 } from '@standard-schema/spec';

import { RecordValidationError } from '../errors';
import { isObjectLike, isUndefined } from '../utils/type-guards';
import { validateWithSchema } from '../validator';

/**
 * Brand carried by every record instance; holds its {@link RecordType}.
 */
export const RECORD_TYPE: unique symbol = Symbol('record-delta.record-type');

/**
 * Per-field metadata consumed by the comparers.
 */
export type FieldMeta = {
  /**
   * Extraneous fields are skipped by comparison unless the `extraneous`
   * option is enabled (e.g. audit timestamps, cached display names).
   */
  extraneous?: boolean;

  /**
   * Maps a stored value to the value used for comparison
   * (e.g. `value => value.toLowerCase()` for an email address).
   * Never called for unset fields.
   */
  compareAs?: (value: unknown) => unknown;

  doc?: string;
};

/**
 * A declared record type: an ordered field table plus an optional primary key.
 */
export type RecordType = {
  readonly name: string;
  readonly fields: ReadonlyMap<string, FieldMeta>;
  /**
   * Field names forming the identity of a record inside a keyed collection.
   * Empty when the type declares none.
   */
  readonly primaryKey: readonly string[];
  create(values: object): RecordValue;
  isInstance(value: unknown): value is RecordValue;
};

/**
 * A record instance. Field values are read by name; unset fields are missing.
 */
export type RecordValue = {
  readonly [RECORD_TYPE]: RecordType;
  readonly [field: string]: unknown;
};

/**
 * Declaration accepted by {@link defineRecord}.
 *
 * @template Props - The field interface of the record.
 */
export type RecordDefinition<Props extends object> = {
  name: string;
  fields: { readonly [K in keyof Props & string]-?: FieldMeta };
  primaryKey?: readonly (keyof Props & string)[];
  /**
   * Optional Standard Schema (Zod, Valibot, ...) run by `create` before the
   * record is built; its output becomes the stored values.
   */
  schema?: StandardSchemaV1;
};

/**
 * Guard verifying the value is a record instance of any type.
 */
export function isRecord(value: unknown): value is RecordValue {
  return isObjectLike(value) && RECORD_TYPE in value;
}

export function recordTypeOf(record: RecordValue): RecordType {
  return record[RECORD_TYPE];
}

/**
 * Reads an own property without touching the prototype chain.
 */
export function readOwnProperty(source: object, key: string): unknown {
  return Object.hasOwn(source, key) ? Reflect.get(source, key) : undefined;
}

function buildRecordType(
  name: string,
  fields: ReadonlyMap<string, FieldMeta>,
  primaryKey: readonly string[],
  schema: StandardSchemaV1 | undefined
): RecordType {
  const type: RecordType = {
    name,
    fields,
    primaryKey,

    create(values: object): RecordValue {
      const input = schema
        ? validateWithSchema(
            schema,
            values,
            name,
            (message, issuePath) =>
              new RecordValidationError(name, message, issuePath)
          )
        : values;

      if (!isObjectLike(input)) {
        throw new RecordValidationError(
          name,
          `Invalid value for "${name}": expected an object.`
        );
      }

      for (const key of Object.keys(input)) {
        if (!fields.has(key)) {
          throw new RecordValidationError(
            name,
            `Unknown field "${key}" for "${name}".`,
            key
          );
        }
      }

      const record: { [RECORD_TYPE]: RecordType; [field: string]: unknown } = {
        [RECORD_TYPE]: type
      };
      for (const field of fields.keys()) {
        const value = readOwnProperty(input, field);
        if (!isUndefined(value)) record[field] = value;
      }
      return Object.freeze(record);
    },

    isInstance(value: unknown): value is RecordValue {
      return isRecord(value) && recordTypeOf(value) === type;
    }
  };

  return Object.freeze(type);
}

/**
 * Declares a record type.
 *
 * Implementation Note:
 * Curried so the `Props` interface can be given explicitly while the
 * definition object is still checked against it.
 *
 * Usage:
 * ```ts
 * const Person = defineRecord<{ name: string; tags: string[] }>()({
 *   name: 'Person',
 *   fields: { name: {}, tags: {} }
 * });
 * const jo = Person.create({ name: 'Jo', tags: ['x'] });
 * ```
 */
export function defineRecord<Props extends object>() {
  return (definition: RecordDefinition<Props>): RecordType => {
    const fields = new Map<string, FieldMeta>(
      Object.entries(definition.fields)
    );

    for (const key of definition.primaryKey ?? []) {
      if (!fields.has(key)) {
        throw new RecordValidationError(
          definition.name,
          `Primary key field "${key}" is not declared on "${definition.name}".`,
          key
        );
      }
    }

    return buildRecordType(
      definition.name,
      fields,
      Object.freeze([...(definition.primaryKey ?? [])]),
      definition.schema
    );
  };
}
