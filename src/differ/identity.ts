import { Collection } from '../records/collection';
import {
  isRecord,
  recordTypeOf,
  type FieldMeta,
  type RecordType
} from '../records/record-type';
import type { MultiFieldSelector } from '../selectors/multi-field-selector';
import { ABSENT, type Identity } from './types';
import { readField } from './utils';

export type SlotNormalizer = (
  value: unknown,
  field: FieldMeta | undefined
) => unknown;

export type ExtractIdentityOptions = {
  /**
   * Read the record through this type's field table instead of its own
   * (duck typing against a foreign record or plain object).
   */
  type?: RecordType;

  /**
   * Only fields selected here take part in the identity.
   */
  selector?: MultiFieldSelector;

  /**
   * Applied to every scalar part of the identity, so identities honour the
   * same whitespace/case/Unicode policy as value comparison.
   */
  normalizeSlot?: SlotNormalizer;
};

/**
 * The fields forming a record's identity:
 * 1. the declared primary key, when every part of it survives the selector;
 * 2. otherwise every selected, non-extraneous field, sorted by name.
 */
function identityFields(
  type: RecordType,
  selector: MultiFieldSelector | undefined
): string[] {
  const selected = (field: string) => !selector || selector.includes([field]);

  if (type.primaryKey.length > 0 && type.primaryKey.every(selected)) {
    return [...type.primaryKey];
  }

  return [...type.fields.entries()]
    .filter(([field, meta]) => !meta.extraneous && selected(field))
    .map(([field]) => field)
    .sort();
}

/**
 * Derives the identity of a collection member.
 *
 * - Records yield a tuple (array) of their identity field values: nested
 *   records become nested tuples, collections and arrays become tuples of
 *   member identities, scalars pass through `normalizeSlot`. Unset fields
 *   contribute `null`.
 * - Any other value is its own identity.
 *
 * Example:
 * ```ts
 * const Tag = defineRecord<{ id: number; label: string }>()({
 *   name: 'Tag',
 *   fields: { id: {}, label: {} },
 *   primaryKey: ['id']
 * });
 * extractIdentity(Tag.create({ id: 7, label: 'x' })); // [7]
 * ```
 */
export function extractIdentity(
  value: unknown,
  options: ExtractIdentityOptions = {}
): Identity {
  const type = options.type ?? (isRecord(value) ? recordTypeOf(value) : undefined);
  if (!type) return value;

  return identityFields(type, options.selector).map(field =>
    identityPart(
      readField(value, field),
      type.fields.get(field),
      options.normalizeSlot,
      options.selector?.at([field])
    )
  );
}

/**
 * One part of a record identity. Members of collection-valued parts go
 * through the same normalization as scalar fields, without the field's own
 * `compareAs` hook, which applies to the collection as a whole.
 */
function identityPart(
  raw: unknown,
  meta: FieldMeta | undefined,
  normalize: SlotNormalizer | undefined,
  selector: MultiFieldSelector | undefined
): Identity {
  if (raw === ABSENT) return null;
  if (isRecord(raw)) {
    return extractIdentity(raw, { normalizeSlot: normalize, selector });
  }
  if (raw instanceof Collection || Array.isArray(raw)) {
    return [...raw].map(item =>
      identityPart(item, undefined, normalize, undefined)
    );
  }

  const part = normalize ? normalize(raw, meta) : raw;
  return part === ABSENT ? null : part;
}
