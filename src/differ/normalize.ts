import type { FieldMeta } from '../records/record-type';
import { isNullish, isString } from '../utils/type-guards';
import { ABSENT, type Absent, type DiffOptions } from './types';

type TextPolicy = Pick<
  DiffOptions,
  'ignoreWhitespace' | 'ignoreCase' | 'unicodeNormal'
>;

type ValuePolicy = TextPolicy & Pick<DiffOptions, 'ignoreEmptySlots'>;

/**
 * Anything that may declare a per-item comparison hook (a `Collection`, or a
 * foreign container carrying the same capability).
 */
export type ItemHookSource = {
  readonly compareItemAs?: ((item: unknown) => unknown) | undefined;
};

/** Collapses every run of Unicode whitespace into one space and trims. */
export function normalizeWhitespace(value: string): string {
  return value
    .split(/\s+/u)
    .filter(part => part.length > 0)
    .join(' ');
}

/**
 * Uppercase folding. Locale-sensitive folding (Turkish dotted I, final
 * sigma) is out of reach of `toUpperCase` and is left to `compareAs` hooks.
 */
export function normalizeCase(value: string): string {
  return value.toUpperCase();
}

export function normalizeUnicode(value: string): string {
  return value.normalize('NFC');
}

/**
 * Text pipeline. The order is fixed: whitespace first, so that case folding
 * and NFC act on already-trimmed text.
 */
export function normalizeText(value: string, policy: TextPolicy): string {
  let text = value;
  if (policy.ignoreWhitespace) text = normalizeWhitespace(text);
  if (policy.ignoreCase) text = normalizeCase(text);
  if (policy.unicodeNormal) text = normalizeUnicode(text);
  return text;
}

/**
 * `''`, `null` and `undefined` are empty. `0`, `false` and empty containers
 * are real values.
 */
export function isEmptyValue(value: unknown): boolean {
  return value === '' || isNullish(value);
}

/**
 * Scrubs a value before comparison.
 *
 * @returns The normalized value, or {@link ABSENT} when the value is empty and
 * `ignoreEmptySlots` is on (or was already absent).
 */
export function normalizeValue(
  value: unknown,
  policy: ValuePolicy
): unknown | Absent {
  if (value === ABSENT) return ABSENT;

  const scrubbed = isString(value) ? normalizeText(value, policy) : value;
  if (policy.ignoreEmptySlots && isEmptyValue(scrubbed)) return ABSENT;
  return scrubbed;
}

/**
 * Normalizes a record slot: the field's `compareAs` hook first (skipped for
 * absent values), then {@link normalizeValue}.
 */
export function normalizeSlot(
  value: unknown,
  field: FieldMeta | undefined,
  policy: ValuePolicy
): unknown | Absent {
  const mapped =
    value !== ABSENT && field?.compareAs ? field.compareAs(value) : value;
  return normalizeValue(mapped, policy);
}

/**
 * Normalizes a collection member: the container's `compareItemAs` hook first
 * (skipped for absent values), then {@link normalizeValue}.
 */
export function normalizeItem(
  value: unknown,
  container: ItemHookSource | undefined,
  policy: ValuePolicy
): unknown | Absent {
  const mapped =
    value !== ABSENT && container?.compareItemAs
      ? container.compareItemAs(value)
      : value;
  return normalizeValue(mapped, policy);
}
