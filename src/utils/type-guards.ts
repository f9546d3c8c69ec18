export type Guard<T> = (value: unknown) => value is T;

/** The `typeof` results the comparison engine branches on. */
type TypeofMap = {
  number: number;
  string: string;
  undefined: undefined;
};

/** Creates a guard for a single `typeof` result. */
export function is<K extends keyof TypeofMap>(kind: K): Guard<TypeofMap[K]> {
  return (value: unknown): value is TypeofMap[K] => typeof value === kind;
}

/**
 * Combines guards into one that passes when any of them does.
 *
 * @example
 * const isNullish = anyOf(isNull, isUndefined);
 */
export function anyOf<T extends unknown[]>(
  ...guards: { [K in keyof T]: Guard<T[K]> }
): Guard<T[number]> {
  return (value: unknown): value is T[number] =>
    guards.some(guard => guard(value));
}

export const isString = is('string');

/** Includes `NaN` and the infinities. */
export const isNumber = is('number');

export const isUndefined = is('undefined');

/** `typeof null` is `"object"`, hence no {@link is} form. */
export function isNull(value: unknown): value is null {
  return value === null;
}

/** A slot holding no value at all. */
export const isNullish = anyOf<[null, undefined]>(isNull, isUndefined);

/** `Number.isNaN` does not coerce, unlike the global `isNaN`. */
export function isNaNValue(value: unknown): value is number {
  return isNumber(value) && Number.isNaN(value);
}

/** `-0 === 0`, so only `Object.is` separates the two zeros. */
export function isNegativeZeroValue(value: unknown): value is number {
  return isNumber(value) && Object.is(value, -0);
}

/** Any non-null object, arrays and containers included. */
export function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * A bare key/value bag: an object literal, `Object.create(null)` or
 * `new Object()`.
 *
 * Class instances, arrays, Maps and Dates fail the prototype check. Record
 * values pass it, so callers that treat records apart test for them first.
 */
export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (!isObjectLike(value) || Array.isArray(value)) return false;

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === null || prototype === Object.prototype;
}
