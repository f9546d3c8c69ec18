import { z } from 'zod';

import { DiffConfigurationError, DiffOptionsConflictError } from '../errors';
import { FieldSelector } from '../selectors/field-selector';
import {
  ANY_KEY,
  MultiFieldSelector,
  type PathSpec
} from '../selectors/multi-field-selector';
import { validateWithSchema } from '../validator';
import type {
  DiffOptions,
  DiffOptionsInput,
  DiffSettings,
  IdentityExtractor
} from './types';

const pathComponentSchema = z.union([
  z.string(),
  z.number(),
  z.null(),
  z.literal(ANY_KEY)
]);

// Both selector classes keep their constructors private, so `z.instanceof`
// cannot take them; `z.custom` runs the same runtime check.
const multiFieldSelectorSchema = z.custom<MultiFieldSelector>(
  value => value instanceof MultiFieldSelector,
  { message: 'Expected a MultiFieldSelector' }
);

const fieldSelectorSchema = z.custom<FieldSelector>(
  value => value instanceof FieldSelector,
  { message: 'Expected a FieldSelector' }
);

const compareFilterSchema = z.union([
  multiFieldSelectorSchema,
  z.array(z.union([fieldSelectorSchema, z.array(pathComponentSchema)]))
]);

const itemsEqualSchema = z.custom<(a: unknown, b: unknown) => boolean>(
  value => typeof value === 'function',
  { message: 'Expected a function' }
);

const recordIdSchema = z.custom<IdentityExtractor>(
  value => typeof value === 'function',
  { message: 'Expected a function' }
);

/**
 * Schema for inline option values. Strict: unknown keys are configuration
 * mistakes (e.g. `ignoreWS`), not silently ignored.
 */
export const diffOptionsInputSchema = z
  .object({
    ignoreWhitespace: z.boolean().optional(),
    ignoreCase: z.boolean().optional(),
    unicodeNormal: z.boolean().optional(),
    unchanged: z.boolean().optional(),
    ignoreEmptySlots: z.boolean().optional(),
    duckType: z.boolean().optional(),
    extraneous: z.boolean().optional(),
    compareFilter: compareFilterSchema.optional(),
    itemsEqual: itemsEqualSchema.optional(),
    recordId: recordIdSchema.optional()
  })
  .strict();

function toFilter(
  filter: MultiFieldSelector | readonly (PathSpec | FieldSelector)[] | undefined
): MultiFieldSelector | undefined {
  if (filter === undefined || filter instanceof MultiFieldSelector) {
    return filter;
  }
  return MultiFieldSelector.from(filter);
}

/**
 * Validates inline option values and merges them with the library defaults.
 *
 * Default settings:
 * - `ignoreWhitespace`: `true`
 * - `unicodeNormal`: `true`
 * - everything else: off / unset
 *
 * @throws {DiffConfigurationError} For unknown keys or mistyped values.
 * @returns A frozen, complete options object.
 */
export function createDiffOptions(input: DiffOptionsInput = {}): DiffOptions {
  const validated = validateWithSchema(
    diffOptionsInputSchema,
    input,
    'DiffOptions',
    message => new DiffConfigurationError(message)
  );

  return Object.freeze({
    ignoreWhitespace: validated.ignoreWhitespace ?? true,
    ignoreCase: validated.ignoreCase ?? false,
    unicodeNormal: validated.unicodeNormal ?? true,
    unchanged: validated.unchanged ?? false,
    ignoreEmptySlots: validated.ignoreEmptySlots ?? false,
    duckType: validated.duckType ?? false,
    extraneous: validated.extraneous ?? false,
    compareFilter: toFilter(validated.compareFilter),
    itemsEqual: validated.itemsEqual,
    recordId: validated.recordId
  });
}

/**
 * Resolves what the entry points receive: either a pre-built `options`
 * object or inline values, never both.
 *
 * @throws {DiffOptionsConflictError} When both are supplied.
 */
export function resolveDiffOptions(settings: DiffSettings = {}): DiffOptions {
  const { options, ...inline } = settings;
  const inlineKeys = Object.keys(inline).filter(
    key => Reflect.get(inline, key) !== undefined
  );

  if (options === undefined) return createDiffOptions(inline);
  if (inlineKeys.length > 0) throw new DiffOptionsConflictError(inlineKeys);
  return options;
}

/**
 * `true` when the compare filter excludes the location.
 */
export function isFiltered(
  options: DiffOptions,
  selector: FieldSelector
): boolean {
  return !!options.compareFilter && !options.compareFilter.includes(selector);
}

/**
 * The sub-filter applying to the members of the collection at `selector`, if
 * a compare filter is configured.
 */
export function memberFilter(
  options: DiffOptions,
  selector: FieldSelector
): MultiFieldSelector | undefined {
  return options.compareFilter?.at(selector).atAnyKey();
}
