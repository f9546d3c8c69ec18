import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Builds the error thrown for a failed validation.
 *
 * @param message - Human-readable description of the first issue.
 * @param issuePath - Dotted path of the offending value, when the schema reports one.
 */
export type ValidationErrorFactory = (
  message: string,
  issuePath: string | undefined
) => Error;

/**
 * Converts a Standard Schema issue path (keys or `{ key }` segments) into a
 * dotted string.
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string | undefined {
  if (!path || path.length === 0) return undefined;
  return path
    .map(segment =>
      String(typeof segment === 'object' ? segment.key : segment)
    )
    .join('.');
}

/**
 * Validates (and possibly transforms) a value using a Standard Schema V1
 * compliant validator.
 *
 * About `~standard`:
 * It acts as a universal adapter, so record schemas and the options schema can
 * come from Zod, Valibot, ArkType and others without library-specific code.
 * `validate` returns a result object (`{ value }` or `{ issues }`) and never
 * throws; issues are turned into errors here.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - The raw value to validate.
 * @param subject - Name used in error messages (e.g. a record type name).
 * @param createError - Builds the error thrown for the first issue.
 * @returns The validated output value.
 *
 * @throws
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise (comparison is strictly synchronous).
 * - If validation fails (issues reported by the schema).
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  subject: string,
  createError: ValidationErrorFactory
): StandardSchemaV1.InferOutput<S>;

/*
 * Implementation Note - Overloads:
 * Inside the body the schema is only known as `StandardSchemaV1`, so the
 * validated value is `unknown`. The public overload restores the precise
 * output type without a type assertion.
 */
export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  subject: string,
  createError: ValidationErrorFactory
): unknown {
  // Guards against plain objects being passed where a schema is expected.
  if (!('~standard' in schema)) {
    throw createError(
      `The schema for "${subject}" is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot), but received a plain object.`,
      undefined
    );
  }

  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw createError(
      `Async schema validation is not supported for "${subject}".`,
      undefined
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const issuePath = formatIssuePath(firstIssue.path);
    throw createError(
      `Invalid value for "${subject}" at "${issuePath ?? 'unknown'}": ${firstIssue.message}`,
      issuePath
    );
  }

  if (!('value' in result)) {
    throw createError(
      `Invalid value for "${subject}": the schema reported no value.`,
      undefined
    );
  }

  return result.value;
}
