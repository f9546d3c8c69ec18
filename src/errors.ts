/**
 * Error hierarchy
 * ---------------
 * Every failure raised by the library derives from {@link DiffError}, so callers
 * can catch library errors with a single `instanceof` check and still branch on
 * the concrete class when they need to.
 *
 * Absence of a field or collection item is never an error: it is reported as an
 * `ADDED`/`REMOVED` change entry.
 */
export class DiffError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when two records of different declared types are compared without
 * `duckType`.
 */
export class TypeMismatchError extends DiffError {
  readonly baseTypeName: string;
  readonly otherTypeName: string;

  constructor(baseTypeName: string, otherTypeName: string) {
    super(`Cannot compare ${baseTypeName} with ${otherTypeName}`);
    this.baseTypeName = baseTypeName;
    this.otherTypeName = otherTypeName;
  }
}

/**
 * Raised when a pre-built options object is passed together with inline option
 * values.
 */
export class DiffOptionsConflictError extends DiffError {
  readonly inlineKeys: readonly string[];

  constructor(inlineKeys: readonly string[]) {
    super(
      `Pass either a pre-built "options" object or inline option values, not both (inline: ${inlineKeys.join(', ')}).`
    );
    this.inlineKeys = inlineKeys;
  }
}

/**
 * Raised for invalid option values and for inputs the comparers refuse to
 * guess about (mixed-arity identities, uncomparable roots).
 */
export class DiffConfigurationError extends DiffError {}

export class InvalidChangeKindError extends DiffError {
  readonly input: unknown;

  constructor(input: unknown) {
    super(`Unknown change kind: ${String(input)}`);
    this.input = input;
  }
}

/**
 * Raised by record construction when the input does not satisfy the record
 * type (unknown fields, schema issues, async schemas).
 */
export class RecordValidationError extends DiffError {
  readonly recordName: string;
  readonly issuePath: string | undefined;

  constructor(recordName: string, message: string, issuePath?: string) {
    super(message);
    this.recordName = recordName;
    this.issuePath = issuePath;
  }
}
