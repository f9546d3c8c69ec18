import type { RecordType } from '../records/record-type';
import type { FieldSelector } from '../selectors/field-selector';
import type {
  MultiFieldSelector,
  PathSpec
} from '../selectors/multi-field-selector';

/**
 * Marker for "no value on this side": an unset field, or a value that
 * normalization turned into nothing (see `ignoreEmptySlots`).
 *
 * Distinct from `null` and `undefined`, and never equal to any real value.
 */
export const ABSENT: unique symbol = Symbol('record-delta.absent');

export type Absent = typeof ABSENT;

/**
 * A scalar identity, or a composite (tuple) identity built from the primary
 * key fields of a record.
 */
export type Identity = unknown;

/**
 * Arguments handed to identity extraction for one collection member.
 */
export type IdentityContext = {
  /**
   * Declared member type; only provided under `duckType`, so that foreign
   * members are read through the base collection's field table.
   */
  type?: RecordType;

  /**
   * Sub-filter applying to the members; only provided when a compare filter
   * is configured. Primary key fields outside it are not part of the identity.
   */
  selector?: MultiFieldSelector;
};

/**
 * Replaces the default identity extraction for records in keyed collections.
 * Returning an array marks the identity as composite, which enables the
 * field-level comparison of matched members.
 */
export type IdentityExtractor = (
  record: unknown,
  context: IdentityContext,
  options: DiffOptions
) => Identity;

/**
 * Resolved comparison options. Frozen for the duration of a run.
 */
export type DiffOptions = {
  /**
   * Collapse runs of whitespace into one space and trim both ends before
   * comparing text.
   */
  readonly ignoreWhitespace: boolean;

  /** Uppercase text before comparing. */
  readonly ignoreCase: boolean;

  /** Normalize text to Unicode NFC before comparing. */
  readonly unicodeNormal: boolean;

  /** Also yield `UNCHANGED` entries. Useful for testing. */
  readonly unchanged: boolean;

  /**
   * Treat empty values (`''`, `null`, `undefined`) as if they were not set.
   * Checked after every other normalization.
   */
  readonly ignoreEmptySlots: boolean;

  /**
   * Allow records of different declared types; fields are matched by name
   * using the base record's field table.
   */
  readonly duckType: boolean;

  /** Include fields declared `extraneous`. */
  readonly extraneous: boolean;

  /** Restrict comparison to the selected fields. */
  readonly compareFilter: MultiFieldSelector | undefined;

  /** Equality for values that are not compared structurally. */
  readonly itemsEqual: ((a: unknown, b: unknown) => boolean) | undefined;

  /** Identity extraction for members of keyed collections. */
  readonly recordId: IdentityExtractor | undefined;
};

/**
 * Inline option values accepted by the entry points; everything is optional
 * and `compareFilter` may be given as a list of path specs.
 */
export type DiffOptionsInput = Partial<
  Omit<DiffOptions, 'compareFilter' | 'itemsEqual' | 'recordId'>
> & {
  compareFilter?: MultiFieldSelector | readonly (PathSpec | FieldSelector)[];
  itemsEqual?: (a: unknown, b: unknown) => boolean;
  recordId?: IdentityExtractor;
};

/**
 * What the entry points accept: inline values, or a pre-built `options`
 * object. Mixing both is rejected.
 */
export type DiffSettings = DiffOptionsInput & {
  options?: DiffOptions;
};

/**
 * Closed set of comparable runtime shapes; anything else is a scalar.
 */
export type Shape = 'scalar' | 'record' | 'keyed' | 'sequence' | 'mapping';
