export { diff, diffIter } from './differ';
export { Diff } from './differ/diff-result';
export {
  CHANGE_KINDS,
  ChangeEntry,
  ChangeKind,
  compareChangeKinds,
  toChangeKind
} from './differ/change-entry';
export {
  createDiffOptions,
  diffOptionsInputSchema,
  resolveDiffOptions
} from './differ/options';
export {
  isEmptyValue,
  normalizeCase,
  normalizeItem,
  normalizeSlot,
  normalizeText,
  normalizeUnicode,
  normalizeValue,
  normalizeWhitespace
} from './differ/normalize';
export type { ItemHookSource } from './differ/normalize';
export { extractIdentity } from './differ/identity';
export type { ExtractIdentityOptions, SlotNormalizer } from './differ/identity';
export { canonicalKey, valuesEqual } from './differ/canonical-key';
export { classifyShape } from './differ/shapes';
export { typeNameOf } from './differ/utils';
export { ABSENT } from './differ/types';
export type {
  Absent,
  DiffOptions,
  DiffOptionsInput,
  DiffSettings,
  Identity,
  IdentityContext,
  IdentityExtractor,
  Shape
} from './differ/types';

export { FieldSelector } from './selectors/field-selector';
export type { PathComponent } from './selectors/field-selector';
export {
  ANY_KEY,
  MultiFieldSelector
} from './selectors/multi-field-selector';
export type {
  FilterComponent,
  PathSpec
} from './selectors/multi-field-selector';

export {
  RECORD_TYPE,
  defineRecord,
  isRecord,
  recordTypeOf
} from './records/record-type';
export type {
  FieldMeta,
  RecordDefinition,
  RecordType,
  RecordValue
} from './records/record-type';
export { Collection } from './records/collection';
export type {
  CollectionKey,
  CollectionKind,
  CollectionOptions
} from './records/collection';
export { collectionEntries } from './records/iteration';

export {
  DiffConfigurationError,
  DiffError,
  DiffOptionsConflictError,
  InvalidChangeKindError,
  RecordValidationError,
  TypeMismatchError
} from './errors';
export { createChildLogger, logger } from './logger';
export type { Logger } from './logger';
