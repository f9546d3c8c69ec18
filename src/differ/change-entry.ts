import { InvalidChangeKindError } from '../errors';
import type { FieldSelector } from '../selectors/field-selector';

/**
 * Kinds of difference, in increasing order. The order drives sorting and
 * display priority.
 *
 * Each kind carries:
 * - `index`: its 1-based position,
 * - `token`: the canonical lowercase token (`none`, `added`, ...),
 * - `displayName`: the uppercase name shown in renderings.
 */
export const ChangeKind = Object.freeze({
  UNCHANGED: Object.freeze({
    index: 1,
    token: 'none',
    displayName: 'UNCHANGED'
  } as const),
  ADDED: Object.freeze({
    index: 2,
    token: 'added',
    displayName: 'ADDED'
  } as const),
  REMOVED: Object.freeze({
    index: 3,
    token: 'removed',
    displayName: 'REMOVED'
  } as const),
  MODIFIED: Object.freeze({
    index: 4,
    token: 'modified',
    displayName: 'MODIFIED'
  } as const)
});

export type ChangeKind = (typeof ChangeKind)[keyof typeof ChangeKind];

export const CHANGE_KINDS: readonly ChangeKind[] = Object.freeze([
  ChangeKind.UNCHANGED,
  ChangeKind.ADDED,
  ChangeKind.REMOVED,
  ChangeKind.MODIFIED
]);

/**
 * Normalizes an index, canonical token, display name or kind value to the
 * kind singleton.
 *
 * @throws {InvalidChangeKindError} For anything else; there is no fallback.
 */
export function toChangeKind(input: ChangeKind | number | string): ChangeKind {
  const match = CHANGE_KINDS.find(kind =>
    typeof input === 'number'
      ? kind.index === input
      : typeof input === 'string'
        ? kind.token === input || kind.displayName === input
        : kind === input
  );
  if (!match) throw new InvalidChangeKindError(input);
  return match;
}

export function compareChangeKinds(left: ChangeKind, right: ChangeKind): number {
  return left.index - right.index;
}

/**
 * One reported difference.
 *
 * `base` and `other` are always set. When a side has no such location (an
 * added or removed collection member), its selector points at the parent
 * collection instead.
 */
export class ChangeEntry {
  readonly kind: ChangeKind;
  readonly base: FieldSelector;
  readonly other: FieldSelector;

  constructor(
    kind: ChangeKind | number | string,
    base: FieldSelector,
    other: FieldSelector
  ) {
    this.kind = toChangeKind(kind);
    this.base = base;
    this.other = other;
    Object.freeze(this);
  }

  /**
   * The most specific rendering of the location: the longer path when one
   * side is a prefix of the other, otherwise both.
   */
  get path(): string {
    const { base, other } = this;
    if (base.equals(other)) return other.path;
    if (base.length > other.length && base.startsWith(other)) return base.path;
    if (other.length > base.length && other.startsWith(base)) return other.path;
    return `(${base.path}/${other.path})`;
  }

  toString(): string {
    return `<ChangeEntry: ${this.kind.displayName} ${this.path}>`;
  }
}

export function createAdded(
  base: FieldSelector,
  other: FieldSelector
): ChangeEntry {
  return new ChangeEntry(ChangeKind.ADDED, base, other);
}

export function createRemoved(
  base: FieldSelector,
  other: FieldSelector
): ChangeEntry {
  return new ChangeEntry(ChangeKind.REMOVED, base, other);
}

export function createModified(
  base: FieldSelector,
  other: FieldSelector
): ChangeEntry {
  return new ChangeEntry(ChangeKind.MODIFIED, base, other);
}

export function createUnchanged(
  base: FieldSelector,
  other: FieldSelector
): ChangeEntry {
  return new ChangeEntry(ChangeKind.UNCHANGED, base, other);
}
