import { toChangeKind, ChangeKind, type ChangeEntry } from './change-entry';

/**
 * Eager, read-only result of {@link diff}: the change entries in emission
 * order, tagged with the type names of the two operands.
 */
export class Diff implements Iterable<ChangeEntry> {
  readonly entries: readonly ChangeEntry[];
  readonly baseTypeName: string;
  readonly otherTypeName: string;

  constructor(
    entries: Iterable<ChangeEntry>,
    baseTypeName: string,
    otherTypeName: string
  ) {
    this.entries = Object.freeze([...entries]);
    this.baseTypeName = baseTypeName;
    this.otherTypeName = otherTypeName;
    Object.freeze(this);
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * `true` when at least one entry is not `UNCHANGED`.
   */
  get hasChanges(): boolean {
    return this.entries.some(entry => entry.kind !== ChangeKind.UNCHANGED);
  }

  /**
   * Entries of one kind, given as a kind, index, token or display name.
   */
  filter(kind: ChangeKind | number | string): ChangeEntry[] {
    const wanted = toChangeKind(kind);
    return this.entries.filter(entry => entry.kind === wanted);
  }

  /**
   * One-line description, e.g. `Person vs Employee: 2 item(s)`. The type name
   * is given once when both operands share it.
   */
  summary(): string {
    const names =
      this.baseTypeName === this.otherTypeName
        ? this.baseTypeName
        : `${this.baseTypeName} vs ${this.otherTypeName}`;
    return `${names}: ${this.length} item(s)`;
  }

  [Symbol.iterator](): Iterator<ChangeEntry> {
    return this.entries[Symbol.iterator]();
  }

  toString(): string {
    return `<Diff [${this.summary()}]>`;
  }
}
