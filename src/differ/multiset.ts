import type { CollectionKey } from '../records/collection';
import { canonicalKey } from './canonical-key';

/**
 * One collection member, as indexed by the multiset.
 */
export type Occurrence<T> = {
  /** Canonical key of the member's identity (or normalized value). */
  readonly key: string;
  /** How many members with the same key were seen before this one. */
  readonly occurrence: number;
  /** The member's key in its original collection. */
  readonly collectionKey: CollectionKey;
  /** The original member, as stored in the collection. */
  readonly item: T;
};

/**
 * Ordered, occurrence-counted multiset.
 *
 * Members are grouped by the canonical key of their identity; each group keeps
 * its members in insertion order, so the n-th member sharing an identity on
 * one side is matched with the n-th member sharing it on the other side.
 * Duplicates are never collapsed.
 *
 * @template T - The member type.
 */
export class OccurrenceMultiset<T> {
  private readonly groups = new Map<string, Occurrence<T>[]>();
  private readonly ordered: Occurrence<T>[] = [];

  /**
   * Indexes a member under `identity`.
   *
   * @returns The recorded occurrence.
   */
  add(identity: unknown, collectionKey: CollectionKey, item: T): Occurrence<T> {
    const key = canonicalKey(identity);
    let group = this.groups.get(key);
    if (!group) {
      group = [];
      this.groups.set(key, group);
    }
    const entry: Occurrence<T> = {
      key,
      occurrence: group.length,
      collectionKey,
      item
    };
    group.push(entry);
    this.ordered.push(entry);
    return entry;
  }

  get size(): number {
    return this.ordered.length;
  }

  /**
   * Looks up the member stored for `(key, occurrence)`.
   */
  find(key: string, occurrence: number): Occurrence<T> | undefined {
    return this.groups.get(key)?.[occurrence];
  }

  has(entry: Pick<Occurrence<unknown>, 'key' | 'occurrence'>): boolean {
    return this.find(entry.key, entry.occurrence) !== undefined;
  }

  /**
   * Members absent from `other`, in insertion order.
   */
  difference<U>(other: OccurrenceMultiset<U>): Occurrence<T>[] {
    return this.ordered.filter(entry => !other.has(entry));
  }

  /**
   * Members present on both sides, in this multiset's insertion order,
   * paired with their counterpart.
   */
  intersection<U>(
    other: OccurrenceMultiset<U>
  ): [mine: Occurrence<T>, theirs: Occurrence<U>][] {
    const pairs: [Occurrence<T>, Occurrence<U>][] = [];
    for (const entry of this.ordered) {
      const counterpart = other.find(entry.key, entry.occurrence);
      if (counterpart) pairs.push([entry, counterpart]);
    }
    return pairs;
  }

  [Symbol.iterator](): Iterator<Occurrence<T>> {
    return this.ordered[Symbol.iterator]();
  }
}
