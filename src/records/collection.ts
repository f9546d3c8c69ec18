import type { RecordType } from './record-type';

/**
 * - `list`: ordered, integer keys.
 * - `map`: string keys, insertion-ordered.
 * - `set`: unordered; every member reports the uniform `null` key.
 */
export type CollectionKind = 'list' | 'map' | 'set';

export type CollectionKey = string | number | null;

export type CollectionOptions = {
  /**
   * Display name used in diff summaries (defaults to `List`, `Map` or `Set`).
   */
  name?: string;

  /**
   * Declared record type of the members. Identity extraction uses it to read
   * foreign members by field name when comparing with `duckType`.
   */
  itemType?: RecordType;

  /**
   * Maps a member to the value used for comparison. Never called for
   * absent members.
   */
  compareItemAs?: (item: unknown) => unknown;
};

type Entry<T> = readonly [key: CollectionKey, item: T];

const DEFAULT_NAMES: Record<CollectionKind, string> = {
  list: 'List',
  map: 'Map',
  set: 'Set'
};

/**
 * An identity-bearing collection. Members are reconciled across snapshots by
 * their identity (a record's primary key, or the normalized value), not by
 * their position.
 *
 * @template T - The member type.
 */
export class Collection<T = unknown> implements Iterable<T> {
  readonly kind: CollectionKind;
  readonly name: string;
  readonly itemType: RecordType | undefined;
  readonly compareItemAs: ((item: unknown) => unknown) | undefined;

  private readonly pairs: readonly Entry<T>[];
  private readonly byKey: ReadonlyMap<CollectionKey, T>;

  private constructor(
    kind: CollectionKind,
    pairs: readonly Entry<T>[],
    options: CollectionOptions
  ) {
    this.kind = kind;
    this.pairs = Object.freeze(pairs);
    // Set members share the `null` key and are not addressable.
    this.byKey = kind === 'set' ? new Map() : new Map(pairs);
    this.name = options.name ?? DEFAULT_NAMES[kind];
    this.itemType = options.itemType;
    this.compareItemAs = options.compareItemAs;
  }

  static list<T>(
    items: Iterable<T>,
    options: CollectionOptions = {}
  ): Collection<T> {
    const pairs = [...items].map((item, index): Entry<T> => [index, item]);
    return new Collection('list', pairs, options);
  }

  /**
   * @param entries - `[key, member]` pairs, e.g. `Object.entries(byId)`.
   */
  static map<T>(
    entries: Iterable<readonly [string, T]>,
    options: CollectionOptions = {}
  ): Collection<T> {
    const unique = new Map<string, T>(entries);
    const pairs = [...unique].map(([key, item]): Entry<T> => [key, item]);
    return new Collection('map', pairs, options);
  }

  static set<T>(
    items: Iterable<T>,
    options: CollectionOptions = {}
  ): Collection<T> {
    const pairs = [...new Set(items)].map((item): Entry<T> => [null, item]);
    return new Collection('set', pairs, options);
  }

  get size(): number {
    return this.pairs.length;
  }

  /**
   * Iteration primitive: `[key, member]` pairs in collection order.
   */
  *entries(): IterableIterator<Entry<T>> {
    yield* this.pairs;
  }

  get(key: CollectionKey): T | undefined {
    return this.byKey.get(key);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const [, item] of this.pairs) yield item;
  }
}
