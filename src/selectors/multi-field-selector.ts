import { FieldSelector, type PathComponent } from './field-selector';

/**
 * Wildcard component: matches every key of a collection when a
 * {@link MultiFieldSelector} restricts into it.
 */
export const ANY_KEY: unique symbol = Symbol('record-delta.any-key');

export type FilterComponent = PathComponent | typeof ANY_KEY;

/**
 * One declared path of a filter, e.g. `['people', ANY_KEY, 'name']`.
 */
export type PathSpec = readonly FilterComponent[];

type FilterNode = {
  /**
   * The whole subtree below this node is selected.
   */
  all: boolean;
  children: Map<FilterComponent, FilterNode>;
};

function createNode(all = false): FilterNode {
  return { all, children: new Map() };
}

function addPath(root: FilterNode, spec: PathSpec): void {
  let node = root;
  for (const component of spec) {
    if (node.all) return;
    let child = node.children.get(component);
    if (!child) {
      child = createNode();
      node.children.set(component, child);
    }
    node = child;
  }
  node.all = true;
  node.children.clear();
}

/**
 * Merges `source` into `target` in place. A selected-all node absorbs
 * everything merged into it.
 */
function mergeInto(target: FilterNode, source: FilterNode): void {
  if (target.all) return;
  if (source.all) {
    target.all = true;
    target.children.clear();
    return;
  }
  for (const [component, child] of source.children) {
    let existing = target.children.get(component);
    if (!existing) {
      existing = createNode();
      target.children.set(component, existing);
    }
    mergeInto(existing, child);
  }
}

function matches(
  node: FilterNode,
  components: readonly PathComponent[],
  index: number
): boolean {
  if (node.all) return true;

  // Ancestors of a selected location stay visible so traversal can reach it.
  if (index === components.length) return true;

  const exact = node.children.get(components[index]);
  if (exact && matches(exact, components, index + 1)) return true;

  const wildcard = node.children.get(ANY_KEY);
  return !!wildcard && matches(wildcard, components, index + 1);
}

function collectPaths(
  node: FilterNode,
  prefix: FilterComponent[],
  out: FilterComponent[][]
): void {
  if (node.all) {
    out.push(prefix);
    return;
  }
  for (const [component, child] of node.children) {
    collectPaths(child, [...prefix, component], out);
  }
}

/**
 * A subset tree over record paths, used to restrict a comparison to some
 * fields.
 *
 * Semantics of {@link MultiFieldSelector.includes}:
 * - a declared path is included, and so is everything below it;
 * - every ancestor of a declared path is included (the traversal must be able
 *   to walk down to it);
 * - anything else is filtered out.
 *
 * Example:
 * ```ts
 * const filter = MultiFieldSelector.from([['name'], ['tags', ANY_KEY]]);
 * filter.includes(FieldSelector.of('tags', 3)); // true
 * filter.includes(FieldSelector.of('age'));     // false
 * ```
 */
export class MultiFieldSelector {
  private readonly root: FilterNode;

  private constructor(root: FilterNode) {
    this.root = root;
  }

  static from(
    paths: Iterable<PathSpec | FieldSelector>
  ): MultiFieldSelector {
    const root = createNode();
    for (const path of paths) {
      addPath(root, path instanceof FieldSelector ? path.components : path);
    }
    return new MultiFieldSelector(root);
  }

  /** Selects every path. */
  static all(): MultiFieldSelector {
    return new MultiFieldSelector(createNode(true));
  }

  /** Selects nothing but the root itself. */
  static none(): MultiFieldSelector {
    return new MultiFieldSelector(createNode());
  }

  get isEmpty(): boolean {
    return !this.root.all && this.root.children.size === 0;
  }

  get selectsAll(): boolean {
    return this.root.all;
  }

  includes(selector: FieldSelector | readonly PathComponent[]): boolean {
    const components =
      selector instanceof FieldSelector ? selector.components : selector;
    return matches(this.root, components, 0);
  }

  /**
   * The sub-filter rooted at `selector`, combining exact and wildcard
   * branches. Paths that leave the tree yield an empty filter.
   */
  at(selector: FieldSelector | readonly PathComponent[]): MultiFieldSelector {
    const components =
      selector instanceof FieldSelector ? selector.components : selector;

    let frontier: FilterNode[] = [this.root];
    for (const component of components) {
      const next: FilterNode[] = [];
      for (const node of frontier) {
        if (node.all) return MultiFieldSelector.all();
        const exact = node.children.get(component);
        if (exact) next.push(exact);
        const wildcard = node.children.get(ANY_KEY);
        if (wildcard) next.push(wildcard);
      }
      frontier = next;
    }

    const merged = createNode();
    for (const node of frontier) mergeInto(merged, node);
    return new MultiFieldSelector(merged);
  }

  /**
   * The sub-filter that applies to any member of the collection at this
   * level, whatever its key.
   */
  atAnyKey(): MultiFieldSelector {
    if (this.root.all) return MultiFieldSelector.all();

    const merged = createNode();
    for (const child of this.root.children.values()) mergeInto(merged, child);
    return new MultiFieldSelector(merged);
  }

  /** The declared paths, after absorption of covered sub-paths. */
  paths(): FilterComponent[][] {
    const out: FilterComponent[][] = [];
    collectPaths(this.root, [], out);
    return out;
  }
}
