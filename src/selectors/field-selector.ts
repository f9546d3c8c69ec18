/**
 * A single step in a {@link FieldSelector}.
 *
 * - `string`: a record field name or a mapping key.
 * - `number`: a sequence index.
 * - `null`: the uniform key of an unordered set member.
 */
export type PathComponent = string | number | null;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function renderComponent(component: PathComponent): string {
  if (component === null) return '[*]';
  if (typeof component === 'number') return `[${component}]`;
  return IDENTIFIER.test(component)
    ? `.${component}`
    : `[${JSON.stringify(component)}]`;
}

/**
 * Immutable, ordered path addressing a location inside a record tree
 * (e.g. `.people[2].name`).
 *
 * Every operation returns a new selector; instances are frozen so that change
 * entries can share them safely.
 */
export class FieldSelector implements Iterable<PathComponent> {
  static readonly root = new FieldSelector([]);

  readonly components: readonly PathComponent[];

  private constructor(components: readonly PathComponent[]) {
    this.components = Object.freeze([...components]);
    Object.freeze(this);
  }

  static of(...components: PathComponent[]): FieldSelector {
    return components.length === 0
      ? FieldSelector.root
      : new FieldSelector(components);
  }

  static from(
    path: FieldSelector | Iterable<PathComponent>
  ): FieldSelector {
    return path instanceof FieldSelector ? path : new FieldSelector([...path]);
  }

  get length(): number {
    return this.components.length;
  }

  extend(...components: PathComponent[]): FieldSelector {
    if (components.length === 0) return this;
    return new FieldSelector([...this.components, ...components]);
  }

  concat(other: FieldSelector | Iterable<PathComponent>): FieldSelector {
    const tail = FieldSelector.from(other);
    if (tail.length === 0) return this;
    return new FieldSelector([...this.components, ...tail.components]);
  }

  /**
   * `true` when `prefix` addresses this location or one of its ancestors.
   */
  startsWith(prefix: FieldSelector | Iterable<PathComponent>): boolean {
    const head = FieldSelector.from(prefix);
    if (head.length > this.length) return false;
    return head.components.every((component, index) =>
      Object.is(component, this.components[index])
    );
  }

  equals(other: FieldSelector): boolean {
    return other.length === this.length && this.startsWith(other);
  }

  /** Dotted rendering, e.g. `.tags[1]`; the root renders as an empty string. */
  get path(): string {
    return this.components.map(renderComponent).join('');
  }

  [Symbol.iterator](): Iterator<PathComponent> {
    return this.components[Symbol.iterator]();
  }

  toString(): string {
    return `<FieldSelector: ${this.path || '(root)'}>`;
  }
}
