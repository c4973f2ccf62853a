/**
 * Object tree model and the attribute metadata registry.
 *
 * Containers do not describe their own attributes: each container type is
 * declared once in an {@link AttributeRegistry}, and engines walk the
 * registry instead of inspecting objects at runtime.
 */

export interface Container {
  /** Unique within the parent scope. */
  readonly name: string;
  /** Key into the attribute registry. */
  readonly typeName: string;
  readonly children: readonly Container[];
  /**
   * Action delegate bound to the container. When present it owns the
   * action-managed attributes (Caption, Hint, Text) at runtime.
   */
  readonly action?: unknown;
}

export type AttributeKind = 'string' | 'string-list' | 'object' | 'number' | 'boolean';

interface AttributeBase {
  readonly name: string;
  /** Exposed for external inspection. Defaults to true. */
  readonly published?: boolean;
}

export interface StringAttribute<T extends object = object> extends AttributeBase {
  readonly kind: 'string';
  get?(target: T): string;
  set?(target: T, value: string): void;
}

export interface StringListAttribute<T extends object = object> extends AttributeBase {
  readonly kind: 'string-list';
  get?(target: T): readonly string[];
  set?(target: T, value: string[]): void;
}

/** A structured value that is not a Container, such as a title bar or column set. */
export interface ObjectAttribute<T extends object = object> extends AttributeBase {
  readonly kind: 'object';
  /** Registry type describing the nested value. */
  readonly typeName: string;
  get?(target: T): object | undefined;
}

export interface NumberAttribute<T extends object = object> extends AttributeBase {
  readonly kind: 'number';
  get?(target: T): number;
  set?(target: T, value: number): void;
}

export interface BooleanAttribute<T extends object = object> extends AttributeBase {
  readonly kind: 'boolean';
  get?(target: T): boolean;
  set?(target: T, value: boolean): void;
}

export type AttributeDescriptor<T extends object = object> =
  | StringAttribute<T>
  | StringListAttribute<T>
  | ObjectAttribute<T>
  | NumberAttribute<T>
  | BooleanAttribute<T>;

export interface DefineTypeOptions {
  /** Inherit the descriptors of an already registered type. */
  extends?: string;
}

interface TypeEntry {
  parent?: string;
  own: AttributeDescriptor[];
}

export class AttributeRegistry {
  private readonly types = new Map<string, TypeEntry>();

  /**
   * Declares the attributes a type exposes. Redefining a type replaces its
   * own descriptors; inherited ones are resolved at lookup time.
   */
  public define<T extends object>(
    typeName: string,
    descriptors: ReadonlyArray<AttributeDescriptor<T>>,
    options: DefineTypeOptions = {}
  ): this {
    if (options.extends && !this.types.has(options.extends)) {
      throw new Error(`Cannot extend unknown type "${options.extends}" while defining "${typeName}".`);
    }
    this.types.set(typeName, { parent: options.extends, own: [...descriptors] });
    return this;
  }

  public has(typeName: string): boolean {
    return this.types.has(typeName);
  }

  /**
   * Every descriptor of a type, inherited ones first. A redeclared name
   * overrides the inherited descriptor in place. Unknown types have none.
   */
  public describe(typeName: string): AttributeDescriptor[] {
    const chain: TypeEntry[] = [];
    const seen = new Set<string>();
    let current: string | undefined = typeName;
    while (current && !seen.has(current)) {
      seen.add(current);
      const entry = this.types.get(current);
      if (!entry) {
        break;
      }
      chain.unshift(entry);
      current = entry.parent;
    }

    const merged = new Map<string, AttributeDescriptor>();
    for (const entry of chain) {
      for (const descriptor of entry.own) {
        merged.set(descriptor.name, descriptor);
      }
    }
    return Array.from(merged.values());
  }

  public find(typeName: string, attributeName: string): AttributeDescriptor | undefined {
    return this.describe(typeName).find((descriptor) => descriptor.name === attributeName);
  }

  public typeNames(): string[] {
    return Array.from(this.types.keys());
  }
}

export const defaultAttributeRegistry = new AttributeRegistry();

// ─────────────────────────────────────────────────────────────────────────────
// Tree helpers
// ─────────────────────────────────────────────────────────────────────────────

export const QUALIFIED_NAME_SEPARATOR = '.';

export function findChild(container: Container, name: string): Container | undefined {
  const wanted = name.toLowerCase();
  return container.children.find((child) => child.name.toLowerCase() === wanted);
}

/**
 * Depth-first search below `container` for the first descendant called `name`.
 */
export function findDescendant(container: Container, name: string): Container | undefined {
  for (const child of container.children) {
    if (child.name.toLowerCase() === name.toLowerCase()) {
      return child;
    }
    const nested = findDescendant(child, name);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Resolves a dotted qualified name against `root`.
 *
 * A leading segment equal to the root's own name is consumed, then every
 * segment is looked up among the children of the previous match. When a
 * segment cannot be found the whole tree is searched for the last segment
 * instead, so values survive a renamed ancestor. If several containers share
 * that leaf name the first one found wins, which can bind a value to the
 * wrong container.
 */
export function resolveQualifiedName(root: Container, qualifiedName: string): Container | undefined {
  const segments = qualifiedName.split(QUALIFIED_NAME_SEPARATOR).filter((segment) => segment.length > 0);
  if (!segments.length) {
    return undefined;
  }

  const path = segments[0].toLowerCase() === root.name.toLowerCase() ? segments.slice(1) : segments;
  let current: Container | undefined = root;
  for (const segment of path) {
    current = findChild(current, segment);
    if (!current) {
      return findDescendant(root, segments[segments.length - 1]);
    }
  }
  return current;
}

export function joinQualifiedName(parent: string, name: string): string {
  return parent ? `${parent}${QUALIFIED_NAME_SEPARATOR}${name}` : name;
}

/**
 * Visits `root` and its descendants depth-first, parents before children,
 * with each container's qualified name. Returning `false` from the visitor
 * skips the subtree.
 */
export function walkContainers(
  root: Container,
  visitor: (container: Container, qualifiedName: string) => boolean | void
): void {
  const visit = (container: Container, parentName: string) => {
    if (!container.name) {
      return;
    }
    const qualifiedName = joinQualifiedName(parentName, container.name);
    if (visitor(container, qualifiedName) === false) {
      return;
    }
    for (const child of container.children) {
      visit(child, qualifiedName);
    }
  };
  visit(root, '');
}

/**
 * Qualified-name lookup over the containers of one tree that pass `include`.
 * Containers rejected by `include` are left out together with their subtree.
 */
export class ContainerIndex {
  private readonly byName = new Map<string, Container>();
  private readonly members = new Set<Container>();

  constructor(
    private readonly root: Container,
    include: (container: Container) => boolean = () => true
  ) {
    walkContainers(root, (container, qualifiedName) => {
      if (!include(container)) {
        return false;
      }
      this.byName.set(qualifiedName.toLowerCase(), container);
      this.members.add(container);
      return true;
    });
  }

  public has(container: Container): boolean {
    return this.members.has(container);
  }

  public resolve(qualifiedName: string): Container | undefined {
    const direct = this.byName.get(qualifiedName.toLowerCase());
    if (direct) {
      return direct;
    }
    const resolved = resolveQualifiedName(this.root, qualifiedName);
    return resolved && this.members.has(resolved) ? resolved : undefined;
  }

  public get size(): number {
    return this.members.size;
  }
}
