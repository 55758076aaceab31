import type { ResourceClass } from '../placement/resources.js';

/**
 * Compile-time name for a configurable unit.
 *
 * Nodes carry no physical position; the session maps them to slots once placement is frozen.
 * An alias node (one with a `parent`) always shares its parent's slot.
 */
export interface LogicalNode {
  readonly name: string;
  readonly resourceClass: ResourceClass | undefined;
  readonly parent: LogicalNode | undefined;
  /** Creation-order index within the session. */
  readonly ordinal: number;
  /** False for names that were only ever referenced, never declared by a module. */
  readonly declared: boolean;
}

/**
 * A reference-typed field value: "the node named by this field, as seen from `referrer`".
 *
 * `source` is `undefined` when the field held no name; such a reference encodes as index 0.
 */
export interface NodeReference {
  readonly kind: 'ref';
  readonly source: LogicalNode | undefined;
  readonly referrer: LogicalNode;
}

export class SymbolConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SymbolConflictError';
  }
}

/** Per-session table of logical nodes, unique by name, kept in creation order. */
export class SymbolTable {
  private readonly nodes = new Map<string, LogicalNode>();

  get size(): number {
    return this.nodes.size;
  }

  get(name: string): LogicalNode | undefined {
    return this.nodes.get(name);
  }

  /**
   * Declare a node. Re-declaring with the same class and parent returns the existing node.
   */
  declare(name: string, resourceClass?: ResourceClass, parent?: LogicalNode): LogicalNode {
    const existing = this.nodes.get(name);
    if (existing) {
      if (!existing.declared) {
        throw new SymbolConflictError(`Node "${name}" was referenced before it was declared`);
      }
      if (existing.resourceClass !== resourceClass || existing.parent !== parent) {
        throw new SymbolConflictError(
          `Node "${name}" is already declared as ${existing.resourceClass ?? 'unclassified'}`,
        );
      }
      return existing;
    }
    return this.create(name, resourceClass, parent, true);
  }

  /** Look up a node by name, creating an undeclared, unclassified node when it is new. */
  reference(name: string): LogicalNode {
    return this.nodes.get(name) ?? this.create(name, undefined, undefined, false);
  }

  all(): LogicalNode[] {
    return [...this.nodes.values()];
  }

  private create(
    name: string,
    resourceClass: ResourceClass | undefined,
    parent: LogicalNode | undefined,
    declared: boolean,
  ): LogicalNode {
    const node: LogicalNode = { name, resourceClass, parent, ordinal: this.nodes.size, declared };
    this.nodes.set(name, node);
    return node;
  }
}

/** Follow alias links to the node that owns the slot. */
export function rootNode(node: LogicalNode): LogicalNode {
  let current = node;
  while (current.parent) current = current.parent;
  return current;
}
