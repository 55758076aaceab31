import type { PhysicalSlot, ResourceClass } from './resources.js';

/**
 * Immutable node-name → slot assignment.
 *
 * Every update returns a new Placement, so search code can branch and backtrack freely.
 */
export class Placement {
  private readonly byNode: ReadonlyMap<string, PhysicalSlot>;
  private readonly bySlot: ReadonlyMap<string, string>;

  private constructor(byNode: ReadonlyMap<string, PhysicalSlot>, bySlot: ReadonlyMap<string, string>) {
    this.byNode = byNode;
    this.bySlot = bySlot;
  }

  static empty(): Placement {
    return new Placement(new Map(), new Map());
  }

  get size(): number {
    return this.byNode.size;
  }

  get(node: string): PhysicalSlot | undefined {
    return this.byNode.get(node);
  }

  has(node: string): boolean {
    return this.byNode.has(node);
  }

  /** Node currently holding the slot, if any. */
  occupant(resourceClass: ResourceClass, index: number): string | undefined {
    return this.bySlot.get(slotKey(resourceClass, index));
  }

  assign(node: string, slot: PhysicalSlot): Placement {
    const byNode = new Map(this.byNode);
    const bySlot = new Map(this.bySlot);
    const previous = byNode.get(node);
    if (previous) bySlot.delete(slotKey(previous.resourceClass, previous.index));
    const key = slotKey(slot.resourceClass, slot.index);
    const holder = bySlot.get(key);
    if (holder !== undefined && holder !== node) {
      throw new Error(`Slot ${slot.name} is already held by "${holder}"`);
    }
    byNode.set(node, slot);
    bySlot.set(key, node);
    return new Placement(byNode, bySlot);
  }

  /** Exchange the slots of two placed nodes. */
  swap(a: string, b: string): Placement {
    const slotA = this.byNode.get(a);
    const slotB = this.byNode.get(b);
    if (!slotA || !slotB) throw new Error(`Cannot swap unplaced nodes "${a}" and "${b}"`);
    const byNode = new Map(this.byNode);
    const bySlot = new Map(this.bySlot);
    byNode.set(a, slotB);
    byNode.set(b, slotA);
    bySlot.set(slotKey(slotB.resourceClass, slotB.index), a);
    bySlot.set(slotKey(slotA.resourceClass, slotA.index), b);
    return new Placement(byNode, bySlot);
  }

  entries(): Array<[string, PhysicalSlot]> {
    return [...this.byNode.entries()];
  }
}

function slotKey(resourceClass: ResourceClass | undefined, index: number): string {
  return `${resourceClass ?? '-'}:${index}`;
}
