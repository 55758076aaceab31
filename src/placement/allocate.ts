import { Placement } from './placement.js';
import type { PlacementNode } from './problem.js';
import { PoolExhaustedError, poolSize, slotAt } from './resources.js';

/**
 * Give every not-yet-placed node the lowest free slot of its class, in the order given.
 *
 * Throws PoolExhaustedError when a class runs out of slots.
 */
export function allocateSlots(nodes: readonly PlacementNode[], start: Placement = Placement.empty()): Placement {
  let placement = start;
  for (const node of nodes) {
    if (placement.has(node.name)) continue;
    const size = poolSize(node.resourceClass);
    let index = 0;
    while (index < size && placement.occupant(node.resourceClass, index) !== undefined) index++;
    if (index === size) {
      const requested = nodes.filter((n) => n.resourceClass === node.resourceClass).length;
      throw new PoolExhaustedError(node.resourceClass, requested);
    }
    placement = placement.assign(node.name, slotAt(node.resourceClass, index));
  }
  return placement;
}
