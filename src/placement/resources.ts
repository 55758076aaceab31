/**
 * Physical resource classes of the accelerator and their slot pools.
 */
export const ResourceClasses = ['loop', 'row', 'col', 'pe', 'read', 'write'] as const;

export type ResourceClass = (typeof ResourceClasses)[number];

/**
 * A physical slot. `resourceClass` is `undefined` for placeholder slots given to nodes that
 * belong to no pool (their index is the node's creation order).
 */
export interface PhysicalSlot {
  resourceClass: ResourceClass | undefined;
  index: number;
  name: string;
}

const POOL_PREFIX: Record<ResourceClass, string> = {
  loop: 'LC',
  row: 'ROW_LC',
  col: 'COL_LC',
  pe: 'PE',
  read: 'RD_STREAM',
  write: 'WR_STREAM',
};

const POOL_SIZE: Record<ResourceClass, number> = {
  loop: 8,
  row: 4,
  col: 4,
  pe: 8,
  read: 3,
  write: 1,
};

export function poolSize(resourceClass: ResourceClass): number {
  return POOL_SIZE[resourceClass];
}

export function slotAt(resourceClass: ResourceClass, index: number): PhysicalSlot {
  if (!Number.isInteger(index) || index < 0 || index >= POOL_SIZE[resourceClass]) {
    throw new RangeError(`Slot ${index} is outside the ${resourceClass} pool`);
  }
  return { resourceClass, index, name: `${POOL_PREFIX[resourceClass]}${index}` };
}

export function placeholderSlot(ordinal: number): PhysicalSlot {
  return { resourceClass: undefined, index: ordinal, name: `NODE${ordinal}` };
}

/**
 * Raised when a class has more logical nodes than physical slots.
 */
export class PoolExhaustedError extends Error {
  readonly resourceClass: ResourceClass;
  readonly requested: number;

  constructor(resourceClass: ResourceClass, requested: number) {
    super(
      `Resource pool "${resourceClass}" exhausted: ${requested} nodes requested, ${POOL_SIZE[resourceClass]} slots available`,
    );
    this.name = 'PoolExhaustedError';
    this.resourceClass = resourceClass;
    this.requested = requested;
  }
}
