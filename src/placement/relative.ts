import type { PhysicalSlot } from './resources.js';
import { findRule, ruleRelativeIndex } from './rules.js';

export interface RelativeResolution {
  /** Encoded index; 0 when the source lies outside the window. */
  index: number;
  inWindow: boolean;
}

/**
 * Relative index of `source` as addressed from `destination`.
 *
 * Throws when the class pair has no addressing rule: that is a catalog or validation bug,
 * not a configuration problem.
 */
export function resolveRelativeIndex(source: PhysicalSlot, destination: PhysicalSlot): RelativeResolution {
  const rule = findRule(source.resourceClass, destination.resourceClass);
  if (!rule) {
    throw new Error(
      `No relative-addressing rule from ${source.resourceClass ?? 'unclassified'} to ${destination.resourceClass ?? 'unclassified'}`,
    );
  }
  const index = ruleRelativeIndex(rule, source.index, destination.index);
  return index === undefined ? { index: 0, inWindow: false } : { index, inWindow: true };
}
