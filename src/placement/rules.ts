import type { ResourceClass } from './resources.js';

/**
 * Adjacency rule for one (source class, destination class) pair.
 *
 * `window(d)` lists the source positions admissible for destination position `d`, in the order
 * their relative indices are assigned; the relative index of source position `s` is
 * `base + window(d).indexOf(s)`. Positions may fall outside the pool; they are then unreachable.
 */
export interface AdjacencyRule {
  source: ResourceClass;
  destination: ResourceClass;
  base: number;
  window: (destination: number) => readonly number[];
}

function range(start: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i);
}

const neighbours = (d: number): number[] => [d - 2, d - 1, d + 1, d + 2];
const streamWindow = (d: number): number[] => range(2 * (d - 1), 6);

const RULES: readonly AdjacencyRule[] = [
  { source: 'loop', destination: 'loop', base: 0, window: neighbours },
  { source: 'loop', destination: 'row', base: 0, window: streamWindow },
  { source: 'loop', destination: 'col', base: 0, window: streamWindow },
  { source: 'row', destination: 'col', base: 6, window: (d) => [d] },
  { source: 'loop', destination: 'pe', base: 0, window: (d) => [d - 1, d, d + 1] },
  { source: 'pe', destination: 'pe', base: 3, window: neighbours },
  { source: 'col', destination: 'pe', base: 7, window: (d) => [Math.floor(d / 2)] },
  { source: 'loop', destination: 'read', base: 0, window: streamWindow },
  { source: 'loop', destination: 'write', base: 0, window: streamWindow },
  { source: 'pe', destination: 'read', base: 6, window: streamWindow },
  { source: 'pe', destination: 'write', base: 6, window: streamWindow },
];

export function findRule(
  source: ResourceClass | undefined,
  destination: ResourceClass | undefined,
): AdjacencyRule | undefined {
  if (source === undefined || destination === undefined) return undefined;
  return RULES.find((r) => r.source === source && r.destination === destination);
}

export function isAdmissible(rule: AdjacencyRule, source: number, destination: number): boolean {
  return rule.window(destination).includes(source);
}

/**
 * Placement penalty for an edge: 0 when admissible, otherwise the distance from the source
 * position to the nearest admissible position.
 */
export function edgePenalty(rule: AdjacencyRule, source: number, destination: number): number {
  const admissible = rule.window(destination);
  let best = Number.POSITIVE_INFINITY;
  for (const p of admissible) best = Math.min(best, Math.abs(source - p));
  return best;
}

/**
 * Relative index of `source` as seen from `destination`, or `undefined` outside the window.
 */
export function ruleRelativeIndex(
  rule: AdjacencyRule,
  source: number,
  destination: number,
): number | undefined {
  const offset = rule.window(destination).indexOf(source);
  return offset < 0 ? undefined : rule.base + offset;
}
