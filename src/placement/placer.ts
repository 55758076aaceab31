import { allocateSlots } from './allocate.js';
import { annealPlacement } from './anneal.js';
import { exactSearch } from './exact.js';
import type { Placement } from './placement.js';
import type { EdgeViolation, PlacementProblem } from './problem.js';
import { connectedNodes, findViolations, placementCost } from './problem.js';

export type PlacementStrategy = 'allocate' | 'exact' | 'heuristic' | 'auto';

export const PlacementStrategies: readonly PlacementStrategy[] = [
  'allocate',
  'exact',
  'heuristic',
  'auto',
];

export interface PlacementOptions {
  strategy?: PlacementStrategy;
  /** Annealing moves per restart. */
  iterations?: number;
  restarts?: number;
  seed?: number;
  /** Exact-search time limit in milliseconds. */
  timeoutMs?: number;
}

export const DEFAULT_PLACEMENT_OPTIONS: Required<PlacementOptions> = {
  strategy: 'auto',
  iterations: 5000,
  restarts: 1,
  seed: 1,
  timeoutMs: 2000,
};

export interface PlacementOutcome {
  placement: Placement;
  cost: number;
  /** Strategy whose result was kept (never `auto`). */
  strategy: Exclude<PlacementStrategy, 'auto'>;
  violations: EdgeViolation[];
  /** Exact search ran out of time. */
  timedOut: boolean;
}

/**
 * Place every node of the problem.
 *
 * - `allocate`: first-seen order, lowest free slot; no search.
 * - `exact`: backtracking for a zero-penalty placement; falls back to allocation on failure.
 * - `heuristic`: simulated annealing from the allocation.
 * - `auto`: exact search, then annealing if it failed; the lower-penalty result wins.
 *
 * Nodes without edges are allocated afterwards into the remaining slots.
 */
export function placeNodes(problem: PlacementProblem, options: PlacementOptions = {}): PlacementOutcome {
  const opts = { ...DEFAULT_PLACEMENT_OPTIONS, ...options };
  const connected = connectedNodes(problem);
  const initial = allocateSlots(connected);

  let chosen = initial;
  let strategy: PlacementOutcome['strategy'] = 'allocate';
  let timedOut = false;

  if (opts.strategy === 'exact' || opts.strategy === 'auto') {
    const exact = exactSearch(problem, initial, { timeoutMs: opts.timeoutMs });
    timedOut = exact.timedOut;
    if (exact.placement) {
      chosen = exact.placement;
      strategy = 'exact';
    }
  }

  const annealWanted =
    opts.strategy === 'heuristic' || (opts.strategy === 'auto' && strategy !== 'exact');
  if (annealWanted) {
    const annealed = annealPlacement(problem, initial, {
      iterations: opts.iterations,
      restarts: opts.restarts,
      seed: opts.seed,
    });
    if (opts.strategy === 'heuristic' || annealed.cost < placementCost(problem, chosen)) {
      chosen = annealed.placement;
      strategy = 'heuristic';
    }
  }

  const placement = allocateSlots(problem.nodes, chosen);
  return {
    placement,
    cost: placementCost(problem, placement),
    strategy,
    violations: findViolations(problem, placement),
    timedOut,
  };
}
