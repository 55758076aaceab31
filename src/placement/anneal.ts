import type { Placement } from './placement.js';
import type { PlacementEdge, PlacementNode, PlacementProblem } from './problem.js';
import { connectedNodes, edgeCost, incidentEdges, placementCost } from './problem.js';
import type { Random } from './random.js';
import { mulberry32, pick, randomInt } from './random.js';
import { poolSize, slotAt } from './resources.js';

export interface AnnealOptions {
  iterations: number;
  restarts: number;
  seed: number;
  initialTemperature?: number;
  finalTemperature?: number;
}

export interface AnnealResult {
  placement: Placement;
  cost: number;
  /** Moves evaluated across all restarts. */
  iterations: number;
}

type Move =
  | { kind: 'relocate'; node: PlacementNode; index: number }
  | { kind: 'swap'; a: string; b: string };

/**
 * Simulated annealing over the connected nodes, starting from `initial`.
 *
 * Each step proposes one of: relocating a node to a free slot of its class, swapping two
 * same-class nodes, or repairing the worst edge by moving its costlier endpoint to the slot
 * that lowers total penalty most. Worse proposals are accepted with probability
 * `exp(-delta / T)`; the temperature decays geometrically to `finalTemperature`. The best
 * placement seen is returned, and the search stops early at zero penalty.
 */
export function annealPlacement(
  problem: PlacementProblem,
  initial: Placement,
  options: AnnealOptions,
): AnnealResult {
  const movable = connectedNodes(problem);
  const incident = incidentEdges(problem);
  const t0 = options.initialTemperature ?? 4;
  const tEnd = options.finalTemperature ?? 0.01;
  const steps = Math.max(1, options.iterations);
  const alpha = Math.pow(tEnd / t0, 1 / steps);

  let best = initial;
  let bestCost = placementCost(problem, initial);
  let evaluated = 0;

  for (let restart = 0; restart < Math.max(1, options.restarts) && bestCost > 0; restart++) {
    const rng = mulberry32(options.seed + restart * 0x9e3779b9);
    let current = initial;
    let currentCost = placementCost(problem, current);
    let temp = t0;

    for (let step = 0; step < steps && bestCost > 0; step++, temp *= alpha) {
      evaluated++;
      const move = proposeMove(problem, movable, incident, current, rng);
      if (!move) continue;
      const next = applyMove(current, move);
      const nextCost = placementCost(problem, next);
      const delta = nextCost - currentCost;
      if (delta <= 0 || rng() < Math.exp(-delta / Math.max(temp, 0.001))) {
        current = next;
        currentCost = nextCost;
        if (currentCost < bestCost) {
          best = current;
          bestCost = currentCost;
        }
      }
    }
  }

  return { placement: best, cost: bestCost, iterations: evaluated };
}

function applyMove(placement: Placement, move: Move): Placement {
  if (move.kind === 'swap') return placement.swap(move.a, move.b);
  return placement.assign(move.node.name, slotAt(move.node.resourceClass, move.index));
}

function freeSlots(node: PlacementNode, placement: Placement): number[] {
  const out: number[] = [];
  for (let i = 0; i < poolSize(node.resourceClass); i++) {
    if (placement.occupant(node.resourceClass, i) === undefined) out.push(i);
  }
  return out;
}

function proposeMove(
  problem: PlacementProblem,
  movable: readonly PlacementNode[],
  incident: Map<string, PlacementEdge[]>,
  placement: Placement,
  rng: Random,
): Move | undefined {
  const r = rng();
  if (r < 0.4) {
    const node = pick(movable, rng);
    if (!node) return undefined;
    const index = pick(freeSlots(node, placement), rng);
    return index === undefined ? undefined : { kind: 'relocate', node, index };
  }
  if (r < 0.8) {
    const node = pick(movable, rng);
    if (!node) return undefined;
    const partners = movable.filter(
      (n) => n.resourceClass === node.resourceClass && n.name !== node.name,
    );
    const other = pick(partners, rng);
    return other ? { kind: 'swap', a: node.name, b: other.name } : undefined;
  }
  return repairMove(problem, movable, incident, placement, rng);
}

/** Targeted move for the worst edge: try every slot for its costlier endpoint. */
function repairMove(
  problem: PlacementProblem,
  movable: readonly PlacementNode[],
  incident: Map<string, PlacementEdge[]>,
  placement: Placement,
  rng: Random,
): Move | undefined {
  let worst: PlacementEdge | undefined;
  let worstCost = 0;
  for (const edge of problem.edges) {
    const c = edgeCost(edge, placement);
    if (c > worstCost) {
      worst = edge;
      worstCost = c;
    }
  }
  if (!worst) return undefined;

  const localCost = (name: string): number =>
    (incident.get(name) ?? []).reduce((sum, e) => sum + edgeCost(e, placement), 0);
  const sourceCost = localCost(worst.source);
  const destinationCost = localCost(worst.destination);
  const name =
    sourceCost === destinationCost
      ? randomInt(rng, 2) === 0
        ? worst.source
        : worst.destination
      : sourceCost > destinationCost
        ? worst.source
        : worst.destination;
  const node = movable.find((n) => n.name === name);
  if (!node) return undefined;
  const here = placement.get(node.name);

  let bestMove: Move | undefined;
  let bestCost = Number.POSITIVE_INFINITY;
  for (let index = 0; index < poolSize(node.resourceClass); index++) {
    if (here && here.index === index) continue;
    const holder = placement.occupant(node.resourceClass, index);
    const move: Move =
      holder === undefined ? { kind: 'relocate', node, index } : { kind: 'swap', a: node.name, b: holder };
    const cost = placementCost(problem, applyMove(placement, move));
    if (cost < bestCost) {
      bestCost = cost;
      bestMove = move;
    }
  }
  return bestMove;
}
