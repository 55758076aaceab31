import { Placement } from './placement.js';
import type { PlacementEdge, PlacementNode, PlacementProblem } from './problem.js';
import { connectedNodes, incidentEdges } from './problem.js';
import { poolSize, slotAt } from './resources.js';
import { isAdmissible } from './rules.js';

export interface ExactSearchOptions {
  timeoutMs: number;
  /** Clock used for the timeout; defaults to `performance.now`. */
  now?: () => number;
}

export interface ExactSearchResult {
  /** A zero-penalty placement of every connected node, when one was found. */
  placement: Placement | undefined;
  timedOut: boolean;
  /** Number of partial assignments tried. */
  visited: number;
}

/**
 * Backtracking search for a placement in which every edge is admissible.
 *
 * Only nodes incident on an edge take part. Nodes are tried most-connected first; each node
 * tries its slot in `hint` first and then the remaining slots of its pool in order. A candidate
 * is kept only if every edge to an already-placed neighbour is admissible, so any complete
 * assignment has zero penalty.
 */
export function exactSearch(
  problem: PlacementProblem,
  hint: Placement,
  options: ExactSearchOptions,
): ExactSearchResult {
  const now = options.now ?? (() => performance.now());
  const startTime = now();
  const incident = incidentEdges(problem);
  const order = [...connectedNodes(problem)].sort(
    (a, b) => (incident.get(b.name)?.length ?? 0) - (incident.get(a.name)?.length ?? 0),
  );
  let timedOut = false;
  let visited = 0;

  const candidates = (node: PlacementNode): number[] => {
    const all = Array.from({ length: poolSize(node.resourceClass) }, (_, i) => i);
    const cached = hint.get(node.name);
    if (!cached) return all;
    return [cached.index, ...all.filter((i) => i !== cached.index)];
  };

  const consistent = (node: PlacementNode, index: number, placement: Placement): boolean => {
    for (const edge of incident.get(node.name) ?? []) {
      if (!edgeHolds(edge, node.name, index, placement)) return false;
    }
    return true;
  };

  const search = (depth: number, placement: Placement): Placement | undefined => {
    if (now() - startTime > options.timeoutMs) {
      timedOut = true;
      return undefined;
    }
    if (depth === order.length) return placement;
    const node = order[depth]!;
    for (const index of candidates(node)) {
      if (placement.occupant(node.resourceClass, index) !== undefined) continue;
      if (!consistent(node, index, placement)) continue;
      visited++;
      const found = search(depth + 1, placement.assign(node.name, slotAt(node.resourceClass, index)));
      if (found) return found;
      if (timedOut) return undefined;
    }
    return undefined;
  };

  const placement = search(0, Placement.empty());
  return { placement, timedOut, visited };
}

function edgeHolds(edge: PlacementEdge, node: string, index: number, placement: Placement): boolean {
  if (edge.source === node && edge.destination === node) {
    return isAdmissible(edge.rule, index, index);
  }
  if (edge.source === node) {
    const d = placement.get(edge.destination);
    return !d || isAdmissible(edge.rule, index, d.index);
  }
  const s = placement.get(edge.source);
  return !s || isAdmissible(edge.rule, s.index, index);
}
