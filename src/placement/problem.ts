import type { Placement } from './placement.js';
import type { ResourceClass } from './resources.js';
import type { AdjacencyRule } from './rules.js';
import { edgePenalty } from './rules.js';

export interface PlacementNode {
  name: string;
  resourceClass: ResourceClass;
}

export interface PlacementEdge {
  source: string;
  destination: string;
  rule: AdjacencyRule;
}

/**
 * Input to every placement strategy: the placeable nodes (first-seen order) and the
 * de-duplicated edges between them.
 */
export interface PlacementProblem {
  nodes: readonly PlacementNode[];
  edges: readonly PlacementEdge[];
}

export interface EdgeViolation {
  edge: PlacementEdge;
  penalty: number;
}

/** Penalty of one edge; 0 while either endpoint is unplaced. */
export function edgeCost(edge: PlacementEdge, placement: Placement): number {
  const s = placement.get(edge.source);
  const d = placement.get(edge.destination);
  if (!s || !d) return 0;
  return edgePenalty(edge.rule, s.index, d.index);
}

export function placementCost(problem: PlacementProblem, placement: Placement): number {
  let total = 0;
  for (const edge of problem.edges) total += edgeCost(edge, placement);
  return total;
}

export function findViolations(problem: PlacementProblem, placement: Placement): EdgeViolation[] {
  const out: EdgeViolation[] = [];
  for (const edge of problem.edges) {
    const penalty = edgeCost(edge, placement);
    if (penalty > 0) out.push({ edge, penalty });
  }
  return out;
}

/** Nodes touched by at least one edge, in problem order. */
export function connectedNodes(problem: PlacementProblem): PlacementNode[] {
  const touched = new Set<string>();
  for (const e of problem.edges) {
    touched.add(e.source);
    touched.add(e.destination);
  }
  return problem.nodes.filter((n) => touched.has(n.name));
}

/** Edges incident on each node. */
export function incidentEdges(problem: PlacementProblem): Map<string, PlacementEdge[]> {
  const map = new Map<string, PlacementEdge[]>();
  for (const n of problem.nodes) map.set(n.name, []);
  for (const e of problem.edges) {
    map.get(e.source)?.push(e);
    if (e.destination !== e.source) map.get(e.destination)?.push(e);
  }
  return map;
}
