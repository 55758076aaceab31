import type { ConnectionReport, PlacedNodeReport, PlacementReport } from '../formats/types.js';
import { edgePenalty, findRule, ruleRelativeIndex } from '../placement/rules.js';
import type { CompilationSession } from './session.js';
import { rootNode } from './symbols.js';

/**
 * Summarize the frozen placement: every declared node with its slot, and every recorded
 * connection with its relative index and penalty. Forces resolution.
 */
export function placementReport(session: CompilationSession): PlacementReport {
  const outcome = session.resolveAll();

  const nodes: PlacedNodeReport[] = [];
  for (const n of session.symbols.all()) {
    if (!n.declared) continue;
    const root = rootNode(n);
    nodes.push({
      name: n.name,
      slot: session.slotOf(n).name,
      ...(root !== n ? { aliasOf: root.name } : {}),
    });
  }

  const edges: ConnectionReport[] = session.graph.all().map(({ source, destination }) => {
    const s = session.slotOf(source);
    const d = session.slotOf(destination);
    const rule = findRule(s.resourceClass, d.resourceClass);
    return {
      source: source.name,
      destination: destination.name,
      sourceSlot: s.name,
      destinationSlot: d.name,
      penalty: rule ? edgePenalty(rule, s.index, d.index) : undefined,
      relativeIndex: rule ? ruleRelativeIndex(rule, s.index, d.index) : undefined,
    };
  });

  return { strategy: outcome.strategy, cost: outcome.cost, nodes, edges };
}
