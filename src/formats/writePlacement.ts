import type { PlacementArtifact, PlacementReport, WriteTextOptions } from './types.js';

/**
 * Create the placement summary: one line per node, then one per connection with its penalty.
 */
export function writePlacement(report: PlacementReport, opts?: WriteTextOptions): PlacementArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [
    `strategy: ${report.strategy}`,
    `total penalty: ${report.cost}`,
    '',
    'nodes:',
  ];
  for (const n of report.nodes) {
    lines.push(`  ${n.name.padEnd(20)} ${n.slot}${n.aliasOf ? ` (alias of ${n.aliasOf})` : ''}`);
  }
  lines.push('', 'connections:');
  for (const e of report.edges) {
    const index = e.relativeIndex === undefined ? '-' : String(e.relativeIndex);
    const penalty = e.penalty === undefined ? 'no rule' : `penalty ${e.penalty}`;
    lines.push(
      `  ${e.source} (${e.sourceSlot}) -> ${e.destination} (${e.destinationSlot}): index ${index}, ${penalty}`,
    );
  }
  return { kind: 'placement', text: lines.join(lineEnding) + lineEnding };
}
