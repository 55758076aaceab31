import type { LogicalNode } from './symbols.js';

/** Directed "destination reads from source" relation. */
export interface ConnectionEdge {
  source: LogicalNode;
  destination: LogicalNode;
}

/**
 * Edge set of a session, de-duplicated by endpoint names and kept in first-seen order.
 */
export class ConnectionGraph {
  private readonly edges: ConnectionEdge[] = [];
  private readonly keys = new Set<string>();

  get size(): number {
    return this.edges.length;
  }

  /** Record an edge; returns false when it was already present. */
  add(source: LogicalNode, destination: LogicalNode): boolean {
    const key = `${source.name}\0${destination.name}`;
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    this.edges.push({ source, destination });
    return true;
  }

  all(): readonly ConnectionEdge[] {
    return this.edges;
  }

  sourcesOf(destination: LogicalNode): LogicalNode[] {
    return this.edges.filter((e) => e.destination === destination).map((e) => e.source);
  }
}
