import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { PlacementOptions, PlacementOutcome } from '../placement/placer.js';
import { placeNodes } from '../placement/placer.js';
import type { PlacementEdge, PlacementNode, PlacementProblem } from '../placement/problem.js';
import { resolveRelativeIndex } from '../placement/relative.js';
import type { PhysicalSlot, ResourceClass } from '../placement/resources.js';
import { placeholderSlot } from '../placement/resources.js';
import { findRule } from '../placement/rules.js';
import { ConnectionGraph } from './graph.js';
import type { LogicalNode, NodeReference } from './symbols.js';
import { SymbolTable, rootNode } from './symbols.js';

export interface SessionOptions {
  /** File name attributed to diagnostics. */
  file?: string;
  placement?: PlacementOptions;
  /** Sink for diagnostics raised during resolution; a fresh array when omitted. */
  diagnostics?: Diagnostic[];
}

type ResolutionState =
  | { status: 'pending' }
  | { status: 'resolved'; outcome: PlacementOutcome; slots: Map<string, PhysicalSlot> };

/**
 * Owns everything one compilation produces: the symbol table, the connection graph and,
 * once resolved, the frozen placement.
 *
 * Resolution happens at most once. It runs on the first request for a physical slot or
 * explicitly through `resolveAll()`; nodes or edges added afterwards are rejected.
 */
export class CompilationSession {
  readonly symbols = new SymbolTable();
  readonly graph = new ConnectionGraph();
  readonly diagnostics: Diagnostic[];
  readonly file: string;
  private readonly placementOptions: PlacementOptions;
  private state: ResolutionState = { status: 'pending' };
  private readonly reported = new Set<string>();

  constructor(options: SessionOptions = {}) {
    this.file = options.file ?? '<memory>';
    this.placementOptions = options.placement ?? {};
    this.diagnostics = options.diagnostics ?? [];
  }

  get resolved(): boolean {
    return this.state.status === 'resolved';
  }

  /** Declare a node; see {@link SymbolTable.declare}. */
  node(name: string, resourceClass?: ResourceClass, parent?: LogicalNode): LogicalNode {
    this.assertPending(`declare "${name}"`);
    return this.symbols.declare(name, resourceClass, parent);
  }

  /**
   * Reference `sourceName` from `referrer`, recording the edge `source -> referrer`.
   *
   * The returned reference resolves to a relative index only after placement is frozen.
   */
  connect(sourceName: string | undefined, referrer: LogicalNode): NodeReference {
    if (sourceName === undefined || sourceName === '') {
      return { kind: 'ref', source: undefined, referrer };
    }
    this.assertPending(`connect "${sourceName}"`);
    const source = this.symbols.reference(sourceName);
    this.graph.add(source, referrer);
    return { kind: 'ref', source, referrer };
  }

  /** Record an edge that no field carries (structural wiring). */
  declareEdge(source: LogicalNode, destination: LogicalNode): void {
    this.assertPending(`connect "${source.name}"`);
    this.graph.add(source, destination);
  }

  /**
   * Placement input: declared, classed root nodes and their projected edges.
   *
   * Edges are projected onto alias roots; edges that collapse onto one node or whose class
   * pair has no rule are left out.
   */
  placementProblem(): PlacementProblem {
    const nodes: PlacementNode[] = [];
    for (const n of this.symbols.all()) {
      if (n.parent || !n.resourceClass || !n.declared) continue;
      nodes.push({ name: n.name, resourceClass: n.resourceClass });
    }
    const edges: PlacementEdge[] = [];
    const seen = new Set<string>();
    for (const e of this.graph.all()) {
      const source = rootNode(e.source);
      const destination = rootNode(e.destination);
      if (source === destination || !source.declared) continue;
      const rule = findRule(source.resourceClass, destination.resourceClass);
      if (!rule) continue;
      const key = `${source.name}\0${destination.name}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push({ source: source.name, destination: destination.name, rule });
    }
    return { nodes, edges };
  }

  /**
   * Run placement and freeze the result. Idempotent.
   *
   * Throws PoolExhaustedError when a class has more nodes than slots. Rule violations in
   * the final placement are reported as warnings, one per edge.
   */
  resolveAll(): PlacementOutcome {
    if (this.state.status === 'resolved') return this.state.outcome;
    const outcome = placeNodes(this.placementProblem(), this.placementOptions);

    const slots = new Map<string, PhysicalSlot>();
    for (const n of this.symbols.all()) {
      const root = rootNode(n);
      const slot = root.resourceClass ? outcome.placement.get(root.name) : undefined;
      slots.set(n.name, slot ?? placeholderSlot(root.ordinal));
    }
    this.state = { status: 'resolved', outcome, slots };

    if (outcome.timedOut) {
      this.diagnostics.push({
        id: DiagnosticIds.PlacementTimeout,
        severity: 'warning',
        message: `Exact placement search timed out; using the ${outcome.strategy} result.`,
        file: this.file,
      });
    }
    for (const v of outcome.violations) {
      const s = outcome.placement.get(v.edge.source);
      const d = outcome.placement.get(v.edge.destination);
      this.diagnostics.push({
        id: DiagnosticIds.PlacementViolation,
        severity: 'warning',
        message: `Edge ${v.edge.source} (${s?.name ?? '?'}) -> ${v.edge.destination} (${d?.name ?? '?'}) is outside its adjacency window (penalty ${v.penalty}).`,
        file: this.file,
      });
    }
    return outcome;
  }

  /** Frozen physical slot of a node; forces resolution. */
  slotOf(node: LogicalNode): PhysicalSlot {
    this.resolveAll();
    if (this.state.status !== 'resolved') throw new Error('Placement did not resolve');
    const slot = this.state.slots.get(node.name);
    if (!slot) throw new Error(`Node "${node.name}" was created after placement was frozen`);
    return slot;
  }

  /** Integer slot index of a node; forces resolution. */
  toInt(node: LogicalNode): number {
    return this.slotOf(node).index;
  }

  /**
   * Encodable index for a reference. An empty reference is 0 and does not force resolution;
   * a source outside the window is also 0, with a warning.
   */
  relativeIndex(ref: NodeReference): number {
    if (!ref.source) return 0;
    const source = this.slotOf(ref.source);
    const destination = this.slotOf(ref.referrer);
    const resolution = resolveRelativeIndex(source, destination);
    if (!resolution.inWindow) {
      const key = `${ref.source.name}\0${ref.referrer.name}`;
      if (!this.reported.has(key)) {
        this.reported.add(key);
        this.diagnostics.push({
          id: DiagnosticIds.RelativeIndexOutOfRange,
          severity: 'warning',
          message: `${ref.referrer.name} (${destination.name}) cannot address ${ref.source.name} (${source.name}); encoded as 0.`,
          file: this.file,
        });
      }
    }
    return resolution.index;
  }

  private assertPending(action: string): void {
    if (this.state.status === 'resolved') {
      throw new Error(`Cannot ${action}: placement is already frozen`);
    }
  }
}
