import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import { placementReport } from '../src/session/report.js';
import { CompilationSession } from '../src/session/session.js';
import { SymbolConflictError } from '../src/session/symbols.js';

describe('symbol table', () => {
  it('returns the same node for the same name', () => {
    const session = new CompilationSession();
    const a = session.node('A', 'loop');
    expect(session.node('A', 'loop')).toBe(a);
    expect(session.symbols.size).toBe(1);
  });

  it('rejects a second declaration with another class', () => {
    const session = new CompilationSession();
    session.node('A', 'loop');
    expect(() => session.node('A', 'pe')).toThrow(SymbolConflictError);
    expect(() => session.node('A', 'pe')).toThrow('Node "A" is already declared as loop');
  });

  it('rejects declaring a name that was only referenced so far', () => {
    const session = new CompilationSession();
    const b = session.node('B', 'loop');
    session.connect('A', b);
    expect(() => session.node('A', 'loop')).toThrow(/referenced before it was declared/);
  });
});

describe('connections', () => {
  it('records no edge for an empty reference', () => {
    const session = new CompilationSession();
    const b = session.node('B', 'loop');
    const ref = session.connect('', b);
    expect(ref.source).toBeUndefined();
    expect(session.graph.size).toBe(0);
    expect(session.relativeIndex(ref)).toBe(0);
    expect(session.resolved).toBe(false);
  });

  it('records each pair once', () => {
    const session = new CompilationSession();
    const a = session.node('A', 'loop');
    const b = session.node('B', 'loop');
    session.connect('A', b);
    session.connect('A', b);
    expect(session.graph.size).toBe(1);
    expect(session.graph.sourcesOf(b)).toEqual([a]);
  });

  it('leaves undeclared sources out of the placement problem', () => {
    const session = new CompilationSession();
    const b = session.node('B', 'loop');
    session.connect('ghost', b);
    const problem = session.placementProblem();
    expect(problem.nodes).toEqual([{ name: 'B', resourceClass: 'loop' }]);
    expect(problem.edges).toEqual([]);
  });
});

describe('resolution', () => {
  it('resolves once and then freezes the session', () => {
    const session = new CompilationSession();
    session.node('A', 'loop');
    const first = session.resolveAll();
    expect(session.resolveAll()).toBe(first);
    expect(() => session.node('B', 'loop')).toThrow('Cannot declare "B": placement is already frozen');
  });

  it('gives an alias the slot of its parent', () => {
    const session = new CompilationSession();
    const group = session.node('G', 'row');
    const row = session.node('G.ROW_LC', 'row', group);
    const col = session.node('G.COL_LC', 'col');
    session.declareEdge(row, col);
    expect(session.placementProblem().edges.map((e) => [e.source, e.destination])).toEqual([
      ['G', 'G.COL_LC'],
    ]);
    expect(session.slotOf(row).name).toBe('ROW_LC0');
    expect(session.slotOf(group)).toEqual(session.slotOf(row));
    expect(session.slotOf(col).name).toBe('COL_LC0');
  });

  it('gives unclassified nodes a placeholder slot from their creation order', () => {
    const session = new CompilationSession();
    const x = session.node('X');
    session.node('A', 'loop');
    expect(session.slotOf(x).name).toBe('NODE0');
    expect(session.toInt(x)).toBe(0);
  });

  it('resolves a loop-to-loop reference to its relative index', () => {
    const session = new CompilationSession();
    session.node('A', 'loop');
    const b = session.node('B', 'loop');
    const ref = session.connect('A', b);
    expect(session.relativeIndex(ref)).toBe(1);
    expect(session.diagnostics).toEqual([]);
  });

  it('warns once for a reference left outside its window', () => {
    const session = new CompilationSession({ file: 'cfg.json', placement: { strategy: 'allocate' } });
    session.node('R0', 'row');
    session.node('R1', 'row');
    const c = session.node('C', 'col');
    const near = session.connect('R0', c);
    const far = session.connect('R1', c);

    expect(session.relativeIndex(near)).toBe(6);
    expect(session.relativeIndex(far)).toBe(0);
    expect(session.relativeIndex(far)).toBe(0);
    expect(session.diagnostics).toEqual([
      {
        id: DiagnosticIds.PlacementViolation,
        severity: 'warning',
        message: 'Edge R1 (ROW_LC1) -> C (COL_LC0) is outside its adjacency window (penalty 1).',
        file: 'cfg.json',
      },
      {
        id: DiagnosticIds.RelativeIndexOutOfRange,
        severity: 'warning',
        message: 'C (COL_LC0) cannot address R1 (ROW_LC1); encoded as 0.',
        file: 'cfg.json',
      },
    ]);
  });
});

describe('placement report', () => {
  it('lists nodes with slots and connections with their index', () => {
    const session = new CompilationSession();
    session.node('A', 'loop');
    const b = session.node('B', 'loop');
    session.connect('A', b);
    expect(placementReport(session)).toEqual({
      strategy: 'exact',
      cost: 0,
      nodes: [
        { name: 'A', slot: 'LC0' },
        { name: 'B', slot: 'LC1' },
      ],
      edges: [
        {
          source: 'A',
          destination: 'B',
          sourceSlot: 'LC0',
          destinationSlot: 'LC1',
          penalty: 0,
          relativeIndex: 1,
        },
      ],
    });
  });

  it('marks aliases', () => {
    const session = new CompilationSession();
    const group = session.node('G', 'row');
    session.node('G.ROW_LC', 'row', group);
    const report = placementReport(session);
    expect(report.nodes).toEqual([
      { name: 'G', slot: 'ROW_LC0' },
      { name: 'G.ROW_LC', slot: 'ROW_LC0', aliasOf: 'G' },
    ]);
    expect(report.strategy).toBe('exact');
  });
});
