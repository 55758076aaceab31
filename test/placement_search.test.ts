import { describe, expect, it } from 'vitest';

import { allocateSlots } from '../src/placement/allocate.js';
import { annealPlacement } from '../src/placement/anneal.js';
import { exactSearch } from '../src/placement/exact.js';
import { Placement } from '../src/placement/placement.js';
import { placeNodes } from '../src/placement/placer.js';
import type { PlacementEdge, PlacementNode, PlacementProblem } from '../src/placement/problem.js';
import { placementCost } from '../src/placement/problem.js';
import type { ResourceClass } from '../src/placement/resources.js';
import { PoolExhaustedError, slotAt } from '../src/placement/resources.js';
import { findRule, isAdmissible } from '../src/placement/rules.js';

function n(name: string, resourceClass: ResourceClass): PlacementNode {
  return { name, resourceClass };
}

function problem(nodes: PlacementNode[], pairs: Array<[string, string]>): PlacementProblem {
  const classOf = new Map(nodes.map((x) => [x.name, x.resourceClass]));
  const edges: PlacementEdge[] = pairs.map(([source, destination]) => {
    const rule = findRule(classOf.get(source), classOf.get(destination));
    if (!rule) throw new Error(`no rule for ${source} -> ${destination}`);
    return { source, destination, rule };
  });
  return { nodes, edges };
}

function expectLegal(p: PlacementProblem, placement: Placement): void {
  const seen = new Set<string>();
  for (const node of p.nodes) {
    const slot = placement.get(node.name);
    expect(slot?.resourceClass).toBe(node.resourceClass);
    expect(seen.has(slot!.name)).toBe(false);
    seen.add(slot!.name);
  }
  for (const e of p.edges) {
    const s = placement.get(e.source)!;
    const d = placement.get(e.destination)!;
    expect(isAdmissible(e.rule, s.index, d.index)).toBe(true);
  }
}

describe('Placement values', () => {
  it('returns a new value from every update', () => {
    const empty = Placement.empty();
    const one = empty.assign('a', slotAt('loop', 0));
    expect(empty.size).toBe(0);
    expect(one.get('a')?.name).toBe('LC0');
    expect(one.occupant('loop', 0)).toBe('a');
  });

  it('refuses to double-book a slot', () => {
    const p = Placement.empty().assign('a', slotAt('loop', 0));
    expect(() => p.assign('b', slotAt('loop', 0))).toThrow(/already held by "a"/);
  });

  it('swaps two placed nodes', () => {
    const p = Placement.empty().assign('a', slotAt('pe', 0)).assign('b', slotAt('pe', 3)).swap('a', 'b');
    expect(p.get('a')?.index).toBe(3);
    expect(p.get('b')?.index).toBe(0);
    expect(p.occupant('pe', 0)).toBe('b');
  });
});

describe('allocation', () => {
  it('gives each node the next free slot of its class in order', () => {
    const placement = allocateSlots([n('a', 'loop'), n('b', 'pe'), n('c', 'loop')]);
    expect(placement.get('a')?.name).toBe('LC0');
    expect(placement.get('c')?.name).toBe('LC1');
    expect(placement.get('b')?.name).toBe('PE0');
  });

  it('keeps nodes that are already placed', () => {
    const start = Placement.empty().assign('a', slotAt('loop', 0));
    const placement = allocateSlots([n('a', 'loop'), n('b', 'loop')], start);
    expect(placement.get('a')?.index).toBe(0);
    expect(placement.get('b')?.index).toBe(1);
  });

  it('fails when a pool runs out', () => {
    const loops = Array.from({ length: 9 }, (_, i) => n(`L${i}`, 'loop'));
    expect(() => allocateSlots(loops)).toThrow(PoolExhaustedError);
    try {
      allocateSlots(loops);
    } catch (err) {
      expect(err).toBeInstanceOf(PoolExhaustedError);
      if (err instanceof PoolExhaustedError) {
        expect(err.resourceClass).toBe('loop');
        expect(err.requested).toBe(9);
      }
    }
  });
});

describe('exact search', () => {
  it('finds a legal placement for a loop chain', () => {
    const p = problem(
      [n('A', 'loop'), n('B', 'loop'), n('C', 'loop'), n('D', 'loop')],
      [
        ['A', 'B'],
        ['B', 'C'],
        ['C', 'D'],
        ['A', 'C'],
      ],
    );
    const result = exactSearch(p, allocateSlots(p.nodes), { timeoutMs: 2000 });
    expect(result.timedOut).toBe(false);
    expect(result.placement).toBeDefined();
    expectLegal(p, result.placement!);
  });

  it('never reports success for an unsatisfiable problem', () => {
    // Both rows must share the column's position.
    const p = problem(
      [n('R0', 'row'), n('R1', 'row'), n('C', 'col')],
      [
        ['R0', 'C'],
        ['R1', 'C'],
      ],
    );
    const result = exactSearch(p, allocateSlots(p.nodes), { timeoutMs: 2000 });
    expect(result.placement).toBeUndefined();
    expect(result.timedOut).toBe(false);
  });

  it('stops when the clock runs past the limit', () => {
    const p = problem([n('A', 'loop'), n('B', 'loop')], [['A', 'B']]);
    let t = 0;
    const result = exactSearch(p, Placement.empty(), { timeoutMs: 0, now: () => t++ });
    expect(result.timedOut).toBe(true);
    expect(result.placement).toBeUndefined();
  });
});

describe('annealing', () => {
  // L0..L2 take LC0..LC2 first, pushing X to LC3, too far from PE0.
  const p = problem(
    [n('L0', 'loop'), n('L1', 'loop'), n('L2', 'loop'), n('X', 'loop'), n('P', 'pe')],
    [
      ['L0', 'L1'],
      ['L1', 'L2'],
      ['X', 'P'],
    ],
  );

  it('repairs a placement that allocation leaves illegal', () => {
    const initial = allocateSlots(p.nodes);
    expect(placementCost(p, initial)).toBe(2);
    const result = annealPlacement(p, initial, { iterations: 5000, restarts: 1, seed: 1 });
    expect(result.cost).toBe(0);
    expectLegal(p, result.placement);
  });

  it('is deterministic for a fixed seed', () => {
    const initial = allocateSlots(p.nodes);
    const a = annealPlacement(p, initial, { iterations: 200, restarts: 2, seed: 7 });
    const b = annealPlacement(p, initial, { iterations: 200, restarts: 2, seed: 7 });
    expect(a.placement.entries()).toEqual(b.placement.entries());
    expect(a.iterations).toBe(b.iterations);
  });
});

describe('placeNodes', () => {
  it('uses allocation only when asked', () => {
    const p = problem([n('X', 'loop'), n('P', 'pe')], [['X', 'P']]);
    const outcome = placeNodes(p, { strategy: 'allocate' });
    expect(outcome.strategy).toBe('allocate');
    expect(outcome.cost).toBe(0);
    expect(outcome.placement.get('X')?.name).toBe('LC0');
  });

  it('fills unconnected nodes after the search', () => {
    const p = problem([n('A', 'loop'), n('B', 'loop'), n('idle', 'loop')], [['A', 'B']]);
    const outcome = placeNodes(p);
    expect(outcome.strategy).toBe('exact');
    expect(outcome.placement.get('idle')?.name).toBe('LC2');
  });

  it('reports every edge left outside its window', () => {
    const p = problem(
      [n('R0', 'row'), n('R1', 'row'), n('C', 'col')],
      [
        ['R0', 'C'],
        ['R1', 'C'],
      ],
    );
    const outcome = placeNodes(p);
    expect(outcome.cost).toBe(1);
    expect(outcome.violations).toHaveLength(1);
    expect(outcome.violations[0]!.penalty).toBe(1);
  });

  it('selects annealing for the heuristic strategy', () => {
    const p = problem(
      [n('L0', 'loop'), n('L1', 'loop'), n('L2', 'loop'), n('X', 'loop'), n('P', 'pe')],
      [
        ['L0', 'L1'],
        ['L1', 'L2'],
        ['X', 'P'],
      ],
    );
    const outcome = placeNodes(p, { strategy: 'heuristic' });
    expect(outcome.strategy).toBe('heuristic');
    expect(outcome.cost).toBe(0);
    expect(outcome.violations).toEqual([]);
  });

  it('surfaces pool exhaustion', () => {
    const p = problem(
      Array.from({ length: 5 }, (_, i) => n(`G${i}`, 'row')),
      [],
    );
    expect(() => placeNodes(p)).toThrow(PoolExhaustedError);
  });
});
