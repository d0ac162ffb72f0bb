/**
 * Tests for structural metrics: rank, betweenness and cyclic components
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { KnowledgeGraph } from './knowledge-graph.js';
import {
  computeRank,
  computeBetweenness,
  computeComponents,
  enrichGraph,
  maxRank
} from './graph-enricher.js';

const RANK_OPTIONS = { damping: 0.85, tolerance: 1e-9, maxIterations: 100 };

function chain(): KnowledgeGraph {
  return KnowledgeGraph.fromInput({
    nodes: [{ id: 'a' }, { id: 'b' }, { id: 'c' }],
    edges: [
      { source: 'a', target: 'b' },
      { source: 'b', target: 'c' }
    ]
  });
}

describe('computeRank', () => {
  it('should return no scores for an empty graph', () => {
    const result = computeRank(KnowledgeGraph.fromInput({ nodes: [] }), RANK_OPTIONS);
    expect(result.scores.size).toBe(0);
    expect(result.iterations).toBe(0);
    expect(result.converged).toBe(true);
  });

  it('should propagate rank down a chain', () => {
    const result = computeRank(chain(), RANK_OPTIONS);
    const floor = (1 - 0.85) / 3;

    expect(result.scores.get('a')).toBeCloseTo(floor, 12);
    expect(result.scores.get('b')).toBeCloseTo(floor + 0.85 * floor, 12);
    expect(result.scores.get('c')).toBeCloseTo(floor + 0.85 * (floor + 0.85 * floor), 12);
    expect(result.converged).toBe(true);
  });

  it('should give unreachable nodes exactly the damping floor', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'a' }, { id: 'b' }, { id: 'z' }],
      edges: [{ source: 'a', target: 'b' }]
    });
    const result = computeRank(graph, RANK_OPTIONS);
    expect(result.scores.get('z')).toBe((1 - 0.85) / 3);
  });

  it('should split rank in proportion to edge weight', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'hub' }, { id: 'heavy' }, { id: 'light' }],
      edges: [
        { source: 'hub', target: 'heavy', weight: 3 },
        { source: 'hub', target: 'light', weight: 1 }
      ]
    });
    const scores = computeRank(graph, RANK_OPTIONS).scores;
    const floor = (1 - 0.85) / 3;

    expect(scores.get('heavy')).toBeCloseTo(floor + 0.85 * floor * 0.75, 12);
    expect(scores.get('light')).toBeCloseTo(floor + 0.85 * floor * 0.25, 12);
  });

  it('should ignore self-loops when distributing rank', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'a' }, { id: 'b' }],
      edges: [
        { source: 'a', target: 'a', weight: 10 },
        { source: 'a', target: 'b' }
      ]
    });
    const scores = computeRank(graph, RANK_OPTIONS).scores;
    expect(scores.get('a')).toBeCloseTo(0.075, 12);
    expect(scores.get('b')).toBeCloseTo(0.075 + 0.85 * 0.075, 12);
  });

  it('should stop at the iteration cap when convergence is slow', () => {
    const result = computeRank(chain(), { damping: 0.85, tolerance: 1e-9, maxIterations: 2 });
    expect(result.iterations).toBe(2);
    expect(result.converged).toBe(false);
  });
});

describe('computeBetweenness', () => {
  it('should credit the middle of a chain', () => {
    const raw = computeBetweenness(chain(), 'raw');
    expect(raw.get('a')).toBe(0);
    expect(raw.get('b')).toBe(1);
    expect(raw.get('c')).toBe(0);

    const normalized = computeBetweenness(chain(), 'normalized');
    expect(normalized.get('b')).toBe(0.5);
  });

  it('should split credit across equally short paths', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'a' }, { id: 'b' }, { id: 'c' }, { id: 'd' }],
      edges: [
        { source: 'a', target: 'b' },
        { source: 'a', target: 'c' },
        { source: 'b', target: 'd' },
        { source: 'c', target: 'd' }
      ]
    });
    const raw = computeBetweenness(graph, 'raw');
    expect(raw.get('b')).toBe(0.5);
    expect(raw.get('c')).toBe(0.5);

    const normalized = computeBetweenness(graph, 'normalized');
    expect(normalized.get('b')).toBeCloseTo(0.5 / 6, 12);
  });

  it('should report zero for graphs with fewer than three nodes', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'a' }, { id: 'b' }],
      edges: [{ source: 'a', target: 'b' }]
    });
    expect([...computeBetweenness(graph, 'normalized').values()]).toEqual([0, 0]);
  });

  it('should stay within [0,1] when normalized (property test)', () => {
    const idArb = fc.constantFrom('a', 'b', 'c', 'd', 'e', 'f');
    fc.assert(
      fc.property(fc.array(fc.tuple(idArb, idArb), { maxLength: 20 }), pairs => {
        const graph = KnowledgeGraph.fromInput({
          nodes: ['a', 'b', 'c', 'd', 'e', 'f'].map(id => ({ id })),
          edges: pairs.map(([source, target]) => ({ source, target }))
        });
        for (const value of computeBetweenness(graph, 'normalized').values()) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(1 + 1e-12);
        }
      }),
      { numRuns: 100 }
    );
  });
});

describe('computeComponents', () => {
  it('should label cycles and self-loops in discovery order', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'd' }, { id: 'c' }, { id: 'b' }, { id: 'a' }],
      edges: [
        { source: 'b', target: 'a' },
        { source: 'a', target: 'b' },
        { source: 'd', target: 'd' }
      ]
    });

    expect(computeComponents(graph)).toEqual([
      { componentId: 'scc-0', members: ['a', 'b'] },
      { componentId: 'scc-1', members: ['d'] }
    ]);
  });

  it('should find no components in an acyclic graph', () => {
    expect(computeComponents(chain())).toEqual([]);
  });

  it('should merge nested cycles into one component', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'a' }, { id: 'b' }, { id: 'c' }, { id: 'x' }],
      edges: [
        { source: 'a', target: 'b' },
        { source: 'b', target: 'c' },
        { source: 'c', target: 'a' },
        { source: 'c', target: 'b' },
        { source: 'c', target: 'x' }
      ]
    });
    expect(computeComponents(graph)).toEqual([
      { componentId: 'scc-0', members: ['a', 'b', 'c'] }
    ]);
  });
});

describe('enrichGraph', () => {
  it('should enrich an empty graph without error', () => {
    const enriched = enrichGraph(KnowledgeGraph.fromInput({ nodes: [] }));
    expect(enriched.size).toBe(0);
    expect(maxRank(enriched)).toBe(0);
  });

  it('should populate every node and leave the input graph untouched', () => {
    const graph = KnowledgeGraph.fromInput({
      nodes: [{ id: 'a' }, { id: 'b' }, { id: 'c' }],
      edges: [
        { source: 'a', target: 'b' },
        { source: 'b', target: 'a' },
        { source: 'b', target: 'c' }
      ]
    });
    const enriched = enrichGraph(graph);

    expect(graph.getNode('a')?.metrics.rank).toBe(0);
    for (const node of enriched.getNodes()) {
      expect(node.metrics.rank).toBeGreaterThan(0);
    }
    expect(enriched.getNode('a')?.metrics.componentId).toBe('scc-0');
    expect(enriched.getNode('b')?.metrics.componentId).toBe('scc-0');
    expect(enriched.getNode('c')?.metrics.componentId).toBeNull();
    expect(enriched.getNode('b')?.metrics.betweenness).toBe(0.5);
    expect(maxRank(enriched)).toBe(enriched.getNode('b')?.metrics.rank);
  });

  it('should produce identical metrics across runs and input orderings (property test)', () => {
    const idArb = fc.constantFrom('a', 'b', 'c', 'd', 'e');
    fc.assert(
      fc.property(
        fc.array(fc.tuple(idArb, idArb, fc.integer({ min: 1, max: 3 })), { maxLength: 15 }),
        tuples => {
          const nodes = ['a', 'b', 'c', 'd', 'e'].map(id => ({ id }));
          const edges = tuples.map(([source, target, weight]) => ({ source, target, weight }));

          const first = enrichGraph(KnowledgeGraph.fromInput({ nodes, edges }));
          const second = enrichGraph(KnowledgeGraph.fromInput({
            nodes: [...nodes].reverse(),
            edges: [...edges].reverse()
          }));

          expect(JSON.stringify(second.toJSON())).toBe(JSON.stringify(first.toJSON()));
        }
      ),
      { numRuns: 50 }
    );
  });
});
