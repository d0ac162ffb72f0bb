/**
 * Graph Enricher
 *
 * Computes structural metrics over a knowledge graph: weighted random-surfer
 * rank, shortest-path betweenness and strongly connected components.
 * All functions are pure with respect to graph topology.
 */

import type { StructuralMetrics } from '../../models/graph.js';
import { KnowledgeGraph } from './knowledge-graph.js';

export interface RankOptions {
  /** Probability of following an edge (default 0.85) */
  damping: number;
  /** Stop once the largest per-node change falls below this */
  tolerance: number;
  /** Hard cap on power iterations */
  maxIterations: number;
}

export type BetweennessNormalization = 'normalized' | 'raw';

export interface EnrichmentOptions extends RankOptions {
  betweennessNormalization: BetweennessNormalization;
}

export interface RankResult {
  scores: Map<string, number>;
  iterations: number;
  converged: boolean;
}

/**
 * A strongly connected component that contains a cycle
 */
export interface CyclicComponent {
  componentId: string;
  members: string[];
}

const DEFAULT_ENRICHMENT: EnrichmentOptions = {
  damping: 0.85,
  tolerance: 1e-6,
  maxIterations: 100,
  betweennessNormalization: 'normalized'
};

/**
 * Weighted rank via power iteration.
 *
 * Every node receives the teleport floor (1 - d) / N each round; rank is
 * then pushed along non-self-loop out-edges in proportion to edge weight.
 * Rank held by nodes without out-edges is not redistributed, so a node
 * nothing points at settles at exactly the floor.
 */
export function computeRank(graph: KnowledgeGraph, options: RankOptions): RankResult {
  const n = graph.size;
  if (n === 0) {
    return { scores: new Map(), iterations: 0, converged: true };
  }

  const floor = (1 - options.damping) / n;
  const outWeights = graph.getNodes().map((_, index) => graph.outWeightAt(index));
  let rank = new Array<number>(n).fill(1 / n);
  let iterations = 0;
  let converged = false;

  while (iterations < options.maxIterations) {
    iterations++;
    const next = new Array<number>(n).fill(floor);

    for (let source = 0; source < n; source++) {
      const total = outWeights[source];
      if (total <= 0) continue;
      const share = options.damping * rank[source];
      for (const edge of graph.outgoingEdges(graph.nodeAt(source).id)) {
        if (edge.target === edge.source) continue;
        const target = graph.indexOf(edge.target);
        next[target] += share * (edge.weight / total);
      }
    }

    let maxDelta = 0;
    for (let i = 0; i < n; i++) {
      maxDelta = Math.max(maxDelta, Math.abs(next[i] - rank[i]));
    }
    rank = next;

    if (maxDelta < options.tolerance) {
      converged = true;
      break;
    }
  }

  const scores = new Map<string, number>();
  graph.getNodes().forEach((node, index) => scores.set(node.id, rank[index]));
  return { scores, iterations, converged };
}

/**
 * Betweenness over hop-count shortest paths (Brandes).
 *
 * Counts, for every ordered pair (s, t), the fraction of shortest s -> t
 * paths passing through each intermediate node. Normalized mode divides
 * by (N - 1)(N - 2), the maximum for a directed graph.
 */
export function computeBetweenness(
  graph: KnowledgeGraph,
  normalization: BetweennessNormalization
): Map<string, number> {
  const n = graph.size;
  const centrality = new Array<number>(n).fill(0);

  for (let s = 0; s < n; s++) {
    const stack: number[] = [];
    const predecessors: number[][] = Array.from({ length: n }, () => []);
    const sigma = new Array<number>(n).fill(0);
    const distance = new Array<number>(n).fill(-1);
    sigma[s] = 1;
    distance[s] = 0;

    const queue: number[] = [s];
    for (let head = 0; head < queue.length; head++) {
      const v = queue[head];
      stack.push(v);
      for (const w of graph.successorIndices(v)) {
        if (distance[w] < 0) {
          distance[w] = distance[v] + 1;
          queue.push(w);
        }
        if (distance[w] === distance[v] + 1) {
          sigma[w] += sigma[v];
          predecessors[w].push(v);
        }
      }
    }

    const dependency = new Array<number>(n).fill(0);
    while (stack.length > 0) {
      const w = stack.pop() ?? s;
      for (const v of predecessors[w]) {
        dependency[v] += (sigma[v] / sigma[w]) * (1 + dependency[w]);
      }
      if (w !== s) {
        centrality[w] += dependency[w];
      }
    }
  }

  let scale = 1;
  if (normalization === 'normalized') {
    scale = n > 2 ? 1 / ((n - 1) * (n - 2)) : 0;
  }

  const result = new Map<string, number>();
  graph.getNodes().forEach((node, index) => result.set(node.id, centrality[index] * scale));
  return result;
}

/**
 * Strongly connected components (Tarjan, iterative).
 *
 * Nodes and neighbours are visited in ascending id order. Only components
 * that contain a cycle (several members, or one member with a self-loop)
 * get an id; ids are numbered by the discovery order of each component's
 * root, so an unchanged graph always yields the same labels.
 */
export function computeComponents(graph: KnowledgeGraph): CyclicComponent[] {
  const n = graph.size;
  const index = new Array<number>(n).fill(-1);
  const low = new Array<number>(n).fill(0);
  const onStack = new Array<boolean>(n).fill(false);
  const stack: number[] = [];
  const found: Array<{ root: number; members: number[] }> = [];
  let counter = 0;

  const visit = (v: number): void => {
    index[v] = counter;
    low[v] = counter;
    counter++;
    stack.push(v);
    onStack[v] = true;
  };

  for (let root = 0; root < n; root++) {
    if (index[root] !== -1) continue;

    visit(root);
    const work: Array<{ node: number; next: number }> = [{ node: root, next: 0 }];

    while (work.length > 0) {
      const frame = work[work.length - 1];
      const successors = graph.successorIndices(frame.node);

      if (frame.next < successors.length) {
        const w = successors[frame.next++];
        if (index[w] === -1) {
          visit(w);
          work.push({ node: w, next: 0 });
        } else if (onStack[w]) {
          low[frame.node] = Math.min(low[frame.node], index[w]);
        }
        continue;
      }

      work.pop();
      const v = frame.node;
      if (work.length > 0) {
        const parent = work[work.length - 1].node;
        low[parent] = Math.min(low[parent], low[v]);
      }

      if (low[v] === index[v]) {
        const members: number[] = [];
        let w: number | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack[w] = false;
          members.push(w);
        } while (w !== v);
        found.push({ root: v, members });
      }
    }
  }

  found.sort((a, b) => index[a.root] - index[b.root]);

  const components: CyclicComponent[] = [];
  for (const component of found) {
    const cyclic = component.members.length > 1 || graph.hasSelfLoopAt(component.root);
    if (!cyclic) continue;
    components.push({
      componentId: `scc-${components.length}`,
      members: component.members.map(member => graph.nodeAt(member).id).sort()
    });
  }
  return components;
}

/**
 * Returns a new graph whose nodes carry rank, betweenness and component id.
 * An empty graph enriches to an empty graph.
 */
export function enrichGraph(
  graph: KnowledgeGraph,
  options: Partial<EnrichmentOptions> = {}
): KnowledgeGraph {
  const resolved: EnrichmentOptions = { ...DEFAULT_ENRICHMENT, ...options };

  const rank = computeRank(graph, resolved);
  const betweenness = computeBetweenness(graph, resolved.betweennessNormalization);
  const componentOf = new Map<string, string>();
  for (const component of computeComponents(graph)) {
    for (const member of component.members) {
      componentOf.set(member, component.componentId);
    }
  }

  const metrics = new Map<string, StructuralMetrics>();
  for (const node of graph.getNodes()) {
    metrics.set(node.id, {
      rank: rank.scores.get(node.id) ?? 0,
      betweenness: betweenness.get(node.id) ?? 0,
      componentId: componentOf.get(node.id) ?? null
    });
  }
  return graph.withMetrics(metrics);
}

/**
 * Largest rank in the graph, used to bring rank into [0,1]
 */
export function maxRank(graph: KnowledgeGraph): number {
  let max = 0;
  for (const node of graph.getNodes()) {
    max = Math.max(max, node.metrics.rank);
  }
  return max;
}
