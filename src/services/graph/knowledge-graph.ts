/**
 * Knowledge Graph
 *
 * Directed, attributed service graph stored as an index-based adjacency
 * structure: node id -> index, index -> outgoing edge list. Nodes never
 * hold references to each other, so cycles need no special ownership.
 *
 * Nodes are kept in ascending id order and every adjacency list is sorted
 * by target id, which makes all traversals independent of the order in
 * which discovery reported nodes and edges.
 */

import type { GraphNode, GraphEdge, NodeInput, EdgeInput, StructuralMetrics } from '../../models/graph.js';
import type { RelationKind } from '../../models/types.js';
import { StructuralError, AnalyzerError } from '../../core/errors.js';
import { normalizePath } from '../../core/validation.js';

const EMPTY_METRICS: StructuralMetrics = {
  rank: 0,
  betweenness: 0,
  componentId: null
};

/**
 * Serializable graph shape (stable field order)
 */
export interface GraphSnapshot {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export class KnowledgeGraph {
  private readonly nodes: readonly GraphNode[];
  private readonly indexById: ReadonlyMap<string, number>;
  private readonly outgoing: readonly (readonly GraphEdge[])[];
  private readonly targets: readonly (readonly number[])[];
  private readonly selfLoops: ReadonlySet<number>;

  private constructor(nodes: GraphNode[], edgesBySource: GraphEdge[][]) {
    this.nodes = nodes.map(freezeNode);
    this.indexById = new Map(nodes.map((node, index) => [node.id, index]));
    this.outgoing = edgesBySource.map(list => Object.freeze(list.map(edge => Object.freeze(edge))));

    const selfLoops = new Set<number>();
    this.targets = edgesBySource.map((list, index) => {
      const out: number[] = [];
      for (const edge of list) {
        const target = this.indexById.get(edge.target);
        if (target === undefined) continue;
        if (target === index) {
          selfLoops.add(index);
        } else {
          out.push(target);
        }
      }
      return out;
    });
    this.selfLoops = selfLoops;
  }

  /**
   * Builds a graph from discovery output.
   *
   * Duplicate node ids and edges whose endpoints are unknown are rejected.
   * Repeated edges between the same ordered pair are coalesced: relation
   * kinds are unioned and weights summed.
   *
   * @throws StructuralError on malformed input
   */
  static fromInput(input: { nodes: readonly NodeInput[]; edges?: readonly EdgeInput[] }): KnowledgeGraph {
    const byId = new Map<string, GraphNode>();

    for (const raw of input.nodes) {
      if (byId.has(raw.id)) {
        throw new StructuralError(`Duplicate node id: ${raw.id}`, { nodeId: raw.id });
      }
      byId.set(raw.id, {
        id: raw.id,
        kind: raw.kind ?? 'service',
        label: raw.label ?? raw.id,
        metrics: { ...EMPTY_METRICS },
        files: normalizeHints(raw.id, raw.files ?? [])
      });
    }

    const coalesced = new Map<string, { source: string; target: string; relations: Set<RelationKind>; weight: number }>();
    for (const raw of input.edges ?? []) {
      if (!byId.has(raw.source) || !byId.has(raw.target)) {
        const missing = byId.has(raw.source) ? raw.target : raw.source;
        throw new StructuralError(
          `Edge ${raw.source} -> ${raw.target} references unknown node: ${missing}`,
          { source: raw.source, target: raw.target }
        );
      }
      const weight = raw.weight ?? 1;
      if (!(weight > 0) || !Number.isFinite(weight)) {
        throw new StructuralError(
          `Edge ${raw.source} -> ${raw.target} has invalid weight: ${weight}`,
          { source: raw.source, target: raw.target }
        );
      }

      const key = `${raw.source}\u0000${raw.target}`;
      const existing = coalesced.get(key);
      if (existing) {
        existing.weight += weight;
        if (raw.relation) existing.relations.add(raw.relation);
      } else {
        coalesced.set(key, {
          source: raw.source,
          target: raw.target,
          relations: new Set(raw.relation ? [raw.relation] : []),
          weight
        });
      }
    }

    const nodes = [...byId.values()].sort((a, b) => compareIds(a.id, b.id));
    const indexById = new Map(nodes.map((node, index) => [node.id, index]));
    const edgesBySource: GraphEdge[][] = nodes.map(() => []);

    for (const edge of coalesced.values()) {
      const sourceIndex = indexById.get(edge.source);
      if (sourceIndex === undefined) continue;
      edgesBySource[sourceIndex].push({
        source: edge.source,
        target: edge.target,
        relations: [...edge.relations].sort(),
        weight: edge.weight
      });
    }
    for (const list of edgesBySource) {
      list.sort((a, b) => compareIds(a.target, b.target));
    }

    return new KnowledgeGraph(nodes, edgesBySource);
  }

  /**
   * Returns a new graph with the given metrics applied; this instance is untouched
   */
  withMetrics(metrics: ReadonlyMap<string, StructuralMetrics>): KnowledgeGraph {
    const nodes = this.nodes.map(node => ({
      ...node,
      files: [...node.files],
      metrics: { ...(metrics.get(node.id) ?? node.metrics) }
    }));
    const edges = this.outgoing.map(list => list.map(edge => ({ ...edge, relations: [...edge.relations] })));
    return new KnowledgeGraph(nodes, edges);
  }

  get size(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.outgoing.reduce((sum, list) => sum + list.length, 0);
  }

  hasNode(id: string): boolean {
    return this.indexById.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.nodes[index];
  }

  /**
   * Index of a node in the sorted node table, or -1
   */
  indexOf(id: string): number {
    return this.indexById.get(id) ?? -1;
  }

  nodeAt(index: number): GraphNode {
    const node = this.nodes[index];
    if (!node) {
      throw new StructuralError(`Node index out of range: ${index}`, { index });
    }
    return node;
  }

  /**
   * All nodes in ascending id order
   */
  getNodes(): readonly GraphNode[] {
    return this.nodes;
  }

  /**
   * All edges ordered by source, then target
   */
  getEdges(): GraphEdge[] {
    return this.outgoing.flat();
  }

  outgoingEdges(id: string): readonly GraphEdge[] {
    const index = this.indexById.get(id);
    return index === undefined ? [] : this.outgoing[index];
  }

  /**
   * Successor indices of a node, self-loops excluded, ascending
   */
  successorIndices(index: number): readonly number[] {
    return this.targets[index] ?? [];
  }

  /**
   * Total weight of a node's outgoing edges, self-loops excluded
   */
  outWeightAt(index: number): number {
    let total = 0;
    for (const edge of this.outgoing[index] ?? []) {
      if (edge.target !== edge.source) total += edge.weight;
    }
    return total;
  }

  hasSelfLoopAt(index: number): boolean {
    return this.selfLoops.has(index);
  }

  toJSON(): GraphSnapshot {
    return {
      nodes: this.nodes.map(node => ({
        id: node.id,
        kind: node.kind,
        label: node.label,
        metrics: {
          rank: node.metrics.rank,
          betweenness: node.metrics.betweenness,
          componentId: node.metrics.componentId
        },
        files: [...node.files]
      })),
      edges: this.getEdges().map(edge => ({
        source: edge.source,
        target: edge.target,
        relations: [...edge.relations],
        weight: edge.weight
      }))
    };
  }
}

/**
 * Code-unit comparison; locale-independent so ordering is reproducible
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function normalizeHints(nodeId: string, files: readonly string[]): string[] {
  const hints = new Set<string>();
  for (const file of files) {
    try {
      hints.add(normalizePath(file, true));
    } catch (error) {
      if (error instanceof AnalyzerError) {
        throw new StructuralError(`Node ${nodeId} has an invalid file hint "${file}": ${error.message}`, {
          nodeId,
          file
        });
      }
      throw error;
    }
  }
  return [...hints].sort(compareIds);
}

function freezeNode(node: GraphNode): GraphNode {
  Object.freeze(node.metrics);
  Object.freeze(node.files);
  return Object.freeze(node);
}
