/**
 * Impact Traversal Engine
 *
 * Propagates a change downstream from its entry nodes with a multi-source
 * breadth-first search along edge direction. Entries are seeded in
 * ascending id order and neighbours are visited in ascending id order,
 * so the first discovery of a node (which fixes its distance and
 * predecessor) never depends on how discovery ordered the input.
 */

import type { AnalysisConfidence } from '../../models/types.js';
import { logger } from '../../core/logger.js';
import { KnowledgeGraph, compareIds } from '../graph/knowledge-graph.js';
import { FileOwnershipIndex } from './file-ownership.js';

const log = logger.child('traversal');

/**
 * A node reached from the change set
 */
export interface ImpactedNode {
  nodeId: string;
  /** Hops from the nearest entry node; 0 for entries */
  distance: number;
  /** Node ids from the entry node to this node, inclusive */
  path: string[];
}

export interface TraversalOptions {
  /** Exclude nodes farther than this many hops; null for no limit */
  maxHops?: number | null;
}

export interface TraversalResult {
  entryNodes: string[];
  unmappedFiles: string[];
  confidence: AnalysisConfidence;
  /** Ordered by distance, then id */
  impacted: ImpactedNode[];
}

/**
 * Breadth-first propagation from a set of entry node ids.
 * Unknown entry ids are ignored.
 */
export function propagate(
  graph: KnowledgeGraph,
  entryNodes: readonly string[],
  options: TraversalOptions = {}
): ImpactedNode[] {
  const maxHops = options.maxHops ?? null;
  const distance = new Array<number>(graph.size).fill(-1);
  const predecessor = new Array<number>(graph.size).fill(-1);
  const queue: number[] = [];

  const seeds = [...new Set(entryNodes)].sort(compareIds);
  for (const id of seeds) {
    const index = graph.indexOf(id);
    if (index < 0) continue;
    distance[index] = 0;
    queue.push(index);
  }

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (maxHops !== null && distance[current] >= maxHops) continue;

    for (const next of graph.successorIndices(current)) {
      if (distance[next] >= 0) continue;
      distance[next] = distance[current] + 1;
      predecessor[next] = current;
      queue.push(next);
    }
  }

  const impacted = queue.map(index => ({
    nodeId: graph.nodeAt(index).id,
    distance: distance[index],
    path: buildPath(graph, predecessor, index)
  }));

  return impacted.sort((a, b) => a.distance - b.distance || compareIds(a.nodeId, b.nodeId));
}

/**
 * Resolves the change set to entry nodes and propagates downstream.
 * A change set that maps to no node yields an empty result with low
 * confidence; it is not an error.
 */
export function traverseImpact(
  graph: KnowledgeGraph,
  ownership: FileOwnershipIndex,
  changeSet: readonly string[],
  options: TraversalOptions = {}
): TraversalResult {
  const { entryNodes, unmappedFiles } = ownership.resolve(changeSet);

  if (unmappedFiles.length > 0) {
    log.debug('Changed files without an owning node', { unmappedFiles });
  }

  if (entryNodes.length === 0) {
    log.warn('No changed file maps to a graph node', { changedFiles: changeSet.length });
    return { entryNodes, unmappedFiles, confidence: 'low', impacted: [] };
  }

  const impacted = propagate(graph, entryNodes, options);
  log.debug('Impact propagated', { entries: entryNodes.length, impacted: impacted.length });

  return { entryNodes, unmappedFiles, confidence: 'normal', impacted };
}

function buildPath(graph: KnowledgeGraph, predecessor: readonly number[], index: number): string[] {
  const path: string[] = [];
  for (let current = index; current >= 0; current = predecessor[current]) {
    path.push(graph.nodeAt(current).id);
  }
  return path.reverse();
}
