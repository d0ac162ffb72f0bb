/**
 * Graph Service Module
 *
 * Knowledge graph model, structural enrichment and rendering
 * as a table, JSON, Mermaid or DOT.
 *
 * @module services/graph
 */

export { KnowledgeGraph, compareIds, type GraphSnapshot } from './knowledge-graph.js';
export {
  enrichGraph,
  computeRank,
  computeBetweenness,
  computeComponents,
  maxRank,
  type RankOptions,
  type RankResult,
  type EnrichmentOptions,
  type BetweennessNormalization,
  type CyclicComponent
} from './graph-enricher.js';
export {
  GraphService,
  GRAPH_FORMATS,
  severitiesOf,
  type IGraphService,
  type GraphFormat,
  type GraphOptions,
  type CircularDependency
} from './graph-service.js';
