// Graph model: nodes, edges and the raw topology handed over by discovery

import { NodeKind, RelationKind } from './types.js';

/**
 * Structural metrics computed by the graph enricher
 */
export interface StructuralMetrics {
  /** Random-surfer rank, never negative */
  rank: number;
  /** Shortest-path betweenness (normalized to [0,1] unless configured raw) */
  betweenness: number;
  /** Id of the cyclic strongly-connected component, or null */
  componentId: string | null;
}

/**
 * A service, gateway, contract or infrastructure unit
 */
export interface GraphNode {
  /** Unique identifier within one graph instance */
  id: string;
  kind: NodeKind;
  label: string;
  metrics: StructuralMetrics;
  /** Source-location hints; a trailing "/" owns the whole directory */
  files: string[];
}

/**
 * Directed relation: source's behavior may affect target
 */
export interface GraphEdge {
  source: string;
  target: string;
  /** Coalesced relation kinds, sorted */
  relations: RelationKind[];
  /** Traversal cost, defaults to 1.0 per input edge */
  weight: number;
}

/**
 * Node as supplied by discovery (before enrichment)
 */
export interface NodeInput {
  id: string;
  kind?: NodeKind;
  label?: string;
  files?: string[];
}

/**
 * Edge as supplied by discovery (before coalescing)
 */
export interface EdgeInput {
  source: string;
  target: string;
  relation?: RelationKind;
  weight?: number;
}

/**
 * Raw artifact text owned by a node
 */
export interface SourceArtifact {
  nodeId: string;
  filePath: string;
  text: string;
}

/**
 * Everything the discovery collaborator hands to the core
 */
export interface TopologyInput {
  nodes: NodeInput[];
  edges: EdgeInput[];
  /** Explicit file path -> owning node ids mapping */
  fileOwners?: Record<string, string[]>;
  artifacts?: SourceArtifact[];
}
