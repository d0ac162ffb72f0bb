// Impact records and the per-run artifact handed to reporting

import { NodeKind, RetrievalMode, SeverityLabel, AnalysisConfidence } from './types.js';
import { StructuralMetrics } from './graph.js';
import { ScoredEvidence } from './evidence.js';

/**
 * Normalized inputs of the risk model, each in [0,1]
 */
export interface RiskSignals {
  proximity: number;
  centrality: number;
  content: number;
}

/**
 * Final per-node finding
 */
export interface ImpactRecord {
  nodeId: string;
  kind: NodeKind;
  label: string;
  /** 0 for entry nodes */
  distance: number;
  /** Node ids from the nearest entry point to this node */
  path: string[];
  metrics: StructuralMetrics;
  evidence: ScoredEvidence[];
  retrieval: {
    mode: RetrievalMode;
    degraded: boolean;
    reason?: string;
  };
  signals: RiskSignals;
  riskEstimate: number;
  severity: SeverityLabel;
}

/**
 * Result of one analysis run
 */
export interface AnalysisResult {
  changeSet: string[];
  entryNodes: string[];
  unmappedFiles: string[];
  confidence: AnalysisConfidence;
  /** True when any record fell back to lexical retrieval */
  degraded: boolean;
  records: ImpactRecord[];
}

/**
 * Evidence reference inside the persisted run artifact
 */
export interface EvidenceReference {
  filePath: string;
  lineStart: number;
  lineEnd: number;
  score: number;
}

/**
 * Persisted structure shared with the rest of the pipeline
 */
export interface RunArtifact {
  generatedAt: string;
  title: string;
  changeSet: string[];
  confidence: AnalysisConfidence;
  degraded: boolean;
  records: Array<{
    nodeId: string;
    severity: SeverityLabel;
    riskEstimate: number;
    distance: number;
    evidence: EvidenceReference[];
  }>;
}
