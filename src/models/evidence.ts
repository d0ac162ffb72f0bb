// Evidence chunks and retrieval results

import { RetrievalMode } from './types.js';

/**
 * A bounded span of source text offered as justification
 */
export interface EvidenceChunk {
  nodeId: string;
  filePath: string;
  /** 1-based, inclusive */
  lineStart: number;
  /** 1-based, inclusive */
  lineEnd: number;
  text: string;
  /** Present only when embedding succeeded */
  embedding?: number[];
}

/**
 * A chunk ranked against the change set
 */
export interface ScoredEvidence {
  chunk: EvidenceChunk;
  /** Cosine similarity (semantic) or distinct token overlap count (lexical) */
  score: number;
}

/**
 * Retrieval outcome for one impacted node
 */
export interface RetrievalResult {
  nodeId: string;
  mode: RetrievalMode;
  degraded: boolean;
  reason?: string;
  evidence: ScoredEvidence[];
  /** Best-chunk relevance mapped to [0,1] */
  contentSignal: number;
}
