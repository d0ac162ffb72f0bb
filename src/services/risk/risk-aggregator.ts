/**
 * Risk Aggregator
 *
 * Combines proximity, structural centrality and content relevance into a
 * 0-100 risk estimate and a severity label:
 *
 *   proximity  = 1 / (1 + distance)
 *   centrality = (rank / maxRank + betweenness) / 2
 *   score      = 100 * weighted mean of the three signals
 *
 * Each signal is clamped to [0,1] before weighting, so the estimate is
 * monotonic in every input and always lands in [0,100].
 */

import type { SeverityLabel } from '../../models/types.js';
import type { RiskSignals } from '../../models/impact.js';
import type { RiskWeights, SeverityThresholds } from '../../core/schemas.js';

export interface RiskInput {
  distance: number;
  rank: number;
  /** Largest rank in the graph */
  maxRank: number;
  betweenness: number;
  /** Retrieval relevance in [0,1] */
  content: number;
}

export interface RiskAssessment {
  signals: RiskSignals;
  riskEstimate: number;
  severity: SeverityLabel;
}

export function computeSignals(input: RiskInput): RiskSignals {
  const normalizedRank = input.maxRank > 0 ? input.rank / input.maxRank : 0;
  return {
    proximity: clampUnit(1 / (1 + Math.max(0, input.distance))),
    centrality: clampUnit((clampUnit(normalizedRank) + clampUnit(input.betweenness)) / 2),
    content: clampUnit(input.content)
  };
}

export function scoreSignals(signals: RiskSignals, weights: RiskWeights): number {
  const total = weights.proximity + weights.centrality + weights.content;
  if (total <= 0) {
    return 0;
  }
  const weighted =
    weights.proximity * signals.proximity +
    weights.centrality * signals.centrality +
    weights.content * signals.content;
  const score = (100 * weighted) / total;
  return Math.round(Math.min(100, Math.max(0, score)));
}

export function classifySeverity(riskEstimate: number, thresholds: SeverityThresholds): SeverityLabel {
  if (riskEstimate >= thresholds.high) return 'high';
  if (riskEstimate >= thresholds.medium) return 'medium';
  return 'low';
}

export function assessRisk(
  input: RiskInput,
  weights: RiskWeights,
  thresholds: SeverityThresholds
): RiskAssessment {
  const signals = computeSignals(input);
  const riskEstimate = scoreSignals(signals, weights);
  return { signals, riskEstimate, severity: classifySeverity(riskEstimate, thresholds) };
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return value > 0 ? 1 : 0;
  return Math.min(1, Math.max(0, value));
}
