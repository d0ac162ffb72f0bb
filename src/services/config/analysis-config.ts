/**
 * Analysis configuration defaults and resolution.
 *
 * The risk weights and severity cut points below are tuning defaults,
 * not fixed contracts: operators override them through .impact/config.yaml
 * or CLI options.
 */

import { ConfigurationError } from '../../core/errors.js';
import {
  type AnalysisConfig,
  type RiskWeights,
  type SeverityThresholds,
  safeValidateConfig,
  formatIssue
} from '../../core/schemas.js';

/**
 * Partial configuration accepted from callers; nested groups merge per key
 */
export type AnalysisConfigOverrides = Partial<Omit<AnalysisConfig, 'severityThresholds' | 'weights'>> & {
  severityThresholds?: Partial<SeverityThresholds>;
  weights?: Partial<RiskWeights>;
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  maxHops: null,
  topK: 5,
  embeddingEnabled: true,
  severityThresholds: {
    medium: 35,
    high: 70
  },
  rankDamping: 0.85,
  rankTolerance: 1e-6,
  rankMaxIterations: 100,
  betweennessNormalization: 'normalized',
  weights: {
    proximity: 0.45,
    centrality: 0.3,
    content: 0.25
  },
  chunkMaxChars: 1200,
  chunkOverlapChars: 200,
  embeddingTimeoutMs: 15000,
  retrievalConcurrency: 4
};

/**
 * Merges override layers onto the defaults, later layers winning, and
 * validates the result. Nested groups merge per key; undefined values
 * never mask an earlier layer.
 *
 * @throws ConfigurationError naming the first offending field
 */
export function resolveAnalysisConfig(...layers: AnalysisConfigOverrides[]): AnalysisConfig {
  let merged: Record<string, unknown> = { ...DEFAULT_ANALYSIS_CONFIG };
  let thresholds: Record<string, unknown> = { ...DEFAULT_ANALYSIS_CONFIG.severityThresholds };
  let weights: Record<string, unknown> = { ...DEFAULT_ANALYSIS_CONFIG.weights };

  for (const layer of layers) {
    const { severityThresholds, weights: layerWeights, ...rest } = layer;
    merged = { ...merged, ...stripUndefined(rest) };
    thresholds = { ...thresholds, ...stripUndefined(severityThresholds ?? {}) };
    weights = { ...weights, ...stripUndefined(layerWeights ?? {}) };
  }

  const result = safeValidateConfig({ ...merged, severityThresholds: thresholds, weights });
  if (!result.success) {
    const { field, message } = formatIssue(result.error);
    throw new ConfigurationError(`Invalid configuration: ${message}`, field);
  }
  return result.data;
}

/**
 * Drops keys whose value is undefined so they do not mask defaults
 */
function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}
