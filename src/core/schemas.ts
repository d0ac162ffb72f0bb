// Zod schemas for topology input, analysis configuration and run artifacts

import { z } from 'zod';

/**
 * Node kind enum
 */
export const NodeKindSchema = z.enum(['service', 'api-gateway', 'contract', 'infra-config']);

/**
 * Relation kind enum
 */
export const RelationKindSchema = z.enum(['import', 'http-call', 'contract-reference']);

/**
 * Severity label enum
 */
export const SeverityLabelSchema = z.enum(['low', 'medium', 'high']);

/**
 * Node as reported by discovery
 */
export const NodeInputSchema = z.object({
  id: z.string().min(1, 'Node id is required'),
  kind: NodeKindSchema.optional(),
  label: z.string().optional(),
  files: z.array(z.string().min(1)).optional()
});

/**
 * Edge as reported by discovery
 */
export const EdgeInputSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  relation: RelationKindSchema.optional(),
  weight: z.number().positive('Edge weight must be positive').finite().optional()
});

/**
 * Raw artifact text per node
 */
export const SourceArtifactSchema = z.object({
  nodeId: z.string().min(1),
  filePath: z.string().min(1),
  text: z.string()
});

/**
 * Full discovery hand-off
 */
export const TopologyInputSchema = z.object({
  nodes: z.array(NodeInputSchema),
  edges: z.array(EdgeInputSchema).default([]),
  fileOwners: z.record(z.string(), z.array(z.string().min(1))).optional(),
  artifacts: z.array(SourceArtifactSchema).optional()
});

/**
 * Severity cut points; medium must sit strictly below high
 */
export const SeverityThresholdsSchema = z
  .object({
    medium: z.number().min(0).max(100),
    high: z.number().min(0).max(100)
  })
  .refine(t => t.medium < t.high, {
    message: 'medium threshold must be lower than high threshold',
    path: ['medium']
  });

/**
 * Risk model weights; at least one must be positive
 */
export const RiskWeightsSchema = z
  .object({
    proximity: z.number().min(0).finite(),
    centrality: z.number().min(0).finite(),
    content: z.number().min(0).finite()
  })
  .refine(w => w.proximity + w.centrality + w.content > 0, {
    message: 'at least one risk weight must be positive'
  });

const AnalysisConfigShape = z.object({
  maxHops: z.number().int().min(0).nullable(),
  topK: z.number().int().min(1, 'topK must be at least 1'),
  embeddingEnabled: z.boolean(),
  severityThresholds: SeverityThresholdsSchema,
  rankDamping: z.number().gt(0).lt(1),
  rankTolerance: z.number().positive(),
  rankMaxIterations: z.number().int().min(1),
  betweennessNormalization: z.enum(['normalized', 'raw']),
  weights: RiskWeightsSchema,
  chunkMaxChars: z.number().int().min(16),
  chunkOverlapChars: z.number().int().min(0),
  embeddingTimeoutMs: z.number().int().positive(),
  retrievalConcurrency: z.number().int().min(1)
});

/**
 * Complete analysis configuration
 */
export const AnalysisConfigSchema = AnalysisConfigShape.refine(c => c.chunkOverlapChars < c.chunkMaxChars, {
  message: 'chunk overlap must be smaller than the chunk size',
  path: ['chunkOverlapChars']
});

/**
 * Partial configuration as written in a config file; rules spanning
 * several fields are checked once all layers are merged
 */
export const AnalysisConfigOverridesSchema = AnalysisConfigShape.extend({
  severityThresholds: z.object({ medium: z.number(), high: z.number() }).partial(),
  weights: z.object({ proximity: z.number(), centrality: z.number(), content: z.number() }).partial()
})
  .partial()
  .strict();

/**
 * Model provider section of the config file
 */
export const ProviderConfigSchema = z
  .object({
    name: z.enum(['openai', 'deterministic']),
    embeddingModel: z.string().min(1),
    completionModel: z.string().min(1),
    baseURL: z.string().url(),
    dimensions: z.number().int().min(2)
  })
  .partial()
  .strict();

/**
 * .impact/config.yaml
 */
export const ConfigFileSchema = z
  .object({
    analysis: AnalysisConfigOverridesSchema,
    provider: ProviderConfigSchema
  })
  .partial()
  .strict();

/**
 * Persisted run artifact
 */
export const RunArtifactSchema = z.object({
  generatedAt: z.string(),
  title: z.string(),
  changeSet: z.array(z.string()),
  confidence: z.enum(['low', 'normal']),
  degraded: z.boolean(),
  records: z.array(z.object({
    nodeId: z.string(),
    severity: SeverityLabelSchema,
    riskEstimate: z.number().int().min(0).max(100),
    distance: z.number().int().min(0),
    evidence: z.array(z.object({
      filePath: z.string(),
      lineStart: z.number().int(),
      lineEnd: z.number().int(),
      score: z.number()
    }))
  }))
});

/**
 * Type exports
 */
export type ValidatedTopology = z.infer<typeof TopologyInputSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type SeverityThresholds = z.infer<typeof SeverityThresholdsSchema>;
export type RiskWeights = z.infer<typeof RiskWeightsSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Validation helper functions
 */
export function validateTopology(data: unknown): ValidatedTopology {
  return TopologyInputSchema.parse(data);
}

export function safeValidateTopology(data: unknown) {
  return TopologyInputSchema.safeParse(data);
}

export function safeValidateConfig(data: unknown) {
  return AnalysisConfigSchema.safeParse(data);
}

export function safeValidateConfigFile(data: unknown) {
  return ConfigFileSchema.safeParse(data);
}

/**
 * Renders the first zod issue as "path: message"
 */
export function formatIssue(error: z.ZodError): { field: string; message: string } {
  const issue = error.issues[0];
  if (!issue) {
    return { field: '', message: error.message };
  }
  const field = issue.path.join('.');
  return { field, message: field ? `${field}: ${issue.message}` : issue.message };
}
