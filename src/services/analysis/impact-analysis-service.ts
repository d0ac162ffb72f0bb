/**
 * Impact Analysis Service
 *
 * Runs one analysis end to end: configuration -> graph build ->
 * enrichment -> traversal -> retrieval -> risk aggregation. Each call
 * builds its own graph instance; nothing is shared between runs except
 * the embedding cache the caller passes in.
 */

import type { ImpactRecord, AnalysisResult, RunArtifact } from '../../models/impact.js';
import type { SourceArtifact } from '../../models/graph.js';
import type { RetrievalResult } from '../../models/evidence.js';
import { StructuralError } from '../../core/errors.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { safeValidateTopology, formatIssue, type AnalysisConfig, type ValidatedTopology } from '../../core/schemas.js';
import { normalizeChangeSet, normalizePath, validateTitle } from '../../core/validation.js';
import { resolveAnalysisConfig, type AnalysisConfigOverrides } from '../config/analysis-config.js';
import { KnowledgeGraph, compareIds } from '../graph/knowledge-graph.js';
import { enrichGraph, maxRank } from '../graph/graph-enricher.js';
import { FileOwnershipIndex } from '../impact/file-ownership.js';
import { traverseImpact } from '../impact/impact-traversal.js';
import { RetrievalService } from '../retrieval/retrieval-service.js';
import { assessRisk } from '../risk/risk-aggregator.js';
import type { ModelProvider } from '../providers/model-provider.js';
import { EmbeddingCache } from '../storage/embedding-cache.js';

export interface AnalysisRequest {
  /** Discovery output; validated before use */
  topology: unknown;
  /** Changed paths relative to the analysis root */
  changeSet: readonly string[];
  /** Unified diff text per changed path */
  diffs?: Readonly<Record<string, string>>;
}

export interface AnalysisDependencies {
  provider?: ModelProvider | null;
  cache?: EmbeddingCache;
  logger?: Logger;
}

export interface PreparedGraph {
  topology: ValidatedTopology;
  graph: KnowledgeGraph;
}

export class ImpactAnalysisService {
  readonly config: AnalysisConfig;
  private readonly log: Logger;
  private readonly retrieval: RetrievalService;

  /**
   * @throws ConfigurationError before any graph work when the configuration is invalid
   */
  constructor(config: AnalysisConfigOverrides = {}, dependencies: AnalysisDependencies = {}) {
    this.config = resolveAnalysisConfig(config);
    this.log = (dependencies.logger ?? rootLogger).child('analysis');
    this.retrieval = new RetrievalService(this.config, {
      provider: dependencies.provider,
      cache: dependencies.cache,
      logger: dependencies.logger
    });
  }

  /**
   * Validates discovery output and builds the enriched graph
   *
   * @throws StructuralError on malformed topology
   */
  prepareGraph(topology: unknown): PreparedGraph {
    const parsed = safeValidateTopology(topology);
    if (!parsed.success) {
      const { field, message } = formatIssue(parsed.error);
      throw new StructuralError(`Invalid topology: ${message}`, { field });
    }

    const graph = enrichGraph(KnowledgeGraph.fromInput(parsed.data), {
      damping: this.config.rankDamping,
      tolerance: this.config.rankTolerance,
      maxIterations: this.config.rankMaxIterations,
      betweennessNormalization: this.config.betweennessNormalization
    });
    this.log.debug('Graph enriched', { nodes: graph.size, edges: graph.edgeCount });

    return { topology: parsed.data, graph };
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const changeSet = normalizeChangeSet(request.changeSet);
    const { topology, graph } = this.prepareGraph(request.topology);
    return this.analyzeGraph(graph, topology, changeSet, request.diffs ?? {});
  }

  /**
   * Analysis over an already prepared graph; changeSet must be normalized
   */
  async analyzeGraph(
    graph: KnowledgeGraph,
    topology: ValidatedTopology,
    changeSet: readonly string[],
    diffs: Readonly<Record<string, string>> = {}
  ): Promise<AnalysisResult> {
    const ownership = new FileOwnershipIndex(graph, topology.fileOwners);
    const traversal = traverseImpact(graph, ownership, changeSet, { maxHops: this.config.maxHops });

    const artifactsByNode = groupArtifacts(graph, topology.artifacts ?? []);
    const queries = buildQueries(changeSet, diffs);
    const retrievals = await this.log.timed(
      'Retrieval',
      () =>
        this.retrieval.retrieveAll(
          traversal.impacted.map(node => ({
            nodeId: node.nodeId,
            distance: node.distance,
            artifacts: artifactsByNode.get(node.nodeId) ?? []
          })),
          queries
        ),
      { nodes: traversal.impacted.length }
    );
    const retrievalByNode = new Map(retrievals.map(result => [result.nodeId, result]));

    const highestRank = maxRank(graph);
    const records: ImpactRecord[] = [];
    for (const impacted of traversal.impacted) {
      const node = graph.getNode(impacted.nodeId);
      const retrieval = retrievalByNode.get(impacted.nodeId);
      if (!node || !retrieval) continue;

      const risk = assessRisk(
        {
          distance: impacted.distance,
          rank: node.metrics.rank,
          maxRank: highestRank,
          betweenness: node.metrics.betweenness,
          content: retrieval.contentSignal
        },
        this.config.weights,
        this.config.severityThresholds
      );

      records.push({
        nodeId: node.id,
        kind: node.kind,
        label: node.label,
        distance: impacted.distance,
        path: impacted.path,
        metrics: { ...node.metrics },
        evidence: retrieval.evidence,
        retrieval: retrievalStatus(retrieval),
        signals: risk.signals,
        riskEstimate: risk.riskEstimate,
        severity: risk.severity
      });
    }

    records.sort(
      (a, b) => b.riskEstimate - a.riskEstimate || a.distance - b.distance || compareIds(a.nodeId, b.nodeId)
    );

    const degraded = records.some(record => record.retrieval.degraded);
    this.log.info('Analysis complete', {
      changed: changeSet.length,
      entries: traversal.entryNodes.length,
      impacted: records.length,
      degraded
    });

    return {
      changeSet: [...changeSet],
      entryNodes: traversal.entryNodes,
      unmappedFiles: traversal.unmappedFiles,
      confidence: traversal.confidence,
      degraded,
      records
    };
  }
}

/**
 * Persisted shape of an analysis run, with a fixed key order
 */
export function toRunArtifact(
  result: AnalysisResult,
  options: { title?: string; generatedAt?: Date } = {}
): RunArtifact {
  return {
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    title: validateTitle(options.title),
    changeSet: [...result.changeSet],
    confidence: result.confidence,
    degraded: result.degraded,
    records: result.records.map(record => ({
      nodeId: record.nodeId,
      severity: record.severity,
      riskEstimate: record.riskEstimate,
      distance: record.distance,
      evidence: record.evidence.map(({ chunk, score }) => ({
        filePath: chunk.filePath,
        lineStart: chunk.lineStart,
        lineEnd: chunk.lineEnd,
        score
      }))
    }))
  };
}

function retrievalStatus(result: RetrievalResult): ImpactRecord['retrieval'] {
  const status: ImpactRecord['retrieval'] = { mode: result.mode, degraded: result.degraded };
  if (result.reason !== undefined) {
    status.reason = result.reason;
  }
  return status;
}

function groupArtifacts(graph: KnowledgeGraph, artifacts: readonly SourceArtifact[]): Map<string, SourceArtifact[]> {
  const grouped = new Map<string, SourceArtifact[]>();
  for (const artifact of artifacts) {
    if (!graph.hasNode(artifact.nodeId)) {
      throw new StructuralError(`Artifact ${artifact.filePath} references unknown node: ${artifact.nodeId}`, {
        nodeId: artifact.nodeId
      });
    }
    const list = grouped.get(artifact.nodeId) ?? [];
    list.push({ ...artifact, filePath: normalizePath(artifact.filePath) });
    grouped.set(artifact.nodeId, list);
  }
  return grouped;
}

/**
 * One query per changed file: its diff when there is one, else its path
 */
function buildQueries(changeSet: readonly string[], diffs: Readonly<Record<string, string>>): string[] {
  return changeSet.map(path => {
    const diff = diffs[path];
    return diff !== undefined && diff.trim().length > 0 ? diff : path;
  });
}
