/**
 * Retrieval Service
 *
 * Picks the evidence chunks most relevant to a change for each impacted
 * node. Semantic scoring embeds chunks and change queries and ranks by
 * cosine similarity; when embeddings are disabled, unavailable, failing
 * or too slow, chunks are ranked by lexical token overlap instead and the
 * result is flagged as degraded. Provider failures never propagate.
 */

import type { EvidenceChunk, RetrievalResult, ScoredEvidence } from '../../models/evidence.js';
import type { SourceArtifact } from '../../models/graph.js';
import type { RetrievalMode } from '../../models/types.js';
import { ProviderError, describeError } from '../../core/errors.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import type { ModelProvider } from '../providers/model-provider.js';
import { EmbeddingCache } from '../storage/embedding-cache.js';
import { compareIds } from '../graph/knowledge-graph.js';
import { chunkArtifacts } from './chunker.js';
import { distinctTokens, overlapCount } from './tokenizer.js';
import { VectorIndex } from './vector-index.js';

export interface RetrievalOptions {
  topK: number;
  embeddingEnabled: boolean;
  chunkMaxChars: number;
  chunkOverlapChars: number;
  embeddingTimeoutMs: number;
  retrievalConcurrency: number;
}

export interface RetrievalDependencies {
  /** Null or absent: lexical scoring only */
  provider?: ModelProvider | null;
  cache?: EmbeddingCache;
  logger?: Logger;
}

/**
 * One impacted node to gather evidence for
 */
export interface RetrievalRequest {
  nodeId: string;
  /** Traversal distance of the node; an ordering key for ties */
  distance: number;
  artifacts: readonly SourceArtifact[];
}

interface ScoredChunk {
  chunk: EvidenceChunk;
  score: number;
  distance: number;
}

export class RetrievalService {
  private readonly provider: ModelProvider | null;
  private readonly cache: EmbeddingCache | null;
  private readonly log: Logger;

  constructor(
    private readonly options: RetrievalOptions,
    dependencies: RetrievalDependencies = {}
  ) {
    this.provider = dependencies.provider ?? null;
    this.cache = dependencies.cache ?? null;
    this.log = (dependencies.logger ?? rootLogger).child('retrieval');
  }

  /**
   * Evidence for a single node. Returns exactly min(topK, chunks) items.
   *
   * @param queries change-set query texts (per-file diffs, or file paths)
   */
  async retrieve(request: RetrievalRequest, queries: readonly string[]): Promise<RetrievalResult> {
    const artifacts = [...request.artifacts].sort((a, b) => compareIds(a.filePath, b.filePath));
    const chunks = chunkArtifacts(artifacts, {
      maxChars: this.options.chunkMaxChars,
      overlapChars: this.options.chunkOverlapChars
    });

    if (!this.options.embeddingEnabled) {
      return this.lexical(request, chunks, queries, { degraded: true, reason: 'embeddings disabled' });
    }

    if (!this.provider) {
      return this.lexical(request, chunks, queries, { degraded: true, reason: 'no embedding provider configured' });
    }

    if (chunks.length === 0) {
      return this.finish(request.nodeId, 'semantic', [], 0, { degraded: false });
    }

    try {
      return await this.semantic(this.provider, request, chunks, queries);
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      this.log.warn('Embedding failed, falling back to lexical scoring', {
        nodeId: request.nodeId,
        provider: error.provider,
        reason: error.message
      });
      return this.lexical(request, chunks, queries, { degraded: true, reason: error.message });
    }
  }

  /**
   * Evidence for many nodes, at most retrievalConcurrency at a time.
   * Results are sorted by node id regardless of completion order.
   */
  async retrieveAll(requests: readonly RetrievalRequest[], queries: readonly string[]): Promise<RetrievalResult[]> {
    const results: RetrievalResult[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < requests.length) {
        const request = requests[next++];
        results.push(await this.retrieve(request, queries));
      }
    };

    const workers = Math.min(this.options.retrievalConcurrency, requests.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    return results.sort((a, b) => compareIds(a.nodeId, b.nodeId));
  }

  private async semantic(
    provider: ModelProvider,
    request: RetrievalRequest,
    chunks: EvidenceChunk[],
    queries: readonly string[]
  ): Promise<RetrievalResult> {
    const queryTexts = queries.filter(query => query.trim().length > 0);
    const vectors = await this.embedWithCache(provider, [...queryTexts, ...chunks.map(chunk => chunk.text)]);
    const queryVectors = vectors.slice(0, queryTexts.length);
    const chunkVectors = vectors.slice(queryTexts.length);

    const index = new VectorIndex();
    const embedded = chunks.map((chunk, i) => {
      index.add(chunkVectors[i]);
      return { ...chunk, embedding: chunkVectors[i] };
    });
    const similarities = index.maxSimilarity(queryVectors);

    const scored = embedded.map((chunk, i) => ({ chunk, score: similarities[i], distance: request.distance }));
    const best = scored.reduce((max, item) => Math.max(max, item.score), 0);
    return this.finish(request.nodeId, 'semantic', scored, clampUnit(best), { degraded: false });
  }

  private lexical(
    request: RetrievalRequest,
    chunks: EvidenceChunk[],
    queries: readonly string[],
    status: { degraded: boolean; reason: string }
  ): RetrievalResult {
    const queryTokens = distinctTokens(queries.join('\n'));
    const scored = chunks.map(chunk => ({
      chunk,
      score: overlapCount(queryTokens, chunk.text),
      distance: request.distance
    }));
    const best = scored.reduce((max, item) => Math.max(max, item.score), 0);
    const signal = queryTokens.size > 0 ? best / queryTokens.size : 0;
    return this.finish(request.nodeId, 'lexical', scored, signal, status);
  }

  private finish(
    nodeId: string,
    mode: RetrievalMode,
    scored: ScoredChunk[],
    contentSignal: number,
    status: { degraded: boolean; reason?: string }
  ): RetrievalResult {
    const evidence: ScoredEvidence[] = [...scored]
      .sort(compareScored)
      .slice(0, this.options.topK)
      .map(({ chunk, score }) => ({ chunk, score }));

    const result: RetrievalResult = { nodeId, mode, degraded: status.degraded, evidence, contentSignal };
    if (status.reason !== undefined) {
      result.reason = status.reason;
    }
    return result;
  }

  /**
   * Embeds texts, consulting the cache first; only misses reach the provider
   */
  private async embedWithCache(provider: ModelProvider, texts: string[]): Promise<number[][]> {
    const vectors: Array<number[] | null> = texts.map(text => this.cache?.get(provider.embeddingModel, text) ?? null);
    const missing = [...new Set(texts.filter((_, i) => vectors[i] === null))];

    if (missing.length > 0) {
      const fresh = await this.withTimeout(provider, signal => provider.embed(missing, { signal }));
      if (fresh.length !== missing.length) {
        throw new ProviderError(
          `Provider returned ${fresh.length} embeddings for ${missing.length} texts`,
          provider.name
        );
      }
      const byText = new Map(missing.map((text, i) => [text, fresh[i]]));
      for (const [text, vector] of byText) {
        this.cache?.set(provider.embeddingModel, text, vector);
      }
      texts.forEach((text, i) => {
        if (vectors[i] === null) vectors[i] = byText.get(text) ?? null;
      });
    }

    return vectors.map(vector => vector ?? []);
  }

  /**
   * Runs a provider call under embeddingTimeoutMs. Expiry aborts the call
   * and rejects with ProviderError; other failures are wrapped the same way.
   */
  private async withTimeout<T>(provider: ModelProvider, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ProviderError(`Embedding timed out after ${this.options.embeddingTimeoutMs}ms`, provider.name));
        controller.abort();
      }, this.options.embeddingTimeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), timeout]);
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`Embedding failed: ${describeError(error)}`, provider.name);
    } finally {
      clearTimeout(timer);
    }
  }
}

function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  return (
    b.score - a.score ||
    a.distance - b.distance ||
    compareIds(a.chunk.filePath, b.chunk.filePath) ||
    a.chunk.lineStart - b.chunk.lineStart
  );
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}
