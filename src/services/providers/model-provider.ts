/**
 * Model provider port: embeddings for retrieval, completions for reporting.
 * Implementations raise ProviderError on failure.
 */

export interface ProviderCallOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

export interface CompletionOptions extends ProviderCallOptions {
  system?: string;
}

export interface ModelProvider {
  /** Provider name, used in logs and degraded-mode reasons */
  readonly name: string;
  /** Embedding model id; part of the embedding cache key */
  readonly embeddingModel: string;

  embed(texts: string[], options?: ProviderCallOptions): Promise<number[][]>;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export type ProviderName = 'openai' | 'deterministic';

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'deterministic'];
