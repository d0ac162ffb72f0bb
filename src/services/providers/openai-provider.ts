/**
 * OpenAIModelProvider: ModelProvider backed by the AI SDK.
 *
 * The API key is read lazily so that constructing the provider never
 * fails; a missing key surfaces as a ProviderError on first use, which
 * retrieval turns into lexical fallback.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { embedMany, generateText } from 'ai';
import { ProviderError, describeError } from '../../core/errors.js';
import type { CompletionOptions, ModelProvider, ProviderCallOptions } from './model-provider.js';

export interface OpenAIProviderOptions {
  /** Defaults to OPENAI_API_KEY */
  apiKey?: string;
  baseURL?: string;
  embeddingModel?: string;
  completionModel?: string;
  /** Retries the SDK performs on transient failures */
  maxRetries?: number;
}

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_COMPLETION_MODEL = 'gpt-4o-mini';

export class OpenAIModelProvider implements ModelProvider {
  readonly name = 'openai';
  readonly embeddingModel: string;
  readonly completionModel: string;

  constructor(private readonly options: OpenAIProviderOptions = {}) {
    this.embeddingModel = options.embeddingModel ?? DEFAULT_EMBEDDING_MODEL;
    this.completionModel = options.completionModel ?? DEFAULT_COMPLETION_MODEL;
  }

  private client() {
    const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ProviderError('OPENAI_API_KEY is not configured', this.name);
    }
    return createOpenAI({ apiKey, baseURL: this.options.baseURL });
  }

  async embed(texts: string[], options: ProviderCallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const openai = this.client();

    try {
      const result = await embedMany({
        model: openai.embedding(this.embeddingModel),
        values: texts,
        abortSignal: options.signal,
        maxRetries: this.options.maxRetries ?? 2
      });
      return result.embeddings;
    } catch (error) {
      throw new ProviderError(`Embedding request failed: ${describeError(error)}`, this.name, {
        model: this.embeddingModel
      });
    }
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const openai = this.client();

    try {
      const result = await generateText({
        model: openai(this.completionModel),
        system: options.system,
        prompt,
        abortSignal: options.signal,
        maxRetries: this.options.maxRetries ?? 2
      });
      return result.text;
    } catch (error) {
      throw new ProviderError(`Completion request failed: ${describeError(error)}`, this.name, {
        model: this.completionModel
      });
    }
  }
}
