/**
 * DeterministicModelProvider: offline provider for tests and air-gapped runs.
 *
 * Embeddings are token-count histograms hashed into a fixed number of
 * buckets and L2-normalized, so texts sharing vocabulary land close
 * together. Completions are canned.
 */

import { tokenize } from '../retrieval/tokenizer.js';
import type { ModelProvider } from './model-provider.js';

export interface DeterministicProviderOptions {
  /** Vector length (default: 64) */
  dimensions?: number;
}

export const CANNED_COMPLETION_PREFIX = 'Deterministic narrative:';

export class DeterministicModelProvider implements ModelProvider {
  readonly name = 'deterministic';
  readonly embeddingModel: string;
  private readonly dimensions: number;

  constructor(options: DeterministicProviderOptions = {}) {
    this.dimensions = options.dimensions ?? 64;
    this.embeddingModel = `hash-bucket-${this.dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.bucketize(text));
  }

  /**
   * Echoes the first non-empty prompt line behind a fixed prefix
   */
  async complete(prompt: string): Promise<string> {
    const headline = prompt.split('\n').find(line => line.trim().length > 0)?.trim() ?? '';
    return `${CANNED_COMPLETION_PREFIX} ${headline}`.trimEnd();
  }

  private bucketize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm > 0 ? vector.map(value => value / norm) : vector;
  }
}

/**
 * 32-bit FNV-1a, unsigned
 */
export function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
