// In-memory embedding cache keyed by model and text digest

import { createHash } from 'crypto';
import { z } from 'zod';
import { StorageError } from '../../core/errors.js';
import { formatIssue } from '../../core/schemas.js';

/**
 * Cache entry with TTL support
 */
interface CacheEntry {
  vector: number[];
  timestamp: number;
  expiresAt: number;
}

/**
 * Cache configuration options
 */
export interface EmbeddingCacheConfig {
  /** Time-to-live in milliseconds (default: 7 days) */
  ttl: number;
  /** Maximum number of entries (default: 10000) */
  maxEntries: number;
  /** Enable/disable cache (default: true) */
  enabled: boolean;
}

const DEFAULT_CONFIG: EmbeddingCacheConfig = {
  ttl: 7 * 24 * 60 * 60 * 1000,
  maxEntries: 10000,
  enabled: true
};

export const EmbeddingCacheSnapshotSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.object({
    key: z.string().regex(/^[0-9a-f]{64}$/),
    vector: z.array(z.number().finite()),
    timestamp: z.number(),
    expiresAt: z.number()
  }))
});

export type EmbeddingCacheSnapshot = z.infer<typeof EmbeddingCacheSnapshotSchema>;

/**
 * Embedding cache with TTL and oldest-first eviction.
 *
 * Constructed by the caller and passed into retrieval; persistence is the
 * caller's business through exportSnapshot()/importSnapshot().
 */
export class EmbeddingCache {
  private cache: Map<string, CacheEntry> = new Map();
  private config: EmbeddingCacheConfig;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<EmbeddingCacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * sha256 over model id and text, so vectors never cross models
   */
  static keyFor(model: string, text: string): string {
    return createHash('sha256').update(model).update('\u0000').update(text).digest('hex');
  }

  get(model: string, text: string): number[] | null {
    if (!this.config.enabled) return null;

    const key = EmbeddingCache.keyFor(model, text);
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return null;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      this.misses++;
      return null;
    }

    this.hits++;
    return [...entry.vector];
  }

  set(model: string, text: string, vector: readonly number[]): void {
    if (!this.config.enabled) return;

    const key = EmbeddingCache.keyFor(model, text);
    if (!this.cache.has(key) && this.cache.size >= this.config.maxEntries) {
      this.evictOldest();
    }

    const now = Date.now();
    this.cache.set(key, {
      vector: [...vector],
      timestamp: now,
      expiresAt: now + this.config.ttl
    });
  }

  /**
   * Drops one entry, or everything when no text is given
   */
  invalidate(model?: string, text?: string): void {
    if (model !== undefined && text !== undefined) {
      this.cache.delete(EmbeddingCache.keyFor(model, text));
      return;
    }
    this.cache.clear();
  }

  private evictOldest(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of this.cache) {
      if (entry.timestamp < oldestTime) {
        oldestTime = entry.timestamp;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.cache.delete(oldestKey);
    }
  }

  getStats(): { size: number; hits: number; misses: number; enabled: boolean } {
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      enabled: this.config.enabled
    };
  }

  /**
   * Live entries in insertion order
   */
  exportSnapshot(): EmbeddingCacheSnapshot {
    const now = Date.now();
    const entries: EmbeddingCacheSnapshot['entries'] = [];
    for (const [key, entry] of this.cache) {
      if (entry.expiresAt < now) continue;
      entries.push({ key, vector: [...entry.vector], timestamp: entry.timestamp, expiresAt: entry.expiresAt });
    }
    return { version: 1, entries };
  }

  /**
   * Loads a snapshot produced by exportSnapshot(); expired entries are skipped.
   * Returns the number of entries loaded.
   *
   * @throws StorageError when the snapshot is malformed
   */
  importSnapshot(data: unknown): number {
    const parsed = EmbeddingCacheSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError(`Invalid embedding cache snapshot: ${formatIssue(parsed.error).message}`);
    }

    const now = Date.now();
    let loaded = 0;
    for (const entry of parsed.data.entries) {
      if (entry.expiresAt < now) continue;
      if (!this.cache.has(entry.key) && this.cache.size >= this.config.maxEntries) {
        this.evictOldest();
      }
      this.cache.set(entry.key, { vector: entry.vector, timestamp: entry.timestamp, expiresAt: entry.expiresAt });
      loaded++;
    }
    return loaded;
  }
}
