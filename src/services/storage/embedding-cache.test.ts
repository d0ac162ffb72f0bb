// Embedding cache tests

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EmbeddingCache } from './embedding-cache.js';
import { StorageError } from '../../core/errors.js';

describe('EmbeddingCache', () => {
  let cache: EmbeddingCache;

  beforeEach(() => {
    cache = new EmbeddingCache();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('get/set', () => {
    it('should return null for empty cache', () => {
      expect(cache.get('model-a', 'hello')).toBeNull();
    });

    it('should store and retrieve vectors', () => {
      cache.set('model-a', 'hello', [0.1, 0.2]);
      expect(cache.get('model-a', 'hello')).toEqual([0.1, 0.2]);
    });

    it('should keep vectors of different models apart', () => {
      cache.set('model-a', 'hello', [1, 0]);
      expect(cache.get('model-b', 'hello')).toBeNull();
    });

    it('should not hand out its internal array', () => {
      cache.set('model-a', 'hello', [1, 2]);
      const first = cache.get('model-a', 'hello');
      first?.push(3);
      expect(cache.get('model-a', 'hello')).toEqual([1, 2]);
    });

    it('should count hits and misses', () => {
      cache.set('m', 'x', [1]);
      cache.get('m', 'x');
      cache.get('m', 'y');
      expect(cache.getStats()).toEqual({ size: 1, hits: 1, misses: 1, enabled: true });
    });
  });

  describe('TTL expiration', () => {
    it('should expire entries after TTL', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      cache = new EmbeddingCache({ ttl: 50 });
      cache.set('m', 'x', [1]);
      expect(cache.get('m', 'x')).not.toBeNull();

      vi.setSystemTime(new Date('2024-01-01T00:00:00.060Z'));
      expect(cache.get('m', 'x')).toBeNull();
    });
  });

  describe('invalidate', () => {
    it('should drop a single entry', () => {
      cache.set('m', 'x', [1]);
      cache.set('m', 'y', [2]);
      cache.invalidate('m', 'x');
      expect(cache.get('m', 'x')).toBeNull();
      expect(cache.get('m', 'y')).toEqual([2]);
    });

    it('should clear all entries', () => {
      cache.set('m', 'x', [1]);
      cache.set('m', 'y', [2]);
      cache.invalidate();
      expect(cache.getStats().size).toBe(0);
    });
  });

  describe('eviction', () => {
    it('should evict the oldest entry at capacity', () => {
      vi.useFakeTimers();
      cache = new EmbeddingCache({ maxEntries: 2 });
      vi.setSystemTime(1000);
      cache.set('m', 'first', [1]);
      vi.setSystemTime(2000);
      cache.set('m', 'second', [2]);
      vi.setSystemTime(3000);
      cache.set('m', 'third', [3]);

      expect(cache.get('m', 'first')).toBeNull();
      expect(cache.get('m', 'second')).toEqual([2]);
      expect(cache.get('m', 'third')).toEqual([3]);
    });
  });

  describe('disabled cache', () => {
    it('should neither store nor return entries', () => {
      cache = new EmbeddingCache({ enabled: false });
      cache.set('m', 'x', [1]);
      expect(cache.get('m', 'x')).toBeNull();
      expect(cache.getStats().size).toBe(0);
    });
  });

  describe('snapshots', () => {
    it('should restore exported entries into a fresh cache', () => {
      cache.set('m', 'x', [0.5, 0.25]);
      const snapshot = JSON.parse(JSON.stringify(cache.exportSnapshot()));

      const restored = new EmbeddingCache();
      expect(restored.importSnapshot(snapshot)).toBe(1);
      expect(restored.get('m', 'x')).toEqual([0.5, 0.25]);
    });

    it('should skip expired entries on import', () => {
      vi.useFakeTimers();
      vi.setSystemTime(10_000);
      const snapshot = {
        version: 1,
        entries: [
          { key: EmbeddingCache.keyFor('m', 'old'), vector: [1], timestamp: 0, expiresAt: 5_000 },
          { key: EmbeddingCache.keyFor('m', 'new'), vector: [2], timestamp: 9_000, expiresAt: 20_000 }
        ]
      };
      expect(cache.importSnapshot(snapshot)).toBe(1);
      expect(cache.get('m', 'new')).toEqual([2]);
    });

    it('should reject malformed snapshots', () => {
      expect(() => cache.importSnapshot({ version: 2, entries: [] })).toThrow(StorageError);
      expect(() => cache.importSnapshot({ version: 1, entries: [{ key: 'short' }] })).toThrow(StorageError);
    });
  });
});
