import type { AnswerStore, MemoryStoreOptions } from '../types.js';

export const DEFAULT_MAX_SIZE = 100;

/**
 * Creates an in-memory answer store with LRU eviction.
 *
 * Recency is the insertion order of the underlying Map: every use deletes and
 * re-inserts the key, so the first key is always the least recently used.
 * All mutations run synchronously, so concurrent callers never observe a
 * half-updated structure.
 */
export function createMemoryStore(options: MemoryStoreOptions = {}): AnswerStore {
  const { maxSize, onEvictCallback } = options;

  if (maxSize !== undefined && (typeof maxSize !== 'number' || maxSize <= 0 || !Number.isInteger(maxSize))) {
    throw new Error('maxSize must be a positive integer');
  }

  const effectiveMaxSize = maxSize ?? DEFAULT_MAX_SIZE;

  const cache = new Map<string, string>();

  function touch(key: string, value: string): void {
    cache.delete(key);
    cache.set(key, value);
  }

  function evictLeastRecentlyUsed(): void {
    const oldest = cache.entries().next();
    if (oldest.done) return;

    const [lruKey, evictedValue] = oldest.value;
    cache.delete(lruKey);
    onEvictCallback?.(lruKey, evictedValue);
  }

  return {
    kind: 'memory',

    async get(key: string): Promise<string | undefined> {
      const value = cache.get(key);
      if (value !== undefined) {
        touch(key, value);
      }
      return value;
    },

    async set(key: string, value: string): Promise<void> {
      if (!cache.has(key)) {
        while (cache.size >= effectiveMaxSize) {
          evictLeastRecentlyUsed();
        }
      }
      touch(key, value);
    },

    async delete(key: string): Promise<void> {
      cache.delete(key);
    },

    async clear(): Promise<void> {
      cache.clear();
    },

    async has(key: string): Promise<boolean> {
      return cache.has(key);
    },
  };
}
