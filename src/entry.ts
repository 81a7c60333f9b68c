import { z } from 'zod';
import type { CacheEntry, Clock } from './types.js';

const cacheEntrySchema = z.object({
  value: z.string(),
  createdAt: z.number().finite(),
  expiresAt: z.number().finite(),
});

/**
 * Check if a cache entry has expired.
 * An entry is gone once its full time to live has elapsed.
 */
export function isExpired(entry: CacheEntry, now: Clock = Date.now): boolean {
  return now() >= entry.expiresAt;
}

/**
 * Create a cache entry with time to live (in milliseconds).
 */
export function createEntry(value: string, timeToLive: number, now: Clock = Date.now): CacheEntry {
  const createdAt = now();
  return {
    value,
    createdAt,
    expiresAt: createdAt + timeToLive,
  };
}

/**
 * Decode a stored entry. Anything that is not a JSON-encoded entry yields undefined.
 */
export function parseEntry(raw: unknown): CacheEntry | undefined {
  if (typeof raw !== 'string') return undefined;

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const result = cacheEntrySchema.safeParse(decoded);
  return result.success ? result.data : undefined;
}
