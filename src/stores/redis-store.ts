import { Redis } from '@upstash/redis';
import { createEntry, isExpired, parseEntry } from '../entry.js';
import type { AnswerStore, KeyValueClient, RedisStoreOptions } from '../types.js';

export const DEFAULT_KEY_PREFIX = 'culturebot:qa:';
export const DEFAULT_TTL_SECONDS = 86_400;

export interface UpstashClientOptions {
  url: string;
  token: string;
}

/**
 * Adapt an Upstash REST client to the `KeyValueClient` surface.
 *
 * Values come back as raw strings (no automatic JSON decoding) and requests
 * are not retried: the answer cache applies its own timeout instead.
 */
export function createUpstashClient(options: UpstashClientOptions): KeyValueClient {
  const redis = new Redis({
    url: options.url,
    token: options.token,
    automaticDeserialization: false,
    retry: { retries: 0 },
  });

  return {
    get: (key) => redis.get<string>(key),
    set: (key, value, ttlSeconds) => redis.set(key, value, { ex: ttlSeconds }),
    del: (...keys) => redis.del(...keys),
    keys: (pattern) => redis.keys(pattern),
    exists: (key) => redis.exists(key),
  };
}

/**
 * Creates an answer store backed by an external key-value store.
 *
 * Entries are written as JSON with an explicit TTL. A stored value that does
 * not decode to an entry, or whose `expiresAt` has passed, reads as a miss.
 */
export function createRedisStore(options: RedisStoreOptions): AnswerStore {
  const {
    client,
    prefix = DEFAULT_KEY_PREFIX,
    ttlSeconds = DEFAULT_TTL_SECONDS,
    now = Date.now,
  } = options;

  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new Error('ttlSeconds must be a positive integer');
  }

  const toKey = (key: string): string => `${prefix}${key}`;

  return {
    kind: 'redis',

    async get(key: string): Promise<string | undefined> {
      const entry = parseEntry(await client.get(toKey(key)));
      if (!entry || isExpired(entry, now)) return undefined;
      return entry.value;
    },

    async set(key: string, value: string): Promise<void> {
      const entry = createEntry(value, ttlSeconds * 1000, now);
      await client.set(toKey(key), JSON.stringify(entry), ttlSeconds);
    },

    async delete(key: string): Promise<void> {
      await client.del(toKey(key));
    },

    async clear(): Promise<void> {
      // KEYS is O(N) over the whole keyspace
      const keys = await client.keys(`${prefix}*`);
      if (keys.length > 0) {
        await client.del(...keys);
      }
    },

    async has(key: string): Promise<boolean> {
      return (await client.exists(toKey(key))) === 1;
    },
  };
}
