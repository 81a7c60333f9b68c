import { createAnswerCache } from './answer-cache.js';
import type { AppConfig } from './config.js';
import { describeError, type Logger } from './logger.js';
import { createMemoryStore } from './stores/memory-store.js';
import { createRedisStore, createUpstashClient, type UpstashClientOptions } from './stores/redis-store.js';
import type { AnswerCache, AnswerStore, KeyValueClient } from './types.js';

export interface CreateCacheDependencies {
  logger: Logger;
  /** Builds the external-store client. Defaults to the Upstash REST client */
  createClient?: (options: UpstashClientOptions) => KeyValueClient;
}

/**
 * Pick the backend once, at startup.
 *
 * When the external store is requested but its client cannot be built, the
 * in-process store is used instead and a warning is logged.
 */
export function createCacheFromConfig(
  config: AppConfig['cache'],
  deps: CreateCacheDependencies
): AnswerCache {
  const { logger, createClient = createUpstashClient } = deps;
  const cacheLogger = logger.child('cache');

  function memoryStore(): AnswerStore {
    cacheLogger.info(`Using in-process LRU cache (maxSize=${config.maxSize})`);
    return createMemoryStore({
      maxSize: config.maxSize,
      onEvictCallback: (key) => cacheLogger.debug(`Evicted least recently used question: ${key}`),
    });
  }

  function redisStore(): AnswerStore | undefined {
    if (!config.redisToken) {
      cacheLogger.warn('USE_REDIS is set but REDIS_TOKEN is missing. Falling back to LRU cache.');
      return undefined;
    }

    try {
      const client = createClient({ url: config.redisUrl, token: config.redisToken });
      cacheLogger.info(`Redis cache enabled at ${config.redisUrl} (ttl=${config.ttlSeconds}s)`);
      return createRedisStore({
        client,
        prefix: config.keyPrefix,
        ttlSeconds: config.ttlSeconds,
      });
    } catch (error) {
      cacheLogger.warn(`Redis client unavailable (${describeError(error)}). Falling back to LRU cache.`);
      return undefined;
    }
  }

  const store = (config.useRedis ? redisStore() : undefined) ?? memoryStore();

  return createAnswerCache({
    store,
    timeoutMs: config.timeoutMs,
    logger: cacheLogger,
  });
}
