import { describeError, silentLogger, type Logger } from './logger.js';
import type { AnswerCache, AnswerStore } from './types.js';

export const DEFAULT_TIMEOUT_MS = 2000;

/**
 * Options for createAnswerCache().
 */
export interface AnswerCacheOptions {
  store: AnswerStore;

  /** Upper bound for each backend call in milliseconds. Defaults to 2000 */
  timeoutMs?: number;

  logger?: Logger;

  /** Called on cache hit */
  onHitCallback?: (question: string) => void;

  /** Called on cache miss */
  onMissCallback?: (question: string) => void;
}

class CacheTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CacheTimeoutError';
  }
}

/**
 * Race `promise` against a timer; the timer is always cleared.
 */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CacheTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wraps a store so that caching stays a pure optimization.
 *
 * A backend failure or a call slower than `timeoutMs` is logged and turned
 * into a miss on `get` or a no-op on `set`.
 *
 * @example
 * ```typescript
 * const cache = createAnswerCache({ store: createMemoryStore({ maxSize: 100 }) });
 *
 * await cache.set('Who painted the Night Watch?', 'Rembrandt.');
 * await cache.get('Who painted the Night Watch?'); // 'Rembrandt.'
 * await cache.get('who painted the night watch?'); // undefined
 * ```
 */
export function createAnswerCache(options: AnswerCacheOptions): AnswerCache {
  const {
    store,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    logger = silentLogger,
    onHitCallback,
    onMissCallback,
  } = options;

  if (typeof timeoutMs !== 'number' || timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
    throw new Error('timeoutMs must be a positive finite number');
  }

  return {
    backend: store.kind,

    async get(question: string): Promise<string | undefined> {
      let answer: string | undefined;
      try {
        answer = await withTimeout(store.get(question), timeoutMs, `${store.kind} get`);
      } catch (error) {
        logger.warn(`Cache read failed, treating as miss: ${describeError(error)}`);
        return undefined;
      }

      if (answer === undefined) {
        logger.debug(`Cache miss for question: ${question}`);
        onMissCallback?.(question);
      } else {
        logger.debug(`Cache hit for question: ${question}`);
        onHitCallback?.(question);
      }
      return answer;
    },

    async set(question: string, answer: string): Promise<void> {
      try {
        await withTimeout(store.set(question, answer), timeoutMs, `${store.kind} set`);
      } catch (error) {
        logger.warn(`Cache write failed, answer not cached: ${describeError(error)}`);
      }
    },
  };
}
