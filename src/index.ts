// Cache
export { createAnswerCache, DEFAULT_TIMEOUT_MS } from './answer-cache.js';
export { createCacheFromConfig } from './create-cache.js';

// Stores
export { createMemoryStore, DEFAULT_MAX_SIZE } from './stores/memory-store.js';
export {
  createRedisStore,
  createUpstashClient,
  DEFAULT_KEY_PREFIX,
  DEFAULT_TTL_SECONDS,
} from './stores/redis-store.js';

// Request handling
export { createAskHandler } from './ask.js';
export { createAnswerClient, extractAnswer, formatPrompt } from './answer-client.js';
export { createApp } from './server.js';

// Ambient
export { loadConfig, DEFAULT_HF_API_URL, DEFAULT_MODEL } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export {
  AppError,
  BadRequestError,
  ConfigError,
  AnswerGenerationError,
  AnswerTimeoutError,
} from './errors.js';

// Types (re-export for consumers)
export type {
  AnswerCache,
  AnswerStore,
  BackendKind,
  CacheEntry,
  Clock,
  KeyValueClient,
  MemoryStoreOptions,
  RedisStoreOptions,
} from './types.js';

export type { AnswerCacheOptions } from './answer-cache.js';
export type { AppConfig } from './config.js';
export type { AskHandler, AskHandlerOptions, AskResult } from './ask.js';
export type { AnswerClientOptions, GenerateAnswer } from './answer-client.js';
export type { AppOptions } from './server.js';
export type { Logger, LogLevel, LogSink } from './logger.js';
export type { UpstashClientOptions } from './stores/redis-store.js';

// Utilities (for custom store implementations)
export { isExpired, createEntry, parseEntry } from './entry.js';
