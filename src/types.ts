/**
 * An answer stored by the external-store backend.
 */
export interface CacheEntry {
  /** The cached answer */
  value: string;
  /** Unix timestamp (ms) when entry was created */
  createdAt: number;
  /** Unix timestamp (ms) when entry expires */
  expiresAt: number;
}

/** Returns the current time in milliseconds. */
export type Clock = () => number;

export type BackendKind = 'memory' | 'redis';

/**
 * Storage backend interface.
 * Implementations may throw on I/O failure; `createAnswerCache` absorbs it.
 */
export interface AnswerStore {
  readonly kind: BackendKind;
  /** Retrieve a value by key (returns undefined if not found or expired) */
  get(key: string): Promise<string | undefined>;
  /** Store a value, replacing any previous one */
  set(key: string, value: string): Promise<void>;
  /** Remove a value by key */
  delete(key: string): Promise<void>;
  /** Remove all values owned by this store */
  clear(): Promise<void>;
  /** Check if key exists (does not count as a use) */
  has(key: string): Promise<boolean>;
}

/**
 * Question-to-answer cache consumed by the request handler.
 * Neither method ever rejects.
 */
export interface AnswerCache {
  readonly backend: BackendKind;
  get(question: string): Promise<string | undefined>;
  set(question: string, answer: string): Promise<void>;
}

/**
 * Options for the in-memory store.
 */
export interface MemoryStoreOptions {
  /** Maximum number of entries (LRU eviction when exceeded). Defaults to 100 */
  maxSize?: number;

  /** Called when an entry is evicted */
  onEvictCallback?: (key: string, value: string) => void;
}

/**
 * The subset of a Redis client the external store needs.
 */
export interface KeyValueClient {
  get(key: string): Promise<unknown>;
  set(key: string, value: string, ttlSeconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  exists(key: string): Promise<number>;
}

/**
 * Options for the external key-value store.
 */
export interface RedisStoreOptions {
  client: KeyValueClient;

  /** Namespace prepended to every key. Defaults to `culturebot:qa:` */
  prefix?: string;

  /** Entry time to live in seconds. Defaults to 86400 */
  ttlSeconds?: number;

  /** Defaults to Date.now */
  now?: Clock;
}
