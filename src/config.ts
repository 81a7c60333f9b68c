import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './answer-cache.js';
import { DEFAULT_MAX_SIZE } from './stores/memory-store.js';
import { DEFAULT_KEY_PREFIX, DEFAULT_TTL_SECONDS } from './stores/redis-store.js';

export const DEFAULT_MODEL = 'mistralai/Mistral-7B-Instruct';
export const DEFAULT_HF_API_URL = `https://api-inference.huggingface.co/models/${DEFAULT_MODEL}`;

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/** Largest delay setTimeout honors; anything above fires after 1ms. */
const MAX_TIMER_MS = 2_147_483_647;

const timeoutMs = (fallback: number) =>
  z.coerce.number().int().positive().max(MAX_TIMER_MS).default(fallback);

/** Treat empty strings the same as unset variables. */
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  USE_REDIS: z.preprocess(blankAsUndefined, booleanFlag.default('false')),
  REDIS_URL: z.preprocess(blankAsUndefined, z.string().url().default('http://localhost:8079')),
  REDIS_TOKEN: z.preprocess(blankAsUndefined, z.string().optional()),
  CACHE_MAX_SIZE: z.preprocess(blankAsUndefined, positiveInt(DEFAULT_MAX_SIZE)),
  CACHE_TTL_SECONDS: z.preprocess(blankAsUndefined, positiveInt(DEFAULT_TTL_SECONDS)),
  CACHE_TIMEOUT_MS: z.preprocess(blankAsUndefined, timeoutMs(DEFAULT_TIMEOUT_MS)),
  CACHE_KEY_PREFIX: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_KEY_PREFIX)),
  HF_TOKEN: z.preprocess(blankAsUndefined, z.string().optional()),
  HF_API_URL: z.preprocess(blankAsUndefined, z.string().url().default(DEFAULT_HF_API_URL)),
  HF_TIMEOUT_MS: z.preprocess(blankAsUndefined, timeoutMs(30_000)),
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65_535).default(8000)),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.string().toLowerCase().pipe(z.enum(['debug', 'info', 'warn', 'error'])).default('info')
  ),
});

export interface AppConfig {
  cache: {
    useRedis: boolean;
    redisUrl: string;
    redisToken?: string;
    maxSize: number;
    ttlSeconds: number;
    timeoutMs: number;
    keyPrefix: string;
  };
  model: {
    apiUrl: string;
    token?: string;
    timeoutMs: number;
  };
  port: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Read configuration from environment variables. Every setting has a default.
 * @throws {ConfigError} If a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    cache: {
      useRedis: parsed.USE_REDIS,
      redisUrl: parsed.REDIS_URL,
      redisToken: parsed.REDIS_TOKEN,
      maxSize: parsed.CACHE_MAX_SIZE,
      ttlSeconds: parsed.CACHE_TTL_SECONDS,
      timeoutMs: parsed.CACHE_TIMEOUT_MS,
      keyPrefix: parsed.CACHE_KEY_PREFIX,
    },
    model: {
      apiUrl: parsed.HF_API_URL,
      token: parsed.HF_TOKEN,
      timeoutMs: parsed.HF_TIMEOUT_MS,
    },
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}
