/**
 * Configuration
 *
 * Environment variables merged over built-in defaults. Invalid values fail
 * fast with a `ConfigurationError` naming the variable.
 */

import type { EmbeddingProviderKind } from './embeddings/types';
import { ConfigurationError } from './errors';
import type { LogLevel } from './logger';
import { LOG_LEVELS, isLogLevel } from './logger';

// ============================================================================
// Types
// ============================================================================

export interface RedisConfig {
  host: string;
  port: number;
  db: number;
  password?: string;
}

export interface RagConfig {
  generation: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    /** Default `maxLength` for generate */
    maxTokens: number;
    /** Default temperature for generate */
    temperature: number;
    timeoutMs: number;
  };
  embeddings: {
    provider: EmbeddingProviderKind;
    /** Ignored by the hashing provider */
    model: string;
    dimension: number;
    ollamaBaseUrl: string;
    batchSize: number;
  };
  search: {
    maxResults: number;
  };
  cache: {
    ttlMs: number;
    /** Set when REDIS_HOST is; otherwise the in-memory cache is used */
    redis?: RedisConfig;
  };
  logLevel: LogLevel;
  /** Snapshot file for the CLI */
  dataPath: string;
}

export const DEFAULT_CONFIG: RagConfig = {
  generation: {
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    maxTokens: 500,
    temperature: 0.7,
    timeoutMs: 30_000,
  },
  embeddings: {
    provider: 'hashing',
    model: 'all-minilm',
    dimension: 384,
    ollamaBaseUrl: 'http://localhost:11434',
    batchSize: 100,
  },
  search: {
    maxResults: 100,
  },
  cache: {
    ttlMs: 3600 * 1000,
  },
  logLevel: 'info',
  dataPath: './data/knowledge-base.json',
};

const EMBEDDING_PROVIDERS: readonly EmbeddingProviderKind[] = ['hashing', 'ollama', 'openai'];

type Env = Record<string, string | undefined>;

// ============================================================================
// Loading
// ============================================================================

export function loadConfig(env: Env = process.env): RagConfig {
  const lightweight = readBoolean(env, 'USE_LIGHTWEIGHT_MODE') ?? false;
  const provider = lightweight ? 'hashing' : readProvider(env) ?? DEFAULT_CONFIG.embeddings.provider;

  const config: RagConfig = {
    generation: {
      ...DEFAULT_CONFIG.generation,
      apiKey: env.OPENAI_API_KEY || undefined,
      baseUrl: env.OPENAI_BASE_URL || DEFAULT_CONFIG.generation.baseUrl,
      model: env.OPENAI_MODEL || DEFAULT_CONFIG.generation.model,
      maxTokens: readInteger(env, 'OPENAI_MAX_TOKENS') ?? DEFAULT_CONFIG.generation.maxTokens,
      temperature: readNumber(env, 'OPENAI_TEMPERATURE', 0, 2) ?? DEFAULT_CONFIG.generation.temperature,
      timeoutMs: seconds(readPositiveNumber(env, 'REQUEST_TIMEOUT')) ?? DEFAULT_CONFIG.generation.timeoutMs,
    },
    embeddings: {
      ...DEFAULT_CONFIG.embeddings,
      provider,
      model: env.EMBEDDINGS_MODEL || defaultEmbeddingModel(provider),
      dimension: readInteger(env, 'VECTOR_DIMENSION') ?? DEFAULT_CONFIG.embeddings.dimension,
      ollamaBaseUrl: env.OLLAMA_BASE_URL || DEFAULT_CONFIG.embeddings.ollamaBaseUrl,
      batchSize: readInteger(env, 'BATCH_SIZE') ?? DEFAULT_CONFIG.embeddings.batchSize,
    },
    search: {
      maxResults: readInteger(env, 'MAX_SEARCH_RESULTS') ?? DEFAULT_CONFIG.search.maxResults,
    },
    cache: {
      ttlMs: seconds(readPositiveNumber(env, 'CACHE_TTL')) ?? DEFAULT_CONFIG.cache.ttlMs,
      redis: readRedis(env),
    },
    logLevel: readLogLevel(env) ?? DEFAULT_CONFIG.logLevel,
    dataPath: env.DATA_PATH || DEFAULT_CONFIG.dataPath,
  };

  return config;
}

function defaultEmbeddingModel(provider: EmbeddingProviderKind): string {
  switch (provider) {
    case 'openai':
      return 'text-embedding-3-small';
    case 'ollama':
    case 'hashing':
      return DEFAULT_CONFIG.embeddings.model;
  }
}

function readRedis(env: Env): RedisConfig | undefined {
  if (!env.REDIS_HOST) {
    return undefined;
  }
  return {
    host: env.REDIS_HOST,
    port: readInteger(env, 'REDIS_PORT') ?? 6379,
    db: readInteger(env, 'REDIS_DB', 0) ?? 0,
    password: env.REDIS_PASSWORD || undefined,
  };
}

// ============================================================================
// Parsers
// ============================================================================

function seconds(value: number | undefined): number | undefined {
  return value === undefined ? undefined : Math.ceil(value * 1000);
}

/**
 * Positive integer (or at least `min`), undefined when unset
 */
function readInteger(env: Env, name: string, min: number = 1): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`, name);
  }
  return value;
}

function readNumber(env: Env, name: string, min: number, max: number = Infinity): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigurationError(`${name} must be a number ${range}, got "${raw}"`, name);
  }
  return value;
}

/**
 * Strictly positive number, undefined when unset
 */
function readPositiveNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a number > 0, got "${raw}"`, name);
  }
  return value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`, name);
}

function readProvider(env: Env): EmbeddingProviderKind | undefined {
  const raw = env.EMBEDDINGS_PROVIDER;
  if (!raw) return undefined;

  const provider = EMBEDDING_PROVIDERS.find(candidate => candidate === raw.trim().toLowerCase());
  if (!provider) {
    throw new ConfigurationError(
      `EMBEDDINGS_PROVIDER must be one of ${EMBEDDING_PROVIDERS.join(', ')}, got "${raw}"`,
      'EMBEDDINGS_PROVIDER'
    );
  }
  return provider;
}

function readLogLevel(env: Env): LogLevel | undefined {
  const raw = env.LOG_LEVEL;
  if (!raw) return undefined;

  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`, 'LOG_LEVEL');
  }
  return level;
}
