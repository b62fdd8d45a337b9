/**
 * Retrieval Configuration
 * Immutable settings snapshot handed to each orchestrator instance
 */

import { parseIntEnv, parseFloatEnv, stringEnv, type EnvSource } from '@ctxrag/shared-types';
import { ConfigError } from '../utils/errors.js';

export type SessionBackend = 'redis' | 'memory';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string | undefined;
  /** Table holding content, metadata, embedding and source columns */
  table: string;
}

export interface TimeoutConfig {
  /** Reasoning service call */
  reasoningMs: number;
  /** Embedding + vector query */
  localSearchMs: number;
  webSearchMs: number;
  /** Each session cache operation */
  cacheMs: number;
}

export interface ModelConfig {
  anthropicApiKey: string | undefined;
  classifierModel: string;
  voyageApiKey: string | undefined;
  embeddingModel: string;
  /** Length of the vectors in the document table's embedding column */
  embeddingDimension: number;
  tavilyApiKey: string | undefined;
}

export interface RetrievalConfig {
  database: DatabaseConfig;
  redisUrl: string;
  sessionBackend: SessionBackend;
  /** Cap on documents returned per call */
  maxDocs: number;
  /** Minimum similarity for a local result to be kept */
  similarityThreshold: number;
  webSearchMaxResults: number;
  sessionTtlSeconds: number;
  maxSessionMessages: number;
  timeouts: TimeoutConfig;
  models: ModelConfig;
}

/**
 * Recursively readonly view, applied to the frozen snapshot
 */
export type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export type FrozenRetrievalConfig = DeepReadonly<RetrievalConfig>;

export type RetrievalConfigOverrides = Partial<Omit<RetrievalConfig, 'database' | 'timeouts' | 'models'>> & {
  database?: Partial<DatabaseConfig>;
  timeouts?: Partial<TimeoutConfig>;
  models?: Partial<ModelConfig>;
};

/**
 * Default configuration values
 */
export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  database: {
    host: 'localhost',
    port: 5432,
    database: 'vector_db',
    user: 'postgres',
    password: undefined,
    table: 'documents',
  },
  redisUrl: 'redis://localhost:6379',
  sessionBackend: 'redis',
  maxDocs: 5,
  similarityThreshold: 0.7,
  webSearchMaxResults: 3,
  sessionTtlSeconds: 1800, // 30 minutes
  maxSessionMessages: 10,
  timeouts: {
    reasoningMs: 10000,
    localSearchMs: 8000,
    webSearchMs: 8000,
    cacheMs: 1000,
  },
  models: {
    anthropicApiKey: undefined,
    classifierModel: 'claude-3-5-haiku-latest',
    voyageApiKey: undefined,
    embeddingModel: 'voyage-3',
    embeddingDimension: 1024,
    tavilyApiKey: undefined,
  },
};

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Build a validated, frozen config from defaults plus overrides
 */
export function createRetrievalConfig(overrides: RetrievalConfigOverrides = {}): FrozenRetrievalConfig {
  const config: RetrievalConfig = {
    ...DEFAULT_RETRIEVAL_CONFIG,
    ...overrides,
    database: { ...DEFAULT_RETRIEVAL_CONFIG.database, ...overrides.database },
    timeouts: { ...DEFAULT_RETRIEVAL_CONFIG.timeouts, ...overrides.timeouts },
    models: { ...DEFAULT_RETRIEVAL_CONFIG.models, ...overrides.models },
  };

  validateConfig(config);
  deepFreeze(config);
  return config;
}

/**
 * Read the configuration from environment variables
 */
export function loadRetrievalConfig(env: EnvSource = process.env): FrozenRetrievalConfig {
  const defaults = DEFAULT_RETRIEVAL_CONFIG;
  const backend = stringEnv('SESSION_BACKEND', defaults.sessionBackend, env);
  if (backend !== 'redis' && backend !== 'memory') {
    throw new ConfigError(`SESSION_BACKEND must be "redis" or "memory", got "${backend}"`);
  }

  return createRetrievalConfig({
    database: {
      host: stringEnv('DB_HOST', defaults.database.host, env),
      port: parseIntEnv('DB_PORT', defaults.database.port, env),
      database: stringEnv('DB_NAME', defaults.database.database, env),
      user: stringEnv('DB_USER', defaults.database.user, env),
      password: env['DB_PASSWORD'] || undefined,
      table: stringEnv('DOCUMENTS_TABLE', defaults.database.table, env),
    },
    redisUrl: stringEnv('REDIS_URL', defaults.redisUrl, env),
    sessionBackend: backend,
    maxDocs: parseIntEnv('MAX_DOCS', defaults.maxDocs, env),
    similarityThreshold: parseFloatEnv('SIMILARITY_THRESHOLD', defaults.similarityThreshold, env),
    webSearchMaxResults: parseIntEnv('WEB_SEARCH_MAX_RESULTS', defaults.webSearchMaxResults, env),
    sessionTtlSeconds: parseIntEnv('SESSION_TTL_SECONDS', defaults.sessionTtlSeconds, env),
    maxSessionMessages: parseIntEnv('MAX_SESSION_MESSAGES', defaults.maxSessionMessages, env),
    timeouts: {
      reasoningMs: parseIntEnv('REASONING_TIMEOUT_MS', defaults.timeouts.reasoningMs, env),
      localSearchMs: parseIntEnv('LOCAL_SEARCH_TIMEOUT_MS', defaults.timeouts.localSearchMs, env),
      webSearchMs: parseIntEnv('WEB_SEARCH_TIMEOUT_MS', defaults.timeouts.webSearchMs, env),
      cacheMs: parseIntEnv('CACHE_TIMEOUT_MS', defaults.timeouts.cacheMs, env),
    },
    models: {
      anthropicApiKey: env['ANTHROPIC_API_KEY'] || undefined,
      classifierModel: stringEnv('CLASSIFIER_MODEL', defaults.models.classifierModel, env),
      voyageApiKey: env['VOYAGE_API_KEY'] || undefined,
      embeddingModel: stringEnv('EMBEDDING_MODEL', defaults.models.embeddingModel, env),
      embeddingDimension: parseIntEnv('EMBEDDING_DIMENSION', defaults.models.embeddingDimension, env),
      tavilyApiKey: env['TAVILY_API_KEY'] || undefined,
    },
  });
}

function validateConfig(config: RetrievalConfig): void {
  const positive: Array<[string, number]> = [
    ['maxDocs', config.maxDocs],
    ['webSearchMaxResults', config.webSearchMaxResults],
    ['sessionTtlSeconds', config.sessionTtlSeconds],
    ['maxSessionMessages', config.maxSessionMessages],
    ['timeouts.reasoningMs', config.timeouts.reasoningMs],
    ['timeouts.localSearchMs', config.timeouts.localSearchMs],
    ['timeouts.webSearchMs', config.timeouts.webSearchMs],
    ['timeouts.cacheMs', config.timeouts.cacheMs],
    ['models.embeddingDimension', config.models.embeddingDimension],
  ];

  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (!(config.similarityThreshold >= 0 && config.similarityThreshold <= 1)) {
    throw new ConfigError(`similarityThreshold must be within [0, 1], got ${config.similarityThreshold}`);
  }

  if (!SQL_IDENTIFIER.test(config.database.table)) {
    throw new ConfigError(`database.table is not a valid SQL identifier: "${config.database.table}"`);
  }
}

function deepFreeze(value: object): void {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
}
