import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RETRIEVAL_CONFIG,
  createRetrievalConfig,
  loadRetrievalConfig,
} from '../retrieval-config.js';
import { ConfigError } from '../../utils/errors.js';

describe('createRetrievalConfig', () => {
  it('should start from the defaults', () => {
    const config = createRetrievalConfig();

    expect(config).toEqual(DEFAULT_RETRIEVAL_CONFIG);
    expect(config.maxDocs).toBe(5);
    expect(config.similarityThreshold).toBe(0.7);
    expect(config.webSearchMaxResults).toBe(3);
    expect(config.sessionTtlSeconds).toBe(1800);
    expect(config.maxSessionMessages).toBe(10);
  });

  it('should merge nested overrides', () => {
    const config = createRetrievalConfig({ timeouts: { webSearchMs: 250 }, database: { table: 'kb.docs' } });

    expect(config.timeouts).toEqual({ reasoningMs: 10000, localSearchMs: 8000, webSearchMs: 250, cacheMs: 1000 });
    expect(config.database.table).toBe('kb.docs');
    expect(config.database.host).toBe('localhost');
  });

  it('should freeze the snapshot', () => {
    const config = createRetrievalConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timeouts)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RETRIEVAL_CONFIG)).toBe(false);
  });

  it('should reject out-of-range values', () => {
    expect(() => createRetrievalConfig({ maxDocs: 0 })).toThrow('maxDocs must be a positive integer, got 0');
    expect(() => createRetrievalConfig({ similarityThreshold: 1.2 })).toThrow(ConfigError);
    expect(() => createRetrievalConfig({ timeouts: { cacheMs: 1.5 } })).toThrow(
      'timeouts.cacheMs must be a positive integer, got 1.5'
    );
    expect(() => createRetrievalConfig({ database: { table: 'documents; DROP TABLE x' } })).toThrow(
      'database.table is not a valid SQL identifier: "documents; DROP TABLE x"'
    );
  });
});

describe('loadRetrievalConfig', () => {
  it('should read values from the environment', () => {
    const config = loadRetrievalConfig({
      MAX_DOCS: '8',
      SIMILARITY_THRESHOLD: '0.55',
      SESSION_BACKEND: 'memory',
      DB_PORT: '6543',
      WEB_SEARCH_TIMEOUT_MS: '3000',
      TAVILY_API_KEY: 'test-secret',
    });

    expect(config.maxDocs).toBe(8);
    expect(config.similarityThreshold).toBe(0.55);
    expect(config.sessionBackend).toBe('memory');
    expect(config.database.port).toBe(6543);
    expect(config.timeouts.webSearchMs).toBe(3000);
    expect(config.models.tavilyApiKey).toBe('test-secret');
    expect(config.models.anthropicApiKey).toBeUndefined();
  });

  it('should read the embedding dimension, defaulting to the model size', () => {
    expect(loadRetrievalConfig({}).models.embeddingDimension).toBe(1024);
    expect(loadRetrievalConfig({ EMBEDDING_DIMENSION: '768' }).models.embeddingDimension).toBe(768);
    expect(() => loadRetrievalConfig({ EMBEDDING_DIMENSION: '-1' })).toThrow(
      'models.embeddingDimension must be a positive integer, got -1'
    );
  });

  it('should treat empty values as unset', () => {
    const config = loadRetrievalConfig({ MAX_DOCS: '', DB_PASSWORD: '' });

    expect(config.maxDocs).toBe(5);
    expect(config.database.password).toBeUndefined();
  });

  it('should reject an unknown session backend', () => {
    expect(() => loadRetrievalConfig({ SESSION_BACKEND: 'memcached' })).toThrow(
      'SESSION_BACKEND must be "redis" or "memory", got "memcached"'
    );
  });
});
