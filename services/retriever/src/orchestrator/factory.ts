/**
 * Retriever wiring
 * Builds an orchestrator and its production collaborators from one config snapshot
 */

import { AnthropicReasoningClient } from '../anthropic/reasoning-client.js';
import { StrategyClassifier } from '../classifier/index.js';
import type { FrozenRetrievalConfig } from '../config/retrieval-config.js';
import { VoyageEmbedder } from '../embeddings/index.js';
import { PgVectorStore, createPgPool } from '../postgres/vector-store.js';
import { RedisClient } from '../redis/client.js';
import { LocalSearchAdapter, TavilySearchClient, WebSearchAdapter } from '../search/index.js';
import { MemorySessionStore, RedisSessionStore, SessionMemory, type SessionStore } from '../session/index.js';
import { createLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { RetrievalOrchestrator } from './retrieval-orchestrator.js';

export interface Retriever {
  orchestrator: RetrievalOrchestrator;
  /** Verify backend connectivity; failures are logged, not thrown */
  connect(): Promise<void>;
  close(): Promise<void>;
}

export function createRetriever(config: FrozenRetrievalConfig): Retriever {
  const logger = createLogger('Orchestrator');

  const redis =
    config.sessionBackend === 'redis'
      ? new RedisClient({
          url: config.redisUrl,
          commandTimeoutMs: config.timeouts.cacheMs,
          logger: createLogger('Redis'),
        })
      : null;

  const store: SessionStore = redis ? new RedisSessionStore(redis.client) : new MemorySessionStore();

  const memory = new SessionMemory(
    { store, logger: createLogger('SessionMemory') },
    {
      maxSessionMessages: config.maxSessionMessages,
      sessionTtlSeconds: config.sessionTtlSeconds,
      operationTimeoutMs: config.timeouts.cacheMs,
    }
  );

  const classifier = new StrategyClassifier(
    {
      reasoning: new AnthropicReasoningClient({
        apiKey: config.models.anthropicApiKey,
        model: config.models.classifierModel,
        logger: createLogger('Reasoning'),
      }),
      logger: createLogger('Classifier'),
    },
    {
      maxHistoryRecords: config.maxSessionMessages,
      timeoutMs: config.timeouts.reasoningMs,
    }
  );

  const pool = createPgPool(config.database, config.timeouts.localSearchMs);
  const poolLogger = createLogger('Postgres');
  pool.on('error', (err: Error) => {
    poolLogger.error('Idle Postgres client error', { error: err.message });
  });

  const localSearch = new LocalSearchAdapter(
    {
      embedder: new VoyageEmbedder({
        apiKey: config.models.voyageApiKey,
        model: config.models.embeddingModel,
        dimension: config.models.embeddingDimension,
        logger: createLogger('Embeddings'),
        ...(redis && { cache: redis.client }),
      }),
      store: new PgVectorStore(pool, { table: config.database.table, logger: poolLogger }),
      logger: createLogger('LocalSearch'),
    },
    config.similarityThreshold
  );

  const webSearch = new WebSearchAdapter({
    engine: new TavilySearchClient(config.models.tavilyApiKey),
    logger: createLogger('WebSearch'),
  });

  const orchestrator = new RetrievalOrchestrator(
    { memory, classifier, localSearch, webSearch, logger },
    config
  );

  return {
    orchestrator,
    connect: async () => {
      if (redis) {
        try {
          await redis.connect();
        } catch (error) {
          logger.warn('Redis unavailable at startup, session memory degraded', {
            error: getErrorMessage(error),
          });
        }
      }
    },
    close: async () => {
      if (redis && redis.status !== 'end') {
        await redis.quit();
      }
      await pool.end();
    },
  };
}
