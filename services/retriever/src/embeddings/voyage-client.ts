/**
 * Voyage AI Embedding Client
 * Embeds queries for vector search, with a Redis cache and a circuit breaker
 */

import { createHash } from 'crypto';
import type { RetrieverLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

const VOYAGE_API_URL = 'https://api.voyageai.com/v1/embeddings';

// Cache configuration
const CACHE_TTL_SECONDS = 300; // 5 minutes
const CACHE_KEY_PREFIX = 'EMB:query:';

// Circuit breaker configuration
const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60000; // 1 minute

interface VoyageEmbeddingResponse {
  object: string;
  data: Array<{
    object: string;
    embedding: number[];
    index: number;
  }>;
  model: string;
  usage: {
    total_tokens: number;
  };
}

export interface EmbeddingResult {
  embedding: number[];
  fromCache: boolean;
  tokensUsed: number;
}

/**
 * Query embedding capability used by the local search adapter
 */
export interface Embedder {
  embedQuery(text: string, signal?: AbortSignal): Promise<EmbeddingResult>;
}

/**
 * Cache surface for embeddings (ioredis Redis satisfies it)
 */
export interface EmbeddingCache {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
}

export interface CircuitBreakerState {
  failures: number;
  lastFailure: number;
  isOpen: boolean;
}

export interface VoyageEmbedderOptions {
  apiKey: string | undefined;
  model: string;
  logger: RetrieverLogger;
  /** Expected vector length; must match the document table's embedding column */
  dimension?: number;
  cache?: EmbeddingCache;
  now?: () => number;
}

/**
 * The model returned vectors of a different length than the store expects
 */
export class EmbeddingDimensionError extends Error {
  constructor(model: string, expected: number, actual: number) {
    super(
      `Embedding model ${model} returned ${actual} dimensions, expected ${expected}; ` +
        'set EMBEDDING_DIMENSION to match the embedding column'
    );
    this.name = 'EmbeddingDimensionError';
  }
}

export class VoyageEmbedder implements Embedder {
  private readonly options: VoyageEmbedderOptions;
  private readonly now: () => number;
  private circuitBreaker: CircuitBreakerState = { failures: 0, lastFailure: 0, isOpen: false };

  constructor(options: VoyageEmbedderOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /**
   * Embed a query
   * Returns cached embedding if available, otherwise calls Voyage API
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    const { cache, logger } = this.options;
    const cacheKey = this.getCacheKey(text);

    if (cache) {
      try {
        const cached = await cache.get(cacheKey);
        const embedding = cached ? parseEmbedding(cached) : null;
        if (embedding && this.hasExpectedDimension(embedding)) {
          logger.debug('Cache hit for query embedding');
          return { embedding, fromCache: true, tokensUsed: 0 };
        }
      } catch (error) {
        logger.warn('Embedding cache read error', { error: getErrorMessage(error) });
      }
    }

    if (!this.checkCircuitBreaker()) {
      throw new Error('Voyage API circuit breaker is open');
    }

    if (!this.options.apiKey) {
      throw new Error('VOYAGE_API_KEY not configured');
    }

    const startTime = this.now();

    try {
      const response = await fetch(VOYAGE_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          input: [text],
          input_type: 'query',
        }),
        ...(signal && { signal }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Voyage API error ${response.status}: ${errorText}`);
      }

      const data = (await response.json()) as VoyageEmbeddingResponse;
      const embedding = data.data[0]?.embedding;

      if (!embedding) {
        throw new Error('No embedding returned from Voyage API');
      }

      if (!this.hasExpectedDimension(embedding)) {
        throw new EmbeddingDimensionError(this.options.model, this.options.dimension ?? 0, embedding.length);
      }

      logger.debug('Query embedding generated', {
        latencyMs: this.now() - startTime,
        tokensUsed: data.usage.total_tokens,
      });

      this.recordSuccess();

      if (cache) {
        try {
          await cache.setex(cacheKey, CACHE_TTL_SECONDS, JSON.stringify(embedding));
        } catch (error) {
          logger.warn('Embedding cache write error', { error: getErrorMessage(error) });
        }
      }

      return {
        embedding,
        fromCache: false,
        tokensUsed: data.usage.total_tokens,
      };
    } catch (error) {
      // Caller aborts and dimension mismatches are not API failures
      if (!signal?.aborted && !(error instanceof EmbeddingDimensionError)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  /**
   * Get circuit breaker status (for monitoring)
   */
  getCircuitBreakerStatus(): CircuitBreakerState {
    return { ...this.circuitBreaker };
  }

  private hasExpectedDimension(embedding: number[]): boolean {
    return this.options.dimension === undefined || embedding.length === this.options.dimension;
  }

  private getCacheKey(text: string): string {
    const hash = createHash('sha256')
      .update(`${this.options.model}:${text}`)
      .digest('hex')
      .substring(0, 16);
    return `${CACHE_KEY_PREFIX}${hash}`;
  }

  private checkCircuitBreaker(): boolean {
    if (!this.circuitBreaker.isOpen) {
      return true;
    }

    if (this.now() - this.circuitBreaker.lastFailure > CIRCUIT_BREAKER_RESET_MS) {
      this.options.logger.info('Voyage circuit breaker reset');
      this.circuitBreaker = { failures: 0, lastFailure: 0, isOpen: false };
      return true;
    }

    return false;
  }

  private recordFailure(): void {
    this.circuitBreaker.failures++;
    this.circuitBreaker.lastFailure = this.now();

    if (this.circuitBreaker.failures >= CIRCUIT_BREAKER_THRESHOLD && !this.circuitBreaker.isOpen) {
      this.circuitBreaker.isOpen = true;
      this.options.logger.warn(`Voyage circuit breaker opened after ${this.circuitBreaker.failures} failures`);
    }
  }

  private recordSuccess(): void {
    if (this.circuitBreaker.failures > 0) {
      this.circuitBreaker = { failures: 0, lastFailure: 0, isOpen: false };
    }
  }
}

function parseEmbedding(json: string): number[] | null {
  const parsed: unknown = JSON.parse(json);
  if (Array.isArray(parsed) && parsed.every((value) => typeof value === 'number')) {
    return parsed;
  }
  return null;
}
