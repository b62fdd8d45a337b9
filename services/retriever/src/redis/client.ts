/**
 * Redis Client for the Retriever Service
 * Backs session memory and the query embedding cache
 */

import { Redis } from 'ioredis';
import type { RetrieverLogger } from '../utils/logger.js';

export interface RedisClientOptions {
  url: string;
  /** Per-command timeout; a slow cache counts as an unavailable one */
  commandTimeoutMs: number;
  logger: RetrieverLogger;
}

export class RedisClient {
  public readonly client: Redis;
  private readonly logger: RetrieverLogger;

  constructor(options: RedisClientOptions) {
    this.logger = options.logger;
    this.client = new Redis(options.url, {
      lazyConnect: true,
      commandTimeout: options.commandTimeoutMs,
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        this.logger.debug(`Retrying Redis connection... (${times})`);
        return delay;
      },
      maxRetriesPerRequest: 3,
    });

    this.client.on('connect', () => {
      this.logger.info('Connected to Redis');
    });

    this.client.on('error', (err: Error) => {
      this.logger.error('Redis client error', { error: err.message });
    });

    this.client.on('close', () => {
      this.logger.debug('Redis connection closed');
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
    await this.client.ping();
    this.logger.info('Redis client ready');
  }

  async quit(): Promise<void> {
    await this.client.quit();
    this.logger.info('Redis client disconnected');
  }

  get status(): string {
    return this.client.status;
  }
}
