/**
 * Session Memory
 * Bounded, expiring per-user interaction history
 *
 * Every backend failure is absorbed here: reads degrade to an empty history
 * and writes to a no-op, so the retrieval path never depends on the cache.
 */

import { isSessionRecord, type SessionConfig, type SessionHistory, type SessionRecord } from '@ctxrag/shared-types';
import type { SessionStore } from './session-store.js';
import type { RetrieverLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';

export interface SessionMemoryDeps {
  store: SessionStore;
  logger: RetrieverLogger;
}

export interface SessionMemoryOptions extends Omit<SessionConfig, 'keyPrefix'> {
  keyPrefix?: string;
  /** Upper bound on each store operation */
  operationTimeoutMs: number;
}

export const DEFAULT_SESSION_KEY_PREFIX = 'session:';

export class SessionMemory {
  private readonly deps: SessionMemoryDeps;
  private readonly options: Required<SessionMemoryOptions>;

  constructor(deps: SessionMemoryDeps, options: SessionMemoryOptions) {
    this.deps = deps;
    this.options = { keyPrefix: DEFAULT_SESSION_KEY_PREFIX, ...options };
  }

  /**
   * Get the cache key for a user's history
   */
  keyFor(userId: string): string {
    return `${this.options.keyPrefix}${userId}`;
  }

  /**
   * Read a user's history, oldest first
   * Never throws; absent, expired or unreadable history reads as []
   */
  async getHistory(userId: string): Promise<SessionHistory> {
    const key = this.keyFor(userId);

    let raw: string[];
    try {
      raw = await withTimeout(this.deps.store.read(key), this.options.operationTimeoutMs, 'Session read');
    } catch (error) {
      this.deps.logger.warn('Session history unavailable, continuing without context', {
        userId,
        error: getErrorMessage(error),
      });
      return [];
    }

    const history: SessionHistory = [];
    for (const json of raw) {
      try {
        const parsed: unknown = JSON.parse(json);
        if (isSessionRecord(parsed)) {
          history.push(parsed);
        } else {
          this.deps.logger.warn('Dropping malformed session record', { userId });
        }
      } catch (parseError) {
        this.deps.logger.warn('Dropping unparsable session record', {
          userId,
          error: getErrorMessage(parseError),
        });
      }
    }

    // Entries may predate a lower cap
    return history.slice(Math.max(0, history.length - this.options.maxSessionMessages));
  }

  /**
   * Append a record, evicting the oldest beyond the cap and refreshing the TTL
   * Failures are logged and swallowed
   */
  async append(userId: string, record: SessionRecord): Promise<void> {
    const key = this.keyFor(userId);
    const { maxSessionMessages, sessionTtlSeconds, operationTimeoutMs } = this.options;

    try {
      const length = await withTimeout(
        this.deps.store.append(key, JSON.stringify(record), maxSessionMessages, sessionTtlSeconds),
        operationTimeoutMs,
        'Session append'
      );
      this.deps.logger.debug('Session record appended', { userId, length });
    } catch (error) {
      this.deps.logger.warn('Session append failed, interaction not remembered', {
        userId,
        error: getErrorMessage(error),
      });
    }
  }

  /**
   * Remove all history for a user; idempotent
   */
  async clear(userId: string): Promise<void> {
    try {
      await withTimeout(this.deps.store.delete(this.keyFor(userId)), this.options.operationTimeoutMs, 'Session clear');
      this.deps.logger.info('Session cleared', { userId });
    } catch (error) {
      this.deps.logger.warn('Session clear failed', {
        userId,
        error: getErrorMessage(error),
      });
    }
  }
}
