/**
 * Retrieval Orchestrator
 * Per-request state machine: memory read -> classify -> dispatch -> merge -> memory write
 *
 * Only invalid input rejects a call. Session, classifier and adapter failures
 * are absorbed at their own boundary and turned into documented fallbacks.
 */

import type {
  DocumentOrigin,
  RetrievalResult,
  RetrievedDocument,
  SessionHistory,
  Strategy,
  StrategyDecision,
} from '@ctxrag/shared-types';
import type { SessionMemory } from '../session/index.js';
import { buildSessionRecord } from '../session/index.js';
import type { StrategyClassifier } from '../classifier/index.js';
import type { SearchAdapter } from '../search/index.js';
import type { FrozenRetrievalConfig } from '../config/retrieval-config.js';
import type { RetrieverLogger } from '../utils/logger.js';
import { logPerformance } from '../utils/logger.js';
import { InvalidRequestError, RetrievalCancelledError, getErrorMessage } from '../utils/errors.js';
import { raceAbort, scopedSignal } from '../utils/timeout.js';
import { mergeResults } from './merge.js';

export type RetrievalStage =
  | 'start'
  | 'memory_read'
  | 'classify'
  | 'dispatch'
  | 'merge'
  | 'memory_write'
  | 'done'
  | 'error';

const STAGE_ORDER: readonly RetrievalStage[] = [
  'start',
  'memory_read',
  'classify',
  'dispatch',
  'merge',
  'memory_write',
  'done',
];

export const MAX_QUERY_LENGTH = 4000;
export const MAX_USER_ID_LENGTH = 128;
const USER_ID_PATTERN = /^[A-Za-z0-9_.@:-]+$/;

export interface RetrievalOrchestratorDeps {
  memory: SessionMemory;
  classifier: StrategyClassifier;
  localSearch: SearchAdapter;
  webSearch: SearchAdapter;
  logger: RetrieverLogger;
  now?: () => Date;
}

export interface RetrieveOptions {
  /** Aborts outstanding backend calls; the call then rejects with RetrievalCancelledError */
  signal?: AbortSignal;
}

/**
 * Non-blocking retrieval started with startRetrieval
 */
export interface RetrievalHandle {
  result: Promise<RetrievalResult>;
  cancel(reason?: unknown): void;
}

type AdapterOutcome =
  | { origin: DocumentOrigin; ok: true; documents: RetrievedDocument[] }
  | { origin: DocumentOrigin; ok: false; error: string };

/**
 * Tracks one linear traversal of the stages; no stage is revisited
 */
export class RetrievalRun {
  private current: RetrievalStage = 'start';
  readonly visited: RetrievalStage[] = ['start'];

  get stage(): RetrievalStage {
    return this.current;
  }

  advance(next: RetrievalStage): void {
    if (this.current === 'done' || this.current === 'error') {
      throw new Error(`Retrieval already finished in stage ${this.current}`);
    }

    if (next !== 'error') {
      const expected = STAGE_ORDER[STAGE_ORDER.indexOf(this.current) + 1];
      if (next !== expected) {
        throw new Error(`Invalid retrieval transition ${this.current} -> ${next}`);
      }
    }

    this.current = next;
    this.visited.push(next);
  }
}

/**
 * Reject malformed input before any state is touched
 */
export function validateRequest(query: string, userId: string): void {
  if (typeof query !== 'string' || query.trim().length === 0) {
    throw new InvalidRequestError('query', 'query must be a non-empty string');
  }
  if (query.length > MAX_QUERY_LENGTH) {
    throw new InvalidRequestError('query', `query must be at most ${MAX_QUERY_LENGTH} characters`);
  }
  validateUserId(userId);
}

/**
 * Reject user identifiers that cannot name a session key
 */
export function validateUserId(userId: string): void {
  if (typeof userId !== 'string' || userId.trim().length === 0) {
    throw new InvalidRequestError('userId', 'userId must be a non-empty string');
  }
  if (userId.length > MAX_USER_ID_LENGTH || !USER_ID_PATTERN.test(userId)) {
    throw new InvalidRequestError(
      'userId',
      `userId must be at most ${MAX_USER_ID_LENGTH} characters of letters, digits, or _ . @ : -`
    );
  }
}

export class RetrievalOrchestrator {
  private readonly deps: RetrievalOrchestratorDeps;
  private readonly config: FrozenRetrievalConfig;
  private readonly now: () => Date;

  constructor(deps: RetrievalOrchestratorDeps, config: FrozenRetrievalConfig) {
    this.deps = deps;
    this.config = config;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Retrieve documents for a query on behalf of a user
   *
   * @throws InvalidRequestError when the query or userId is malformed
   * @throws RetrievalCancelledError when options.signal aborts before completion
   */
  async retrieve(query: string, userId: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const { signal } = options;
    const run = new RetrievalRun();
    const startTime = Date.now();

    try {
      validateRequest(query, userId);
    } catch (error) {
      run.advance('error');
      this.deps.logger.warn('Rejected retrieval request', { userId, error: getErrorMessage(error) });
      throw error;
    }
    this.throwIfCancelled(signal);

    run.advance('memory_read');
    const history = await this.deps.memory.getHistory(userId);
    this.throwIfCancelled(signal);

    run.advance('classify');
    const decision = await this.deps.classifier.classify(query, history, signal);
    this.throwIfCancelled(signal);

    run.advance('dispatch');
    const outcomes = await this.dispatch(decision.strategy, query, signal);
    this.throwIfCancelled(signal);

    run.advance('merge');
    const documents = mergeResults(
      decision.strategy,
      outcomes.flatMap((outcome) => (outcome.ok ? [outcome.documents] : [])),
      this.config.maxDocs
    );

    run.advance('memory_write');
    await this.deps.memory.append(
      userId,
      buildSessionRecord({
        query,
        strategyUsed: decision.strategy,
        reasoning: decision.reasoning,
        documents,
        now: this.now(),
      })
    );

    run.advance('done');
    const result = this.buildResult(query, userId, decision, documents, history);

    this.deps.logger.info('Retrieval completed', {
      userId,
      strategy: decision.strategy,
      confidence: decision.confidence,
      documentCount: result.documentCount,
      failedSources: outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.origin),
    });
    logPerformance(this.deps.logger, 'retrieve', Date.now() - startTime, { userId });

    return result;
  }

  /**
   * Start a retrieval without waiting for it
   * Same semantics and result shape as retrieve(); cancel() aborts it
   */
  startRetrieval(query: string, userId: string): RetrievalHandle {
    const controller = new AbortController();
    return {
      result: this.retrieve(query, userId, { signal: controller.signal }),
      cancel: (reason?: unknown) => controller.abort(reason),
    };
  }

  /**
   * Read a user's stored interactions, oldest first
   *
   * @throws InvalidRequestError when the userId is malformed
   */
  async getConversation(userId: string): Promise<SessionHistory> {
    validateUserId(userId);
    return this.deps.memory.getHistory(userId);
  }

  /**
   * Drop a user's stored interactions
   *
   * @throws InvalidRequestError when the userId is malformed
   */
  async clearSession(userId: string): Promise<void> {
    validateUserId(userId);
    await this.deps.memory.clear(userId);
  }

  private async dispatch(strategy: Strategy, query: string, signal?: AbortSignal): Promise<AdapterOutcome[]> {
    const { maxDocs, webSearchMaxResults, timeouts } = this.config;

    const calls: Array<Promise<AdapterOutcome>> = [];
    if (strategy === 'local' || strategy === 'both') {
      calls.push(this.callAdapter('local', this.deps.localSearch, query, maxDocs, timeouts.localSearchMs, signal));
    }
    if (strategy === 'web' || strategy === 'both') {
      calls.push(this.callAdapter('web', this.deps.webSearch, query, webSearchMaxResults, timeouts.webSearchMs, signal));
    }

    return Promise.all(calls);
  }

  /**
   * Run one adapter under its own timeout; failures become outcomes, never rejections
   */
  private async callAdapter(
    origin: DocumentOrigin,
    adapter: SearchAdapter,
    query: string,
    limit: number,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<AdapterOutcome> {
    const scoped = scopedSignal(signal, timeoutMs, `${origin} search`);

    try {
      const documents = await raceAbort(adapter.search(query, limit, scoped.signal), scoped.signal);
      return { origin, ok: true, documents };
    } catch (error) {
      const message = getErrorMessage(error);
      if (!signal?.aborted) {
        this.deps.logger.warn(`${origin} search failed, continuing without it`, { error: message });
      }
      return { origin, ok: false, error: message };
    } finally {
      scoped.dispose();
    }
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RetrievalCancelledError(signal.reason);
    }
  }

  private buildResult(
    query: string,
    userId: string,
    decision: StrategyDecision,
    documents: RetrievedDocument[],
    history: SessionHistory
  ): RetrievalResult {
    return {
      query,
      userId,
      documents,
      strategyUsed: decision.strategy,
      confidence: decision.confidence,
      contextUsed: decision.contextUsed,
      reasoning: decision.reasoning,
      documentCount: documents.length,
      conversationLength: history.length,
    };
  }
}
