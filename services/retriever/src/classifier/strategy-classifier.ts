/**
 * Strategy Classifier
 * Chooses local, web or both for a query from the query and session history
 *
 * The reasoning service is treated as unreliable: its text is parsed into a
 * tagged result and any failure yields the static default decision.
 */

import { isStrategy, type SessionHistory, type Strategy, type StrategyDecision } from '@ctxrag/shared-types';
import type { ReasoningService } from '../anthropic/reasoning-client.js';
import { STRATEGY_SYSTEM_PROMPT, buildStrategyPrompt, summarizeHistory } from '../anthropic/prompt-templates.js';
import type { RetrieverLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { raceAbort, scopedSignal } from '../utils/timeout.js';

/** Below this the classifier hedges and queries both sources */
export const MIN_CONFIDENCE = 0.5;

export const DEFAULT_DECISION: Readonly<StrategyDecision> = Object.freeze({
  strategy: 'both',
  confidence: 0.0,
  reasoning: 'classifier unavailable',
  contextUsed: false,
});

/**
 * What the reasoning service proposed, before policy is applied
 */
export interface StrategyProposal {
  strategy: Strategy;
  confidence: number;
  reasoning: string;
}

export type ParseResult = { ok: true; proposal: StrategyProposal } | { ok: false; reason: string };

export interface StrategyClassifierDeps {
  reasoning: ReasoningService;
  logger: RetrieverLogger;
}

export interface StrategyClassifierOptions {
  /** Records included in the history summary */
  maxHistoryRecords: number;
  timeoutMs: number;
}

/**
 * Parse reasoning service output into a proposal
 * Accepts a bare JSON object or one wrapped in a Markdown code fence
 */
export function parseStrategyResponse(text: string): ParseResult {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const body = (fenced?.[1] ?? text).trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { ok: false, reason: 'response is not valid JSON' };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, reason: 'response is not a JSON object' };
  }

  const fields = parsed as Record<string, unknown>;
  const strategy = fields['strategy'];
  const confidence = fields['confidence'];
  const reasoning = fields['reasoning'];

  if (!isStrategy(strategy)) {
    return { ok: false, reason: `unknown strategy: ${JSON.stringify(strategy)}` };
  }
  if (typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    return { ok: false, reason: `confidence out of range: ${JSON.stringify(confidence)}` };
  }
  if (typeof reasoning !== 'string') {
    return { ok: false, reason: 'reasoning is missing' };
  }

  return { ok: true, proposal: { strategy, confidence, reasoning } };
}

/**
 * Apply the hedging policy to a proposal
 */
export function decide(proposal: StrategyProposal, history: SessionHistory): StrategyDecision {
  return {
    strategy: proposal.confidence < MIN_CONFIDENCE ? 'both' : proposal.strategy,
    confidence: proposal.confidence,
    reasoning: proposal.reasoning,
    contextUsed: history.length > 0,
  };
}

export class StrategyClassifier {
  constructor(
    private readonly deps: StrategyClassifierDeps,
    private readonly options: StrategyClassifierOptions
  ) {}

  /**
   * Classify a query; never throws
   */
  async classify(query: string, history: SessionHistory, signal?: AbortSignal): Promise<StrategyDecision> {
    const prompt = buildStrategyPrompt(query, summarizeHistory(history, this.options.maxHistoryRecords));

    // Bounds the whole call, SDK retries included
    const scoped = scopedSignal(signal, this.options.timeoutMs, 'Reasoning call');

    let text: string;
    try {
      text = await raceAbort(
        this.deps.reasoning.complete(
          { system: STRATEGY_SYSTEM_PROMPT, prompt },
          { timeoutMs: this.options.timeoutMs, signal: scoped.signal }
        ),
        scoped.signal
      );
    } catch (error) {
      if (!signal?.aborted) {
        this.deps.logger.warn('Reasoning service unavailable, using default strategy', {
          error: getErrorMessage(error),
        });
      }
      return { ...DEFAULT_DECISION };
    } finally {
      scoped.dispose();
    }

    const result = parseStrategyResponse(text);
    if (!result.ok) {
      this.deps.logger.warn('Unparsable strategy response, using default strategy', {
        reason: result.reason,
      });
      return { ...DEFAULT_DECISION };
    }

    const decision = decide(result.proposal, history);
    if (decision.strategy !== result.proposal.strategy) {
      this.deps.logger.debug('Low confidence, hedging to both sources', {
        proposed: result.proposal.strategy,
        confidence: decision.confidence,
      });
    }

    this.deps.logger.info(`Strategy: ${decision.strategy}`, {
      confidence: decision.confidence,
      contextUsed: decision.contextUsed,
    });

    return decision;
  }
}
