/**
 * Strategy Classifier Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { SessionRecord } from '@ctxrag/shared-types';
import {
  DEFAULT_DECISION,
  StrategyClassifier,
  decide,
  parseStrategyResponse,
} from '../strategy-classifier.js';
import type { ReasoningService } from '../../anthropic/reasoning-client.js';
import { STRATEGY_SYSTEM_PROMPT } from '../../anthropic/prompt-templates.js';

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

const PAST: SessionRecord = {
  timestamp: '2026-01-01T00:00:00.000Z',
  query: 'what is our vacation policy?',
  strategyUsed: 'local',
  documentCount: 2,
  reasoning: 'internal policy',
  keyPoints: ['From handbook.pdf: Employees accrue 25 days'],
};

function createClassifier(reply: string | Error) {
  const complete = vi.fn(async () => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const reasoning: ReasoningService = { complete };
  const logger = createMockLogger();
  const classifier = new StrategyClassifier({ reasoning, logger }, { maxHistoryRecords: 10, timeoutMs: 500 });
  return { classifier, complete, logger };
}

describe('parseStrategyResponse', () => {
  it('should parse a bare JSON object', () => {
    expect(parseStrategyResponse('{"strategy":"web","confidence":0.8,"reasoning":"news"}')).toEqual({
      ok: true,
      proposal: { strategy: 'web', confidence: 0.8, reasoning: 'news' },
    });
  });

  it('should parse JSON inside a code fence', () => {
    const text = 'Here you go:\n```json\n{"strategy":"local","confidence":1,"reasoning":"docs"}\n```';

    expect(parseStrategyResponse(text)).toEqual({
      ok: true,
      proposal: { strategy: 'local', confidence: 1, reasoning: 'docs' },
    });
  });

  it('should explain why a response was rejected', () => {
    expect(parseStrategyResponse('local, probably')).toEqual({ ok: false, reason: 'response is not valid JSON' });
    expect(parseStrategyResponse('[1,2]')).toEqual({ ok: false, reason: 'response is not a JSON object' });
    expect(parseStrategyResponse('{"strategy":"archive","confidence":0.9,"reasoning":"x"}')).toEqual({
      ok: false,
      reason: 'unknown strategy: "archive"',
    });
    expect(parseStrategyResponse('{"strategy":"web","confidence":1.5,"reasoning":"x"}')).toEqual({
      ok: false,
      reason: 'confidence out of range: 1.5',
    });
    expect(parseStrategyResponse('{"strategy":"web","confidence":0.5}')).toEqual({
      ok: false,
      reason: 'reasoning is missing',
    });
  });
});

describe('decide', () => {
  it('should keep a confident proposal', () => {
    expect(decide({ strategy: 'web', confidence: 0.5, reasoning: 'r' }, [])).toEqual({
      strategy: 'web',
      confidence: 0.5,
      reasoning: 'r',
      contextUsed: false,
    });
  });

  it('should hedge below the confidence floor and report history use', () => {
    expect(decide({ strategy: 'local', confidence: 0.49, reasoning: 'r' }, [PAST])).toEqual({
      strategy: 'both',
      confidence: 0.49,
      reasoning: 'r',
      contextUsed: true,
    });
  });
});

describe('StrategyClassifier', () => {
  it('should send the system prompt and the history summary', async () => {
    const { classifier, complete } = createClassifier('{"strategy":"local","confidence":0.9,"reasoning":"follow-up"}');

    const decision = await classifier.classify('and for part-timers?', [PAST]);

    expect(decision).toEqual({ strategy: 'local', confidence: 0.9, reasoning: 'follow-up', contextUsed: true });
    expect(complete).toHaveBeenCalledWith(
      {
        system: STRATEGY_SYSTEM_PROMPT,
        prompt: [
          'Conversation history:',
          'Recent conversation (most recent first):',
          '1. Query: what is our vacation policy?',
          '   Strategy: local, Documents: 2',
          '   - From handbook.pdf: Employees accrue 25 days',
          '',
          'Current query: and for part-timers?',
        ].join('\n'),
      },
      { timeoutMs: 500, signal: expect.any(AbortSignal) }
    );
  });

  it('should fall back once the timeout elapses even if the service never answers', async () => {
    const complete = vi.fn(() => new Promise<string>(() => {}));
    const logger = createMockLogger();
    const classifier = new StrategyClassifier({ reasoning: { complete }, logger }, { maxHistoryRecords: 10, timeoutMs: 30 });

    const decision = await classifier.classify('q', [PAST]);

    expect(decision).toEqual({ ...DEFAULT_DECISION });
    expect(logger.warn).toHaveBeenCalledWith('Reasoning service unavailable, using default strategy', {
      error: 'Reasoning call timed out after 30ms',
    });
  });

  it('should abort the service call when the caller cancels, without warning', async () => {
    let seen: AbortSignal | undefined;
    const complete = vi.fn(
      (_request: unknown, options: { signal?: AbortSignal }) =>
        new Promise<string>(() => {
          seen = options.signal;
        })
    );
    const logger = createMockLogger();
    const classifier = new StrategyClassifier({ reasoning: { complete }, logger }, { maxHistoryRecords: 10, timeoutMs: 5000 });
    const controller = new AbortController();

    const pending = classifier.classify('q', [], controller.signal);
    controller.abort(new Error('client disconnected'));

    expect(await pending).toEqual({ ...DEFAULT_DECISION });
    expect(seen?.aborted).toBe(true);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should fall back to the default decision when the call fails', async () => {
    const { classifier, logger } = createClassifier(new Error('overloaded'));

    const decision = await classifier.classify('q', [PAST]);

    expect(decision).toEqual({
      strategy: 'both',
      confidence: 0,
      reasoning: 'classifier unavailable',
      contextUsed: false,
    });
    expect(logger.warn).toHaveBeenCalledWith('Reasoning service unavailable, using default strategy', {
      error: 'overloaded',
    });
  });

  it('should fall back to the default decision on unparsable output', async () => {
    const { classifier, logger } = createClassifier('I think web search is best.');

    const decision = await classifier.classify('q', []);

    expect(decision).toEqual({ ...DEFAULT_DECISION });
    expect(decision).not.toBe(DEFAULT_DECISION);
    expect(logger.warn).toHaveBeenCalledWith('Unparsable strategy response, using default strategy', {
      reason: 'response is not valid JSON',
    });
  });
});
