import { describe, it, expect } from 'vitest';
import type { SessionRecord } from '@ctxrag/shared-types';
import { buildStrategyPrompt, summarizeHistory } from '../prompt-templates.js';

function record(query: string, keyPoints: string[] = []): SessionRecord {
  return {
    timestamp: '2026-01-01T00:00:00.000Z',
    query,
    strategyUsed: 'web',
    documentCount: keyPoints.length,
    reasoning: 'r',
    keyPoints,
  };
}

describe('summarizeHistory', () => {
  it('should say so when there is no history', () => {
    expect(summarizeHistory([], 10)).toBe('No previous conversation.');
  });

  it('should list the most recent records first', () => {
    const summary = summarizeHistory([record('first'), record('second', ['From a: b'])], 10);

    expect(summary).toBe(
      [
        'Recent conversation (most recent first):',
        '1. Query: second',
        '   Strategy: web, Documents: 1',
        '   - From a: b',
        '2. Query: first',
        '   Strategy: web, Documents: 0',
      ].join('\n')
    );
  });

  it('should include only the newest maxRecords records', () => {
    const summary = summarizeHistory([record('old'), record('middle'), record('new')], 2);

    expect(summary).toContain('1. Query: new');
    expect(summary).toContain('2. Query: middle');
    expect(summary).not.toContain('old');
  });

  it('should shorten long queries', () => {
    const summary = summarizeHistory([record('q'.repeat(300))], 10);

    expect(summary.split('\n')[1]).toBe(`1. Query: ${'q'.repeat(200)}...`);
  });
});

describe('buildStrategyPrompt', () => {
  it('should place the summary before the current query', () => {
    expect(buildStrategyPrompt('now?', 'No previous conversation.')).toBe(
      'Conversation history:\nNo previous conversation.\n\nCurrent query: now?'
    );
  });
});
