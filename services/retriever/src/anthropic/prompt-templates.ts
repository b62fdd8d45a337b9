/**
 * Prompt Templates
 * Strategy-selection prompt and the bounded history summary it embeds
 */

import type { SessionHistory } from '@ctxrag/shared-types';

const QUERY_PREVIEW_LENGTH = 200;

export const STRATEGY_SYSTEM_PROMPT = `You are a context-aware retrieval router. Decide where the answer to the user's query should be looked up, taking their recent conversation into account.

Available strategies:
- "local": the internal document store (company documents, policies, previously ingested material)
- "web": a web search engine (current events, general knowledge, anything unlikely to be in the internal store)
- "both": query both sources when the query spans them

Consider whether the query follows up on an earlier question, whether earlier answers came from a particular source, and whether the topic is time-sensitive.

Respond with only a JSON object:
{"strategy": "local" | "web" | "both", "confidence": <number between 0 and 1>, "reasoning": "<one short sentence>"}`;

/**
 * Summarize history newest first, keeping query, strategy and key points
 *
 * @param history - Oldest-first history as stored
 * @param maxRecords - Most recent records to include
 */
export function summarizeHistory(history: SessionHistory, maxRecords: number): string {
  if (history.length === 0) {
    return 'No previous conversation.';
  }

  const recent = history.slice(-maxRecords).reverse();
  const lines = ['Recent conversation (most recent first):'];

  recent.forEach((record, index) => {
    const query =
      record.query.length > QUERY_PREVIEW_LENGTH ? `${record.query.slice(0, QUERY_PREVIEW_LENGTH)}...` : record.query;
    lines.push(`${index + 1}. Query: ${query}`);
    lines.push(`   Strategy: ${record.strategyUsed}, Documents: ${record.documentCount}`);
    for (const point of record.keyPoints) {
      lines.push(`   - ${point}`);
    }
  });

  return lines.join('\n');
}

/**
 * Build the user turn for the strategy request
 */
export function buildStrategyPrompt(query: string, historySummary: string): string {
  return `Conversation history:
${historySummary}

Current query: ${query}`;
}
