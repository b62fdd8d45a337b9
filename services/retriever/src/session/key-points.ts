import type { RetrievedDocument, SessionRecord, Strategy } from '@ctxrag/shared-types';

const MAX_KEY_POINTS = 3;
const EXCERPT_LENGTH = 200;

/**
 * One short excerpt per kept document, for the first three documents
 */
export function extractKeyPoints(documents: readonly RetrievedDocument[]): string[] {
  return documents.slice(0, MAX_KEY_POINTS).map((doc) => {
    const content = doc.content.trim();
    const excerpt = content.length > EXCERPT_LENGTH ? `${content.slice(0, EXCERPT_LENGTH)}...` : content;
    return `From ${doc.source}: ${excerpt}`;
  });
}

export function buildSessionRecord(input: {
  query: string;
  strategyUsed: Strategy;
  reasoning: string;
  documents: readonly RetrievedDocument[];
  now?: Date;
}): SessionRecord {
  return {
    timestamp: (input.now ?? new Date()).toISOString(),
    query: input.query,
    strategyUsed: input.strategyUsed,
    documentCount: input.documents.length,
    reasoning: input.reasoning,
    keyPoints: extractKeyPoints(input.documents),
  };
}
