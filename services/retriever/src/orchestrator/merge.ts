/**
 * Result merging
 *
 * Scores from different origins are merged as reported (local cosine
 * similarity against web relevance) without normalization. The order is
 * deterministic: a stable sort keeps local results ahead of web results on
 * equal scores.
 */

import type { RetrievedDocument, Strategy } from '@ctxrag/shared-types';

/**
 * Merge per-adapter batches into the final document list
 *
 * @param strategy - Strategy that was dispatched
 * @param batches - Surviving adapter results, local batch first
 * @param maxDocs - Cap on the merged list
 */
export function mergeResults(
  strategy: Strategy,
  batches: readonly (readonly RetrievedDocument[])[],
  maxDocs: number
): RetrievedDocument[] {
  const combined = batches.flat();

  if (strategy === 'both') {
    combined.sort((a, b) => b.score - a.score);
  }

  return combined.slice(0, maxDocs);
}
