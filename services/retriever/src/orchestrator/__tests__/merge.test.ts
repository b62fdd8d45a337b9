import { describe, it, expect } from 'vitest';
import type { DocumentOrigin, RetrievedDocument } from '@ctxrag/shared-types';
import { mergeResults } from '../merge.js';

function doc(score: number, origin: DocumentOrigin): RetrievedDocument {
  return { content: `${origin} ${score}`, source: origin, score, origin, metadata: {} };
}

describe('mergeResults', () => {
  it('should sort across sources by score for both', () => {
    const merged = mergeResults('both', [[doc(0.9, 'local'), doc(0.6, 'local')], [doc(0.8, 'web'), doc(0.5, 'web')]], 5);

    expect(merged.map((d) => d.score)).toEqual([0.9, 0.8, 0.6, 0.5]);
  });

  it('should keep local ahead of web on equal scores', () => {
    const merged = mergeResults('both', [[doc(0.5, 'local')], [doc(0.5, 'web')]], 5);

    expect(merged.map((d) => d.origin)).toEqual(['local', 'web']);
  });

  it('should keep adapter order for a single source', () => {
    const merged = mergeResults('web', [[doc(0.2, 'web'), doc(0.7, 'web')]], 5);

    expect(merged.map((d) => d.score)).toEqual([0.2, 0.7]);
  });

  it('should truncate to maxDocs', () => {
    const merged = mergeResults('local', [[doc(0.9, 'local'), doc(0.8, 'local'), doc(0.7, 'local')]], 2);

    expect(merged).toHaveLength(2);
  });

  it('should handle no surviving batches', () => {
    expect(mergeResults('both', [], 5)).toEqual([]);
  });
});
