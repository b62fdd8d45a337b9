/**
 * Web Search Adapter
 * Maps engine results to documents, ordered by engine rank
 */

import type { RetrievedDocument } from '@ctxrag/shared-types';
import type { SearchAdapter, SearchEngine, WebSearchHit } from './types.js';
import type { RetrieverLogger } from '../utils/logger.js';
import { RetrievalError, getErrorMessage } from '../utils/errors.js';

export interface WebSearchDeps {
  engine: SearchEngine;
  logger: RetrieverLogger;
}

/**
 * Engine relevance when it is a usable [0, 1] score, else 1 / rank
 */
export function scoreHit(hit: WebSearchHit): number {
  if (typeof hit.score === 'number' && Number.isFinite(hit.score) && hit.score >= 0 && hit.score <= 1) {
    return hit.score;
  }
  return 1 / hit.rank;
}

export class WebSearchAdapter implements SearchAdapter {
  constructor(private readonly deps: WebSearchDeps) {}

  async search(query: string, limit: number, signal?: AbortSignal): Promise<RetrievedDocument[]> {
    let hits: WebSearchHit[];
    try {
      hits = await this.deps.engine.search(query, limit, signal);
    } catch (error) {
      throw new RetrievalError('web', `Web search failed: ${getErrorMessage(error)}`, { cause: error });
    }

    const documents = [...hits]
      .sort((a, b) => a.rank - b.rank)
      .filter((hit) => hit.snippet.trim().length > 0)
      .slice(0, limit)
      .map(
        (hit): RetrievedDocument => ({
          content: hit.snippet.trim(),
          source: hit.url || 'web_search',
          score: scoreHit(hit),
          origin: 'web',
          metadata: { title: hit.title, url: hit.url, rank: hit.rank },
        })
      );

    this.deps.logger.debug('Web search completed', { hits: hits.length, kept: documents.length });

    return documents;
  }
}
