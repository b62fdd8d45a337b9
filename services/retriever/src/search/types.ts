/**
 * Search Adapter Types
 */

import type { RetrievedDocument } from '@ctxrag/shared-types';

/**
 * A retrieval backend as seen by the orchestrator
 * Implementations throw RetrievalError when their backend fails
 */
export interface SearchAdapter {
  search(query: string, limit: number, signal?: AbortSignal): Promise<RetrievedDocument[]>;
}

/**
 * One web result as reported by the engine, best first
 */
export interface WebSearchHit {
  title: string;
  snippet: string;
  url: string;
  /** 1-based position in the engine's ranking */
  rank: number;
  /** Engine relevance score, when the engine reports one */
  score?: number;
}

/**
 * Web search engine contract used by the web search adapter
 */
export interface SearchEngine {
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<WebSearchHit[]>;
}
