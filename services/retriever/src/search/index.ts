/**
 * Search Module
 * Exports for the local and web retrieval adapters
 */

export { LocalSearchAdapter } from './local-search.js';
export type { LocalSearchDeps } from './local-search.js';

export { WebSearchAdapter, scoreHit } from './web-search.js';
export type { WebSearchDeps } from './web-search.js';

export { TavilySearchClient } from './tavily-client.js';

export type { SearchAdapter, SearchEngine, WebSearchHit } from './types.js';
