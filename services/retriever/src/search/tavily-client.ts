/**
 * Tavily Search Client
 * Web search engine backing the web search adapter
 */

import type { SearchEngine, WebSearchHit } from './types.js';

const TAVILY_API_URL = 'https://api.tavily.com/search';

interface TavilySearchResponse {
  query: string;
  results: Array<{
    title?: string;
    url?: string;
    content?: string;
    score?: number;
  }>;
  response_time?: number;
}

export class TavilySearchClient implements SearchEngine {
  constructor(private readonly apiKey: string | undefined) {}

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<WebSearchHit[]> {
    if (!this.apiKey) {
      throw new Error('TAVILY_API_KEY not configured');
    }

    const response = await fetch(TAVILY_API_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        query,
        max_results: maxResults,
        search_depth: 'basic',
      }),
      ...(signal && { signal }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Tavily API error ${response.status}: ${errorText}`);
    }

    const data = (await response.json()) as TavilySearchResponse;
    if (!Array.isArray(data.results)) {
      throw new Error('Tavily API returned no results array');
    }

    return data.results.slice(0, maxResults).map((result, index) => ({
      title: result.title ?? '',
      snippet: result.content ?? '',
      url: result.url ?? '',
      rank: index + 1,
      ...(typeof result.score === 'number' && { score: result.score }),
    }));
  }
}
