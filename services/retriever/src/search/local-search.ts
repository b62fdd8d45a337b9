/**
 * Local Search Adapter
 * Embeds the query and runs a nearest-neighbour search against the document store
 */

import type { RetrievedDocument } from '@ctxrag/shared-types';
import type { Embedder } from '../embeddings/index.js';
import type { VectorStore, VectorSearchRow } from '../postgres/vector-store.js';
import type { SearchAdapter } from './types.js';
import type { RetrieverLogger } from '../utils/logger.js';
import { RetrievalError, getErrorMessage } from '../utils/errors.js';
import { raceAbort } from '../utils/timeout.js';

export interface LocalSearchDeps {
  embedder: Embedder;
  store: VectorStore;
  logger: RetrieverLogger;
}

export class LocalSearchAdapter implements SearchAdapter {
  constructor(
    private readonly deps: LocalSearchDeps,
    private readonly similarityThreshold: number
  ) {}

  async search(query: string, limit: number, signal?: AbortSignal): Promise<RetrievedDocument[]> {
    let embedding: number[];
    try {
      ({ embedding } = await this.deps.embedder.embedQuery(query, signal));
    } catch (error) {
      throw new RetrievalError('local', `Query embedding failed: ${getErrorMessage(error)}`, { cause: error });
    }

    let rows: VectorSearchRow[];
    try {
      const pending = this.deps.store.similaritySearch(embedding, limit);
      rows = signal ? await raceAbort(pending, signal) : await pending;
    } catch (error) {
      throw new RetrievalError('local', `Vector store query failed: ${getErrorMessage(error)}`, { cause: error });
    }

    const documents = rows
      .filter((row) => row.similarity >= this.similarityThreshold)
      .sort((a, b) => b.similarity - a.similarity)
      .map(
        (row): RetrievedDocument => ({
          content: row.content,
          source: row.source,
          score: row.similarity,
          origin: 'local',
          metadata: { ...row.metadata, id: row.id },
        })
      );

    this.deps.logger.debug('Local search completed', {
      candidates: rows.length,
      kept: documents.length,
      threshold: this.similarityThreshold,
    });

    return documents;
  }
}
