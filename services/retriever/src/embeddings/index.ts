/**
 * Embeddings Module
 * Exports for query embedding functionality
 */

export { VoyageEmbedder, EmbeddingDimensionError } from './voyage-client.js';
export type {
  Embedder,
  EmbeddingCache,
  EmbeddingResult,
  CircuitBreakerState,
  VoyageEmbedderOptions,
} from './voyage-client.js';
