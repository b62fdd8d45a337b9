/**
 * Shared Retrieval Types
 * Single source of truth for the retriever's request and result shapes
 */

/** Retrieval path chosen for a query */
export type Strategy = 'local' | 'web' | 'both';

/** Where a document came from */
export type DocumentOrigin = 'local' | 'web';

export const STRATEGIES: readonly Strategy[] = ['local', 'web', 'both'];

/**
 * A document returned by one of the search adapters
 */
export interface RetrievedDocument {
  content: string;
  /** Source identifier (file name, URL) */
  source: string;
  /** Similarity or relevance, higher is better; not comparable across origins */
  score: number;
  origin: DocumentOrigin;
  metadata: Record<string, unknown>;
}

/**
 * Classifier output
 */
export interface StrategyDecision {
  strategy: Strategy;
  /** Classifier's self-reported certainty in [0, 1] */
  confidence: number;
  reasoning: string;
  /** Whether session history was available to the classifier */
  contextUsed: boolean;
}

/**
 * Result of a single retrieval call
 */
export interface RetrievalResult {
  query: string;
  userId: string;
  documents: RetrievedDocument[];
  strategyUsed: Strategy;
  confidence: number;
  contextUsed: boolean;
  reasoning: string;
  documentCount: number;
  /** History records available when the query was classified */
  conversationLength: number;
}

/**
 * Body accepted by POST /retrieve
 */
export interface RetrieveRequest {
  query: string;
  userId: string;
}
