/**
 * Shared Session Types
 * Per-user interaction history written by the retriever after every call
 */

import type { Strategy } from './retrieval.js';

/**
 * One stored interaction
 * Serialized as JSON into the session cache; never edited after it is written
 */
export interface SessionRecord {
  /** ISO-8601 creation instant */
  timestamp: string;
  /** Query text as submitted */
  query: string;
  /** Strategy the retrieval actually ran */
  strategyUsed: Strategy;
  /** Number of documents returned to the caller */
  documentCount: number;
  /** Rationale reported by the classifier */
  reasoning: string;
  /** Short excerpts of the returned documents (at most 3) */
  keyPoints: string[];
}

/**
 * Ordered oldest to newest, capped at maxSessionMessages
 */
export type SessionHistory = SessionRecord[];

/**
 * Session memory configuration
 */
export interface SessionConfig {
  /** Maximum records kept per user */
  maxSessionMessages: number;
  /** Seconds of inactivity before a history expires */
  sessionTtlSeconds: number;
  /** Cache key prefix */
  keyPrefix: string;
}
