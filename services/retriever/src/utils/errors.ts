/**
 * Error Handling Utilities
 * Error classes for the retrieval core and type-safe helpers for catch blocks
 */

import type { DocumentOrigin } from '@ctxrag/shared-types';

/**
 * Extract a human-readable message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unknown error occurred';
}

/**
 * A search backend (vector store, embedding service, web engine) failed
 * Raised by the adapters and absorbed by the orchestrator
 */
export class RetrievalError extends Error {
  readonly origin: DocumentOrigin;

  constructor(origin: DocumentOrigin, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RetrievalError';
    this.origin = origin;
  }
}

/**
 * The query or user identifier was rejected before any work started
 */
export class InvalidRequestError extends Error {
  readonly field: 'query' | 'userId';

  constructor(field: 'query' | 'userId', message: string) {
    super(message);
    this.name = 'InvalidRequestError';
    this.field = field;
  }
}

/**
 * The caller aborted an in-flight retrieval
 */
export class RetrievalCancelledError extends Error {
  constructor(reason?: unknown) {
    super(reason === undefined ? 'Retrieval cancelled' : `Retrieval cancelled: ${getErrorMessage(reason)}`);
    this.name = 'RetrievalCancelledError';
  }
}

/**
 * Configuration values out of range at startup
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
