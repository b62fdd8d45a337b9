/**
 * Shared Types Package
 * Exports all shared types for ctxrag services
 */

// Retrieval types
export type {
  Strategy,
  DocumentOrigin,
  RetrievedDocument,
  StrategyDecision,
  RetrievalResult,
  RetrieveRequest,
} from './retrieval.js';

export { STRATEGIES } from './retrieval.js';

// Session types
export type { SessionRecord, SessionHistory, SessionConfig } from './session.js';

// Environment variable utilities
export type { EnvSource } from './env-utils.js';
export { parseIntEnv, parseFloatEnv, stringEnv } from './env-utils.js';

// Runtime type guards
export { isStrategy, isSessionRecord, isRetrieveRequest } from './guards.js';
