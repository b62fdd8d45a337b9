/**
 * Orchestrator Module
 * Public surface of the retrieval core
 */

export {
  RetrievalOrchestrator,
  RetrievalRun,
  validateRequest,
  validateUserId,
  MAX_QUERY_LENGTH,
  MAX_USER_ID_LENGTH,
} from './retrieval-orchestrator.js';
export type {
  RetrievalOrchestratorDeps,
  RetrieveOptions,
  RetrievalHandle,
  RetrievalStage,
} from './retrieval-orchestrator.js';

export { mergeResults } from './merge.js';
export { createRetriever } from './factory.js';
export type { Retriever } from './factory.js';

export { createRetrievalConfig, loadRetrievalConfig } from '../config/retrieval-config.js';
export type { RetrievalConfig, FrozenRetrievalConfig } from '../config/retrieval-config.js';

export { InvalidRequestError, RetrievalCancelledError, RetrievalError, ConfigError } from '../utils/errors.js';
