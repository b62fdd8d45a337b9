/**
 * Classifier Module
 */

export {
  StrategyClassifier,
  parseStrategyResponse,
  decide,
  DEFAULT_DECISION,
  MIN_CONFIDENCE,
} from './strategy-classifier.js';
export type {
  StrategyProposal,
  ParseResult,
  StrategyClassifierDeps,
  StrategyClassifierOptions,
} from './strategy-classifier.js';
