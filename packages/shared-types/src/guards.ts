/**
 * Runtime Type Guards
 * Validates data structures at runtime to catch malformed data from external sources
 */

import type { SessionRecord } from './session.js';
import type { Strategy, RetrieveRequest } from './retrieval.js';
import { STRATEGIES } from './retrieval.js';

/**
 * Type guard for Strategy
 */
export function isStrategy(value: unknown): value is Strategy {
  return typeof value === 'string' && (STRATEGIES as readonly string[]).includes(value);
}

/**
 * Type guard for SessionRecord
 * Use this when parsing JSON from the session cache before trusting it
 *
 * @param obj - Unknown object to validate
 * @returns true if obj is a valid SessionRecord
 */
export function isSessionRecord(obj: unknown): obj is SessionRecord {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  const record = obj as Record<string, unknown>;

  return (
    typeof record['timestamp'] === 'string' &&
    typeof record['query'] === 'string' &&
    isStrategy(record['strategyUsed']) &&
    typeof record['documentCount'] === 'number' &&
    Number.isInteger(record['documentCount']) &&
    record['documentCount'] >= 0 &&
    typeof record['reasoning'] === 'string' &&
    Array.isArray(record['keyPoints']) &&
    record['keyPoints'].every((point) => typeof point === 'string')
  );
}

/**
 * Type guard for the POST /retrieve body
 * Only checks shape; content rules are enforced by the orchestrator
 */
export function isRetrieveRequest(obj: unknown): obj is RetrieveRequest {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  const body = obj as Record<string, unknown>;

  return typeof body['query'] === 'string' && typeof body['userId'] === 'string';
}
