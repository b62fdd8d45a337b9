/**
 * Session Module
 * Exports for per-user conversation memory
 */

export { SessionMemory, DEFAULT_SESSION_KEY_PREFIX } from './session-memory.js';
export type { SessionMemoryDeps, SessionMemoryOptions } from './session-memory.js';

export {
  RedisSessionStore,
  MemorySessionStore,
  ATOMIC_APPEND_WITH_TRIM,
} from './session-store.js';
export type { SessionStore, RedisListCommands } from './session-store.js';

export { extractKeyPoints, buildSessionRecord } from './key-points.js';
