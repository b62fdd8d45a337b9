/**
 * Session Stores
 * Capped, TTL-bound lists of serialized session records keyed by user
 *
 * Both stores keep the list oldest to newest and make append atomic per key:
 * the Redis store through a Lua script, the memory store by completing each
 * operation inside a single event-loop turn.
 */

/**
 * Storage contract used by SessionMemory
 */
export interface SessionStore {
  /** All entries for a key, oldest first; [] when absent or expired */
  read(key: string): Promise<string[]>;
  /**
   * Append an entry, trim from the head down to maxEntries and reset the
   * key's TTL. Returns the resulting length.
   */
  append(key: string, entry: string, maxEntries: number, ttlSeconds: number): Promise<number>;
  delete(key: string): Promise<void>;
}

/**
 * Minimal Redis surface the store needs (ioredis Redis satisfies it)
 */
export interface RedisListCommands {
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  del(...keys: string[]): Promise<number>;
  /**
   * Execute Lua script for atomic operations
   * Note: This is Redis EVAL command, not JavaScript eval
   */
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}

/**
 * Lua script for atomic append + trim + TTL refresh.
 *
 * KEYS[1] = session key
 * ARGV[1] = serialized record
 * ARGV[2] = max entries
 * ARGV[3] = TTL in seconds
 *
 * Returns the list length after trimming
 */
export const ATOMIC_APPEND_WITH_TRIM = `
local maxEntries = tonumber(ARGV[2])
redis.call('RPUSH', KEYS[1], ARGV[1])
redis.call('LTRIM', KEYS[1], -maxEntries, -1)
redis.call('EXPIRE', KEYS[1], tonumber(ARGV[3]))
return redis.call('LLEN', KEYS[1])
`;

export class RedisSessionStore implements SessionStore {
  constructor(private readonly redis: RedisListCommands) {}

  async read(key: string): Promise<string[]> {
    // Redis expires the key itself once the TTL lapses
    return this.redis.lrange(key, 0, -1);
  }

  async append(key: string, entry: string, maxEntries: number, ttlSeconds: number): Promise<number> {
    const result = await this.redis.eval(ATOMIC_APPEND_WITH_TRIM, 1, key, entry, maxEntries, ttlSeconds);
    if (typeof result !== 'number') {
      throw new Error(`Unexpected reply from session append script: ${String(result)}`);
    }
    return result;
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

interface MemoryEntry {
  values: string[];
  expiresAt: number;
}

/**
 * In-process store with lazily enforced expiry
 * Used for SESSION_BACKEND=memory and as the tests' stand-in for Redis
 */
export class MemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async read(key: string): Promise<string[]> {
    const entry = this.liveEntry(key);
    return entry ? [...entry.values] : [];
  }

  async append(key: string, value: string, maxEntries: number, ttlSeconds: number): Promise<number> {
    const values = [...(this.liveEntry(key)?.values ?? []), value];
    const kept = values.slice(Math.max(0, values.length - maxEntries));

    this.entries.set(key, {
      values: kept,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return kept.length;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Number of live keys (expired ones are dropped as a side effect) */
  size(): number {
    for (const key of [...this.entries.keys()]) {
      this.liveEntry(key);
    }
    return this.entries.size;
  }

  private liveEntry(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
