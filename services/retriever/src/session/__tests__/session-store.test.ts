/**
 * Session Store Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ATOMIC_APPEND_WITH_TRIM, MemorySessionStore, RedisSessionStore } from '../session-store.js';

function createMockRedis() {
  return {
    lrange: vi.fn().mockResolvedValue([]),
    del: vi.fn().mockResolvedValue(1),
    eval: vi.fn().mockResolvedValue(1),
  };
}

describe('RedisSessionStore', () => {
  it('should append through the atomic trim script', async () => {
    const redis = createMockRedis();
    redis.eval.mockResolvedValue(4);
    const store = new RedisSessionStore(redis);

    const length = await store.append('session:u1', '{"query":"q"}', 10, 1800);

    expect(length).toBe(4);
    expect(redis.eval).toHaveBeenCalledWith(ATOMIC_APPEND_WITH_TRIM, 1, 'session:u1', '{"query":"q"}', 10, 1800);
  });

  it('should push to the tail, trim the head and refresh the TTL', () => {
    expect(ATOMIC_APPEND_WITH_TRIM).toContain("redis.call('RPUSH', KEYS[1], ARGV[1])");
    expect(ATOMIC_APPEND_WITH_TRIM).toContain("redis.call('LTRIM', KEYS[1], -maxEntries, -1)");
    expect(ATOMIC_APPEND_WITH_TRIM).toContain("redis.call('EXPIRE', KEYS[1], tonumber(ARGV[3]))");
  });

  it('should reject an unexpected script reply', async () => {
    const redis = createMockRedis();
    redis.eval.mockResolvedValue('OK');
    const store = new RedisSessionStore(redis);

    await expect(store.append('session:u1', '{}', 10, 1800)).rejects.toThrow(
      'Unexpected reply from session append script: OK'
    );
  });

  it('should read the whole list oldest first', async () => {
    const redis = createMockRedis();
    redis.lrange.mockResolvedValue(['a', 'b']);
    const store = new RedisSessionStore(redis);

    expect(await store.read('session:u1')).toEqual(['a', 'b']);
    expect(redis.lrange).toHaveBeenCalledWith('session:u1', 0, -1);
  });

  it('should delete the key', async () => {
    const redis = createMockRedis();
    const store = new RedisSessionStore(redis);

    await store.delete('session:u1');

    expect(redis.del).toHaveBeenCalledWith('session:u1');
  });
});

describe('MemorySessionStore', () => {
  it('should report the length after trimming', async () => {
    const store = new MemorySessionStore();

    expect(await store.append('k', 'a', 2, 60)).toBe(1);
    expect(await store.append('k', 'b', 2, 60)).toBe(2);
    expect(await store.append('k', 'c', 2, 60)).toBe(2);
    expect(await store.read('k')).toEqual(['b', 'c']);
  });

  it('should return a copy of the stored list', async () => {
    const store = new MemorySessionStore();
    await store.append('k', 'a', 10, 60);

    const values = await store.read('k');
    values.push('mutated');

    expect(await store.read('k')).toEqual(['a']);
  });

  it('should drop expired keys from size()', async () => {
    let now = 0;
    const store = new MemorySessionStore(() => now);
    await store.append('a', 'x', 10, 1);
    await store.append('b', 'y', 10, 5);

    now = 1000;

    expect(store.size()).toBe(1);
    expect(await store.read('a')).toEqual([]);
    expect(await store.read('b')).toEqual(['y']);
  });
});
