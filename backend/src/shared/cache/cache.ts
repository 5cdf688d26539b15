/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Access-token sessions and rate-limit counters are short-lived state that must be
 *   fast and shared between processes (Redis in prod).
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 * - cache.sadd / smembers / srem -> Redis SET semantics (per-user session index)
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;

  /** Idempotent. Optionally refreshes the TTL on the set key. */
  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void>;

  /** Empty array when the key does not exist. */
  smembers(key: string): Promise<string[]>;

  srem(key: string, member: string): Promise<void>;
}
