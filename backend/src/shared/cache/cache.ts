/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate-limit counters are short-lived state that must be shared between
 *   instances, so they live outside the process (Redis) in production.
 * - We depend on an abstraction so tests and single-instance dev use memory.
 *
 * HOW TO USE:
 * - cache.incr(key, { ttlSeconds }) -> counter whose window starts at the first hit
 * - cache.del(key)                  -> reset a counter
 */

export interface Cache {
  /**
   * Atomically increment a counter. The TTL is applied when the counter is
   * created and never extended by later hits (fixed window).
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;

  del(key: string): Promise<void>;
}
