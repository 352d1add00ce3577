/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Enforces abuse limits on the unauthenticated and code-guessing surfaces:
 *   - login attempts: 10 / 15min per ip, 5 / 15min per identifier
 *   - registration: 5 / hour per ip
 *   - two-factor verification: 5 / 15min per user
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "login:ip:1.2.3.4", limit: 5, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. INCR is atomic in Redis, so two
 *   concurrent requests cannot both slip under the limit.
 *
 * RESETTING:
 * - reset(key) clears a counter (e.g. the per-identifier login counter after a
 *   successful login).
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks (used in tests via di.ts).
 * - Never check NODE_ENV here; the composition root decides.
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitRule = Readonly<{ limit: number; windowSeconds: number }>;

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key`.
   * Throws RateLimitError if the counter exceeds `limit`.
   */
  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }

  async reset(key: string): Promise<void> {
    if (this.opts?.disabled) return;
    await this.cache.del(this.buildKey(key));
  }
}
