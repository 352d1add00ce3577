/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Lets tests (and local dev without REDIS_URL) run without external infra.
 * - Single process only: counters are not shared across instances.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - new InMemCache(() => fakeNowMs) in tests that need to move time forward
 */

import type { Cache } from './cache';

type CounterEntry = { value: number; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, CounterEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  private getEntry(key: string): CounterEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);

    if (entry) {
      entry.value += 1;
      return Promise.resolve(entry.value);
    }

    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value: 1, expiresAtMs });
    return Promise.resolve(1);
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }
}
