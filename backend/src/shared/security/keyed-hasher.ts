/**
 * src/shared/security/keyed-hasher.ts
 *
 * WHY:
 * - Two-factor codes are six digits: a plain digest of one is reversed by
 *   trying all 10^6 inputs. HMAC-SHA256 with TWO_FACTOR_HMAC_KEY adds a
 *   server-side pepper, so a leaked two_factor_codes table alone is useless.
 * - Lookup on consumption: hash the submitted code with the same key,
 *   compare with the stored hash.
 *
 * KEY:
 * - TWO_FACTOR_HMAC_KEY from environment (min 32 chars, validated at startup).
 *
 * RULES:
 * - Deterministic: same (input, key) → same output.
 * - No DB access. No business logic.
 */

import { createHmac } from 'node:crypto';

export interface KeyedHasher {
  hash(value: string): string;
}

export class HmacSha256KeyedHasher implements KeyedHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(
        `HmacSha256KeyedHasher: key must be at least 32 characters. Got ${key.length}.`,
      );
    }
    this.key = key;
  }

  /** Lowercase hex HMAC-SHA256 of `value`. */
  hash(value: string): string {
    return createHmac('sha256', this.key).update(value).digest('hex');
  }
}
