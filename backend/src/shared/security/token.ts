/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - One place generates every random credential the system hands out:
 *   session tokens (opaque, URL safe) and numeric verification codes.
 *
 * HOW TO USE:
 * - const token = generateSecureToken()      // return to client, store only its hash
 * - const code = generateVerificationCode(6) // e.g. "042917"
 */

import { randomBytes, randomInt } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}

/** Uniformly random decimal string of exactly `digits` characters (leading zeros kept). */
export function generateVerificationCode(digits: number = 6): string {
  return randomInt(0, 10 ** digits)
    .toString()
    .padStart(digits, '0');
}
