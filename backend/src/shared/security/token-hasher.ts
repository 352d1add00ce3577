/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Session tokens are bearer credentials; the sessions table stores only
 *   their SHA-256 so a DB leak doesn't expose usable tokens.
 *
 * HOW TO USE:
 * - Generate raw token -> hash it -> store hash in DB -> return raw token once.
 * - When a client presents a token -> hash -> look up by hash.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
