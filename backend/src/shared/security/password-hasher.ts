/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Services depend on this interface, not on bcrypt directly (DIP).
 * - Tests can build the hasher with a low cost without touching services.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
