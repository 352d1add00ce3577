/**
 * src/modules/auth/helpers/dummy-password-check.ts
 *
 * WHY:
 * - A login for an unknown identifier must cost the same bcrypt work as a
 *   wrong password, or response time tells an attacker which accounts exist.
 *
 * HOW:
 * - One throwaway hash per hasher, created on first use and reused.
 */

import type { PasswordHasher } from '../../../shared/security/password-hasher';

const dummyHashes = new WeakMap<PasswordHasher, Promise<string>>();

export async function burnPasswordCheck(hasher: PasswordHasher, password: string): Promise<void> {
  let hash = dummyHashes.get(hasher);
  if (!hash) {
    hash = hasher.hash('dummy-password-for-timing');
    dummyHashes.set(hasher, hash);
  }

  await hasher.verify(password, await hash);
}
