/**
 * backend/src/modules/users/user.module.ts
 *
 * Accounts (phone + email + password hash). No routes: registration lives in
 * auth, profile edits in profiles; both write through this repo.
 */

import type { DbExecutor } from '../../shared/db/db';
import { UserRepo } from './dal/user.repo';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor }) {
  return {
    userRepo: new UserRepo(deps.db),
  };
}
