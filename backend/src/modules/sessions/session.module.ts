/**
 * backend/src/modules/sessions/session.module.ts
 *
 * Support module (no routes): auth issues and revokes through SessionService;
 * the session middleware resolves through it.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { SessionRepo } from './dal/session.repo';
import { SessionService } from './session.service';

export type SessionModule = ReturnType<typeof createSessionModule>;

export function createSessionModule(deps: {
  db: DbExecutor;
  tokenHasher: TokenHasher;
  ttlSeconds: number;
  now?: () => Date;
}) {
  const sessionRepo = new SessionRepo(deps.db);
  const sessionService = new SessionService({
    db: deps.db,
    sessionRepo,
    tokenHasher: deps.tokenHasher,
    ttlSeconds: deps.ttlSeconds,
    now: deps.now,
  });

  return { sessionRepo, sessionService };
}
