/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - Verifies an identifier (phone number or email) + password and mints a
 *   new session token. Each login is its own session; earlier ones stay live.
 *
 * RULES:
 * - Rate limit before any DB work (per identifier and per IP).
 * - Unknown identifier and wrong password give the SAME error, and an
 *   unknown identifier still pays for one bcrypt comparison.
 * - Success audit is written in the transaction that creates the session.
 *   Failure audit is written outside any transaction so it is never rolled back.
 * - A successful login clears the per-identifier counter.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';

import { classifyUserIdentifier, getUserCredentials, type User } from '../../../users';
import type { SessionService } from '../../../sessions';

import { AuthErrors } from '../../auth.errors';
import { auditLoginFailed, auditLoginSuccess, type LoginFailureReason } from '../../auth.audit';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { burnPasswordCheck } from '../../helpers/dummy-password-check';
import type { AuthResult, LoginParams } from '../../auth.types';

export async function executeLoginFlow(
  deps: {
    db: DbExecutor;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    auditRepo: AuditRepo;
    sessionService: SessionService;
  },
  params: LoginParams,
): Promise<AuthResult> {
  const { meta } = params;
  const identifier = classifyUserIdentifier(params.identifier);
  const identifierKey = deps.tokenHasher.hash(identifier.value);
  const identifierLimitKey = `login:identifier:${identifierKey}`;

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: meta.requestId,
    identifierKind: identifier.kind,
    identifierKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: identifierLimitKey,
    ...AUTH_RATE_LIMITS.login.perIdentifier,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${meta.ip ?? 'unknown'}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const audit = new AuditWriter(deps.auditRepo, meta);

  const fail = async (reason: LoginFailureReason, userId: string | null) => {
    await auditLoginFailed(audit.withContext({ userId }), {
      reason,
      identifierKind: identifier.kind,
    });

    deps.logger.info({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: meta.requestId,
      reason,
      userId,
    });

    return AuthErrors.invalidCredentials();
  };

  const credentials = await getUserCredentials(deps.db, identifier);
  if (!credentials) {
    await burnPasswordCheck(deps.passwordHasher, params.password);
    throw await fail('user_not_found', null);
  }

  const passwordValid = await deps.passwordHasher.verify(
    params.password,
    credentials.passwordHash,
  );
  if (!passwordValid) throw await fail('wrong_password', credentials.id);

  const user: User = {
    id: credentials.id,
    phoneNumber: credentials.phoneNumber,
    email: credentials.email,
    firstName: credentials.firstName,
    lastName: credentials.lastName,
    createdAt: credentials.createdAt,
    updatedAt: credentials.updatedAt,
  };

  const session = await deps.db.transaction().execute(async (trx) => {
    const issued = await deps.sessionService.issue({ userId: user.id, db: trx });

    await auditLoginSuccess(audit.withDb(trx).withContext({ userId: user.id }), {
      sessionId: issued.sessionId,
      identifierKind: identifier.kind,
    });

    return issued;
  });

  await deps.rateLimiter.reset(identifierLimitKey);

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: meta.requestId,
    userId: user.id,
    sessionId: session.sessionId,
  });

  return { user, sessionToken: session.token };
}
