/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - An account is a user plus its profile, settings and default labels;
 *   they are created in ONE transaction so a half-registered user never exists.
 *
 * RULES:
 * - Steps short-circuit in order: phone format → rate limit → duplicates → write.
 * - Duplicate pre-checks give clean errors; the unique constraints are the
 *   backstop for concurrent registrations of the same phone/email.
 * - The session is issued inside the same transaction: a registered caller
 *   is always authenticated.
 * - Logs carry a hashed phone key, never the phone number.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { isUniqueViolation } from '../../../../shared/db/db';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { AppError } from '../../../../shared/http/errors';

import {
  getUserByEmail,
  getUserById,
  getUserByPhone,
  isValidPhoneNumber,
  USER_EMAIL_UNIQUE,
  USER_PHONE_UNIQUE,
  type UserRepo,
} from '../../../users';
import type { ProfileRepo } from '../../../profiles';
import type { SettingsRepo } from '../../../settings';
import type { LabelRepo } from '../../../labels';
import type { SessionService } from '../../../sessions';

import { AuthErrors } from '../../auth.errors';
import { auditRegisterSuccess } from '../../auth.audit';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import type { AuthResult, RegisterParams } from '../../auth.types';

export async function executeRegisterFlow(
  deps: {
    db: DbExecutor;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    auditRepo: AuditRepo;
    userRepo: UserRepo;
    profileRepo: ProfileRepo;
    settingsRepo: SettingsRepo;
    labelRepo: LabelRepo;
    sessionService: SessionService;
  },
  params: RegisterParams,
): Promise<AuthResult> {
  const { meta } = params;
  const email = params.email.toLowerCase();

  if (!isValidPhoneNumber(params.phoneNumber)) throw AuthErrors.invalidPhoneNumber();

  const phoneKey = deps.tokenHasher.hash(params.phoneNumber);

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    requestId: meta.requestId,
    phoneKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:phone:${phoneKey}`,
    ...AUTH_RATE_LIMITS.register.perPhone,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${meta.ip ?? 'unknown'}`,
    ...AUTH_RATE_LIMITS.register.perIp,
  });

  if (await getUserByPhone(deps.db, params.phoneNumber)) throw AuthErrors.phoneTaken();
  if (await getUserByEmail(deps.db, email)) throw AuthErrors.emailTaken();

  const passwordHash = await deps.passwordHasher.hash(params.password);

  let result: AuthResult & { sessionId: string };

  try {
    result = await deps.db.transaction().execute(async (trx) => {
      const { id: userId } = await deps.userRepo.withDb(trx).insertUser({
        phoneNumber: params.phoneNumber,
        email,
        firstName: params.firstName,
        lastName: params.lastName,
        passwordHash,
      });

      await deps.profileRepo.withDb(trx).insertProfile({ userId });
      await deps.settingsRepo.withDb(trx).ensureSettings(userId);
      await deps.labelRepo.withDb(trx).insertDefaultLabels(userId);

      const session = await deps.sessionService.issue({ userId, db: trx });

      await auditRegisterSuccess(
        new AuditWriter(deps.auditRepo.withDb(trx), { ...meta, userId }),
        { userId, sessionId: session.sessionId },
      );

      const user = await getUserById(trx, userId);
      if (!user) throw AppError.internal('Registered user not readable', { userId });

      return { user, sessionToken: session.token, sessionId: session.sessionId };
    });
  } catch (err) {
    if (isUniqueViolation(err, USER_PHONE_UNIQUE)) throw AuthErrors.phoneTaken();
    if (isUniqueViolation(err, USER_EMAIL_UNIQUE)) throw AuthErrors.emailTaken();
    throw err;
  }

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    requestId: meta.requestId,
    userId: result.user.id,
    sessionId: result.sessionId,
  });

  return { user: result.user, sessionToken: result.sessionToken };
}
