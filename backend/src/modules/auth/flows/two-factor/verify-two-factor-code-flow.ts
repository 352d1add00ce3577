/**
 * backend/src/modules/auth/flows/two-factor/verify-two-factor-code-flow.ts
 *
 * WHY:
 * - Completes two-factor enrolment: a matching unused, unexpired code turns
 *   two_factor_enabled on.
 *
 * RULES:
 * - Rate limited per user (5 / 15 min): six digits are guessable otherwise.
 * - Consumption is one UPDATE ... RETURNING; the flag flip and the audit row
 *   commit with it.
 * - A failed attempt is audited outside the transaction.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { KeyedHasher } from '../../../../shared/security/keyed-hasher';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { RequestMeta } from '../../../../shared/http/request-meta';

import { getProfileByUserId, type ProfileRepo } from '../../../profiles';

import type { TwoFactorRepo } from '../../dal/two-factor.repo';
import { AuthErrors } from '../../auth.errors';
import { auditTwoFactorEnabled, auditTwoFactorFailed } from '../../auth.audit';
import { AUTH_RATE_LIMITS } from '../../auth.constants';

export async function verifyTwoFactorCodeFlow(
  deps: {
    db: DbExecutor;
    logger: Logger;
    rateLimiter: RateLimiter;
    keyedHasher: KeyedHasher;
    auditRepo: AuditRepo;
    twoFactorRepo: TwoFactorRepo;
    profileRepo: ProfileRepo;
    now: Date;
  },
  params: { userId: string; code: string; meta: RequestMeta },
): Promise<void> {
  const { userId, meta } = params;

  await deps.rateLimiter.hitOrThrow({
    key: `2fa-verify:user:${userId}`,
    ...AUTH_RATE_LIMITS.twoFactorVerify.perUser,
  });

  const profile = await getProfileByUserId(deps.db, userId);
  if (!profile) throw AuthErrors.profileNotFound();

  const consumed = await deps.db.transaction().execute(async (trx) => {
    const row = await deps.twoFactorRepo.withDb(trx).consumeAtomic({
      userId,
      codeHash: deps.keyedHasher.hash(params.code),
      now: deps.now,
    });
    if (!row) return null;

    await deps.profileRepo.withDb(trx).setTwoFactorEnabled(userId, true);
    await auditTwoFactorEnabled(
      new AuditWriter(deps.auditRepo.withDb(trx), { ...meta, userId }),
      { codeId: row.id },
    );

    return row;
  });

  if (!consumed) {
    await auditTwoFactorFailed(new AuditWriter(deps.auditRepo, { ...meta, userId }));
    deps.logger.info({
      msg: 'auth.two_factor.verify.failed',
      flow: 'auth.two_factor.verify',
      requestId: meta.requestId,
      userId,
    });
    throw AuthErrors.invalidVerificationCode();
  }

  deps.logger.info({
    msg: 'auth.two_factor.verify.success',
    flow: 'auth.two_factor.verify',
    requestId: meta.requestId,
    userId,
  });
}
