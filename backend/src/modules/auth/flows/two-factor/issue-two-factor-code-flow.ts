/**
 * backend/src/modules/auth/flows/two-factor/issue-two-factor-code-flow.ts
 *
 * WHY:
 * - Starts two-factor enrolment: a 6-digit code goes to the user's phone
 *   out-of-band; the HTTP response only says that it was sent.
 *
 * RULES:
 * - Requires the caller's profile (the flag lives there).
 * - Only the HMAC of the code is stored; older unused codes are retired in
 *   the same transaction as the insert.
 * - The SMS message is enqueued AFTER commit, so a code is never sent for a
 *   row that was rolled back.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { KeyedHasher } from '../../../../shared/security/keyed-hasher';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { Queue } from '../../../../shared/messaging/queue';
import type { RequestMeta } from '../../../../shared/http/request-meta';
import { generateVerificationCode } from '../../../../shared/security/token';
import { AppError } from '../../../../shared/http/errors';

import { getUserById } from '../../../users';
import { getProfileByUserId } from '../../../profiles';

import type { TwoFactorRepo } from '../../dal/two-factor.repo';
import { AuthErrors } from '../../auth.errors';
import { auditTwoFactorCodeIssued } from '../../auth.audit';
import { AUTH_RATE_LIMITS, TWO_FACTOR_CODE_DIGITS } from '../../auth.constants';
import type { TwoFactorCodeIssued } from '../../auth.types';

export async function issueTwoFactorCodeFlow(
  deps: {
    db: DbExecutor;
    logger: Logger;
    rateLimiter: RateLimiter;
    keyedHasher: KeyedHasher;
    auditRepo: AuditRepo;
    queue: Queue;
    twoFactorRepo: TwoFactorRepo;
    codeTtlSeconds: number;
    now: Date;
  },
  params: { userId: string; meta: RequestMeta },
): Promise<TwoFactorCodeIssued> {
  const { userId, meta } = params;

  await deps.rateLimiter.hitOrThrow({
    key: `2fa-issue:user:${userId}`,
    ...AUTH_RATE_LIMITS.twoFactorIssue.perUser,
  });

  const profile = await getProfileByUserId(deps.db, userId);
  if (!profile) throw AuthErrors.profileNotFound();

  const user = await getUserById(deps.db, userId);
  if (!user) throw AppError.internal('Profile owner missing', { userId });

  const code = generateVerificationCode(TWO_FACTOR_CODE_DIGITS);
  const expiresAt = new Date(deps.now.getTime() + deps.codeTtlSeconds * 1000);

  const { id: codeId } = await deps.db.transaction().execute(async (trx) => {
    const repo = deps.twoFactorRepo.withDb(trx);

    await repo.invalidateUnused({ userId, now: deps.now });
    const inserted = await repo.insertCode({
      userId,
      codeHash: deps.keyedHasher.hash(code),
      expiresAt,
    });

    await auditTwoFactorCodeIssued(
      new AuditWriter(deps.auditRepo.withDb(trx), { ...meta, userId }),
      { codeId: inserted.id, expiresAt },
    );

    return inserted;
  });

  await deps.queue.enqueue({
    type: 'sms.two-factor-code',
    userId,
    phoneNumber: user.phoneNumber,
    code,
    expiresAt: expiresAt.toISOString(),
  });

  deps.logger.info({
    msg: 'auth.two_factor.issue.success',
    flow: 'auth.two_factor.issue',
    requestId: meta.requestId,
    userId,
    codeId,
  });

  return { expiresAt };
}
