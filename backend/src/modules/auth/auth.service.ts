/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates registration, login, logout, token validation and
 *   two-factor enrolment.
 * - Only place in the auth module allowed to start transactions
 *   (directly or through its flows).
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Never store/log raw passwords, tokens or codes.
 * - Audit meaningful actions via AuditWriter.
 * - Logout never fails for missing session state; validation never mutates.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Queue } from '../../shared/messaging/queue';
import type { RequestMeta } from '../../shared/http/request-meta';
import { AppError } from '../../shared/http/errors';

import { getUserById, type User, type UserRepo } from '../users';
import type { ProfileRepo } from '../profiles';
import type { SettingsRepo } from '../settings';
import type { LabelRepo } from '../labels';
import type { SessionService } from '../sessions';

import type { TwoFactorRepo } from './dal/two-factor.repo';
import { AuthErrors } from './auth.errors';
import { auditLogout } from './auth.audit';
import type { AuthResult, LoginParams, RegisterParams, TwoFactorCodeIssued } from './auth.types';

import { executeRegisterFlow } from './flows/register/execute-register-flow';
import { executeLoginFlow } from './flows/login/execute-login-flow';
import { issueTwoFactorCodeFlow } from './flows/two-factor/issue-two-factor-code-flow';
import { verifyTwoFactorCodeFlow } from './flows/two-factor/verify-two-factor-code-flow';

export type AuthServiceDeps = {
  db: DbExecutor;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  twoFactorHasher: KeyedHasher;
  logger: Logger;
  rateLimiter: RateLimiter;
  auditRepo: AuditRepo;
  queue: Queue;
  userRepo: UserRepo;
  profileRepo: ProfileRepo;
  settingsRepo: SettingsRepo;
  labelRepo: LabelRepo;
  twoFactorRepo: TwoFactorRepo;
  sessionService: SessionService;
  twoFactorCodeTtlSeconds: number;
  now?: () => Date;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async register(params: RegisterParams): Promise<AuthResult> {
    return executeRegisterFlow(this.deps, params);
  }

  async login(params: LoginParams): Promise<AuthResult> {
    return executeLoginFlow(this.deps, params);
  }

  async logout(params: { sessionToken: string | null; meta: RequestMeta }): Promise<void> {
    const revoked = params.sessionToken
      ? await this.deps.sessionService.revoke(params.sessionToken)
      : undefined;

    if (revoked) {
      await auditLogout(
        new AuditWriter(this.deps.auditRepo, { ...params.meta, userId: revoked.userId }),
        { sessionId: revoked.id },
      );
    }

    this.deps.logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId: params.meta.requestId,
      userId: revoked?.userId ?? null,
      sessionId: revoked?.id ?? null,
    });
  }

  async validateToken(sessionToken: string | null): Promise<User> {
    if (!sessionToken) throw AuthErrors.tokenInvalid();

    const session = await this.deps.sessionService.resolve(sessionToken);
    if (!session) throw AuthErrors.tokenInvalid();

    const user = await getUserById(this.deps.db, session.userId);
    if (!user) throw AppError.internal('Session owner missing', { sessionId: session.sessionId });

    return user;
  }

  async issueTwoFactorCode(params: {
    userId: string;
    meta: RequestMeta;
  }): Promise<TwoFactorCodeIssued> {
    return issueTwoFactorCodeFlow(
      {
        db: this.deps.db,
        logger: this.deps.logger,
        rateLimiter: this.deps.rateLimiter,
        keyedHasher: this.deps.twoFactorHasher,
        auditRepo: this.deps.auditRepo,
        queue: this.deps.queue,
        twoFactorRepo: this.deps.twoFactorRepo,
        codeTtlSeconds: this.deps.twoFactorCodeTtlSeconds,
        now: this.now(),
      },
      params,
    );
  }

  async verifyTwoFactorCode(params: {
    userId: string;
    code: string;
    meta: RequestMeta;
  }): Promise<void> {
    return verifyTwoFactorCodeFlow(
      {
        db: this.deps.db,
        logger: this.deps.logger,
        rateLimiter: this.deps.rateLimiter,
        keyedHasher: this.deps.twoFactorHasher,
        auditRepo: this.deps.auditRepo,
        twoFactorRepo: this.deps.twoFactorRepo,
        profileRepo: this.deps.profileRepo,
        now: this.now(),
      },
      params,
    );
  }
}
