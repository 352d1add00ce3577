/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so flows don't repeat it on every audit call.
 * - Supports progressive enrichment via withContext():
 *     start of request → requestId, ip, userAgent
 *     after the user is known → + userId
 *   Each call returns a NEW immutable writer.
 * - withDb() rebinds the writer to a transaction so audit rows commit or roll
 *   back with the change they describe.
 *
 * RULES:
 * - No module types imported here. No business rules. No AppError.
 */

import type { DbExecutor } from '../db/db';
import type { AuditRepo } from './audit.repo';
import type { AuditAction, AuditContext, AuditMetadata } from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  userId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export class AuditWriter {
  private readonly repo: AuditRepo;
  private readonly context: Readonly<AuditContext>;

  constructor(repo: AuditRepo, context?: Partial<AuditContext>) {
    this.repo = repo;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  /**
   * Returns a NEW writer with merged context.
   *
   * Usage:
   *   const audit = new AuditWriter(repo, { requestId, ip, userAgent });
   *   const withUser = audit.withContext({ userId: user.id });
   */
  withContext(extra: Partial<AuditContext>): AuditWriter {
    return new AuditWriter(this.repo, { ...this.context, ...extra });
  }

  withDb(db: DbExecutor): AuditWriter {
    return new AuditWriter(this.repo.withDb(db), this.context);
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.repo.append({
      ...this.context,
      action,
      metadata,
    });
  }
}
