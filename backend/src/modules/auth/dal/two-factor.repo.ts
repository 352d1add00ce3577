/**
 * src/modules/auth/dal/two-factor.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for two_factor_codes.
 *
 * KEY DESIGN:
 * - invalidateUnused(): issuing a new code retires every older unused one,
 *   so at most one code per user is ever redeemable.
 * - consumeAtomic(): single UPDATE ... WHERE used_at IS NULL RETURNING.
 *   No separate SELECT, so two concurrent requests cannot both redeem
 *   the same code. No row back → wrong, expired or already used.
 *
 * RULES:
 * - No transactions started here (flows own tx scope).
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class TwoFactorRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): TwoFactorRepo {
    return new TwoFactorRepo(db);
  }

  async invalidateUnused(params: { userId: string; now: Date }): Promise<void> {
    await this.db
      .updateTable('two_factor_codes')
      .set({ used_at: params.now })
      .where('user_id', '=', params.userId)
      .where('used_at', 'is', null)
      .execute();
  }

  async insertCode(params: {
    userId: string;
    codeHash: string;
    expiresAt: Date;
  }): Promise<{ id: string }> {
    return this.db
      .insertInto('two_factor_codes')
      .values({
        user_id: params.userId,
        code_hash: params.codeHash,
        expires_at: params.expiresAt,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  async consumeAtomic(params: {
    userId: string;
    codeHash: string;
    now: Date;
  }): Promise<{ id: string } | null> {
    const row = await this.db
      .updateTable('two_factor_codes')
      .set({ used_at: params.now })
      .where('user_id', '=', params.userId)
      .where('code_hash', '=', params.codeHash)
      .where('used_at', 'is', null)
      .where('expires_at', '>', params.now)
      .returning(['id'])
      .executeTakeFirst();

    return row ?? null;
  }
}
