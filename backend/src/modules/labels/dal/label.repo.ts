/**
 * backend/src/modules/labels/dal/label.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for labels.
 *
 * RULES:
 * - No transactions started here. No AppError.
 * - insertDefaultLabels() is idempotent per (user_id, name).
 */

import type { DbExecutor } from '../../../shared/db/db';
import { DEFAULT_LABELS } from '../label.constants';

export class LabelRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): LabelRepo {
    return new LabelRepo(db);
  }

  async insertDefaultLabels(userId: string): Promise<void> {
    await this.db
      .insertInto('labels')
      .values(DEFAULT_LABELS.map((l) => ({ user_id: userId, name: l.name, color: l.color })))
      .onConflict((oc) => oc.columns(['user_id', 'name']).doNothing())
      .execute();
  }
}
