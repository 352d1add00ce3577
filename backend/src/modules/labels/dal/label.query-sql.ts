/**
 * backend/src/modules/labels/dal/label.query-sql.ts
 *
 * DAL READS ONLY for labels. Always scoped to the owning user.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { LabelsTable } from '../../../shared/db/schema';

export type LabelRow = Selectable<LabelsTable>;

export async function selectLabelsForUserSql(db: DbExecutor, userId: string): Promise<LabelRow[]> {
  return db
    .selectFrom('labels')
    .selectAll()
    .where('user_id', '=', userId)
    .orderBy('name', 'asc')
    .execute();
}

export async function selectLabelsByNamesSql(
  db: DbExecutor,
  params: { userId: string; names: string[] },
): Promise<LabelRow[]> {
  if (params.names.length === 0) return [];

  return db
    .selectFrom('labels')
    .selectAll()
    .where('user_id', '=', params.userId)
    .where('name', 'in', params.names)
    .execute();
}
