/**
 * backend/src/modules/labels/queries/label.queries.ts
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectLabelsByNamesSql,
  selectLabelsForUserSql,
  type LabelRow,
} from '../dal/label.query-sql';
import type { Label } from '../label.types';

function toLabel(row: LabelRow): Label {
  return { id: row.id, userId: row.user_id, name: row.name, color: row.color };
}

export async function listLabelsForUser(db: DbExecutor, userId: string): Promise<Label[]> {
  const rows = await selectLabelsForUserSql(db, userId);
  return rows.map(toLabel);
}

/** The caller's labels with these exact names (unknown names are simply absent). */
export async function getLabelsByNames(
  db: DbExecutor,
  params: { userId: string; names: string[] },
): Promise<Label[]> {
  const rows = await selectLabelsByNamesSql(db, params);
  return rows.map(toLabel);
}
