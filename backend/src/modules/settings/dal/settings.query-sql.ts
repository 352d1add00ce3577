/**
 * backend/src/modules/settings/dal/settings.query-sql.ts
 *
 * DAL READS ONLY for user_settings.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserSettingsTable } from '../../../shared/db/schema';

export type SettingsRow = Selectable<UserSettingsTable>;

export async function selectSettingsByUserIdSql(
  db: DbExecutor,
  userId: string,
): Promise<SettingsRow | undefined> {
  return db
    .selectFrom('user_settings')
    .selectAll()
    .where('user_id', '=', userId)
    .executeTakeFirst();
}
