/**
 * backend/src/modules/settings/queries/settings.queries.ts
 *
 * Read-only; shapes settings rows into domain types.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectSettingsByUserIdSql, type SettingsRow } from '../dal/settings.query-sql';
import type { UserSettings } from '../settings.types';

export function toUserSettings(row: SettingsRow): UserSettings {
  return {
    id: row.id,
    userId: row.user_id,
    autoReplyEnabled: row.auto_reply_enabled,
    autoReplyStartDate: row.auto_reply_start_date,
    autoReplyEndDate: row.auto_reply_end_date,
    autoReplyMessage: row.auto_reply_message,
    fontFamily: row.font_family,
    fontSize: row.font_size,
    darkMode: row.dark_mode,
    updatedAt: row.updated_at,
  };
}

export async function getSettingsByUserId(
  db: DbExecutor,
  userId: string,
): Promise<UserSettings | undefined> {
  const row = await selectSettingsByUserIdSql(db, userId);
  return row ? toUserSettings(row) : undefined;
}
