/**
 * backend/src/modules/settings/dal/settings.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for user_settings.
 *
 * RULES:
 * - No transactions started here. No AppError.
 * - ensureSettings() is INSERT ... ON CONFLICT (user_id) DO NOTHING: two
 *   concurrent first accesses create exactly one row.
 * - toggleAutoReply() is ONE UPDATE; the flip and the default window are
 *   computed from the row's current values inside SQL, so concurrent toggles
 *   never read a stale state.
 * - Updates return the new row (RETURNING), or undefined when no row exists.
 */

import { sql } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { SettingsRow } from './settings.query-sql';

export class SettingsRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): SettingsRepo {
    return new SettingsRepo(db);
  }

  async ensureSettings(userId: string): Promise<void> {
    await this.db
      .insertInto('user_settings')
      .values({ user_id: userId })
      .onConflict((oc) => oc.column('user_id').doNothing())
      .execute();
  }

  async updateAutoReply(
    userId: string,
    patch: {
      enabled?: boolean;
      startDate?: Date | null;
      endDate?: Date | null;
      message?: string;
    },
  ): Promise<SettingsRow | undefined> {
    return this.db
      .updateTable('user_settings')
      .set({
        ...(patch.enabled !== undefined ? { auto_reply_enabled: patch.enabled } : {}),
        ...(patch.startDate !== undefined ? { auto_reply_start_date: patch.startDate } : {}),
        ...(patch.endDate !== undefined ? { auto_reply_end_date: patch.endDate } : {}),
        ...(patch.message !== undefined ? { auto_reply_message: patch.message } : {}),
        updated_at: new Date(),
      })
      .where('user_id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }

  /**
   * Flips auto_reply_enabled. When the new state is enabled, a missing start
   * becomes `window.start` and a missing end becomes `window.end`.
   */
  async toggleAutoReply(
    userId: string,
    window: { start: Date; end: Date },
  ): Promise<SettingsRow | undefined> {
    return this.db
      .updateTable('user_settings')
      .set({
        auto_reply_enabled: sql<boolean>`NOT auto_reply_enabled`,
        auto_reply_start_date: sql<Date | null>`CASE WHEN auto_reply_enabled
          THEN auto_reply_start_date
          ELSE COALESCE(auto_reply_start_date, ${window.start}) END`,
        auto_reply_end_date: sql<Date | null>`CASE WHEN auto_reply_enabled
          THEN auto_reply_end_date
          ELSE COALESCE(auto_reply_end_date, ${window.end}) END`,
        updated_at: window.start,
      })
      .where('user_id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }

  async updateFont(
    userId: string,
    patch: { fontFamily?: string; fontSize?: number },
  ): Promise<SettingsRow | undefined> {
    return this.db
      .updateTable('user_settings')
      .set({
        ...(patch.fontFamily !== undefined ? { font_family: patch.fontFamily } : {}),
        ...(patch.fontSize !== undefined ? { font_size: patch.fontSize } : {}),
        updated_at: new Date(),
      })
      .where('user_id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }

  async setDarkMode(userId: string, darkMode: boolean): Promise<SettingsRow | undefined> {
    return this.db
      .updateTable('user_settings')
      .set({ dark_mode: darkMode, updated_at: new Date() })
      .where('user_id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }
}
