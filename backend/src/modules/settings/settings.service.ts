/**
 * src/modules/settings/settings.service.ts
 *
 * WHY:
 * - Auto-reply, font and dark-mode preferences over one lazily created row.
 *
 * RULES:
 * - Every read/write starts with ensureSettings() (idempotent insert), so a
 *   user without a row gets the defaults instead of a 404.
 * - Writes return the row as persisted (UPDATE ... RETURNING).
 * - Validation that spans fields (auto-reply range) happens before any write.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { AppError } from '../../shared/http/errors';
import type { SettingsRepo } from './dal/settings.repo';
import type { SettingsRow } from './dal/settings.query-sql';
import { getSettingsByUserId, toUserSettings } from './queries/settings.queries';
import {
  defaultAutoReplyWindow,
  isAutoReplyRangeValid,
} from './policies/auto-reply-window.policy';
import { SettingsErrors } from './settings.errors';
import type { AutoReplyPatch, FontPatch, UserSettings } from './settings.types';

export class SettingsService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      settingsRepo: SettingsRepo;
      now?: () => Date;
    },
  ) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async getSettings(userId: string): Promise<UserSettings> {
    await this.deps.settingsRepo.ensureSettings(userId);

    const settings = await getSettingsByUserId(this.deps.db, userId);
    if (!settings) throw AppError.internal('Settings row missing after ensure', { userId });
    return settings;
  }

  async updateAutoReply(userId: string, patch: AutoReplyPatch): Promise<UserSettings> {
    if (!isAutoReplyRangeValid(patch)) throw SettingsErrors.startNotBeforeEnd();

    await this.deps.settingsRepo.ensureSettings(userId);
    const row = await this.deps.settingsRepo.updateAutoReply(userId, patch);
    return this.written(row, userId, 'settings.auto_reply.update');
  }

  async toggleAutoReply(userId: string): Promise<UserSettings> {
    await this.deps.settingsRepo.ensureSettings(userId);
    const row = await this.deps.settingsRepo.toggleAutoReply(
      userId,
      defaultAutoReplyWindow(this.now()),
    );
    return this.written(row, userId, 'settings.auto_reply.toggle');
  }

  async updateFont(userId: string, patch: FontPatch): Promise<UserSettings> {
    await this.deps.settingsRepo.ensureSettings(userId);
    const row = await this.deps.settingsRepo.updateFont(userId, patch);
    return this.written(row, userId, 'settings.font.update');
  }

  async setDarkMode(userId: string, darkMode: boolean): Promise<UserSettings> {
    await this.deps.settingsRepo.ensureSettings(userId);
    const row = await this.deps.settingsRepo.setDarkMode(userId, darkMode);
    return this.written(row, userId, 'settings.dark_mode.update');
  }

  private written(row: SettingsRow | undefined, userId: string, flow: string): UserSettings {
    // The row was ensured just before; only a concurrent account delete removes it.
    if (!row) throw AppError.internal('Settings row missing after ensure', { userId, flow });

    this.deps.logger.info({ msg: `${flow}.success`, flow, userId });
    return toUserSettings(row);
  }
}
