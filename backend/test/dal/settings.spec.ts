import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createInProcessDb } from '../helpers/in-process-postgres';
import { seedUser } from '../helpers/seed';
import { migrateToLatest } from '../../src/shared/db/migrator';
import type { Db } from '../../src/shared/db/db';
import { SettingsRepo } from '../../src/modules/settings/dal/settings.repo';
import { getSettingsByUserId } from '../../src/modules/settings/queries/settings.queries';

const window = {
  start: new Date('2024-05-01T00:00:00.000Z'),
  end: new Date('2024-05-31T00:00:00.000Z'),
};

describe('settings DAL', () => {
  let db: Db;

  beforeEach(async () => {
    db = createInProcessDb();
    await migrateToLatest(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('ensureSettings creates exactly one row with defaults, even when raced', async () => {
    const user = await seedUser(db);
    const repo = new SettingsRepo(db);

    await Promise.all([repo.ensureSettings(user.id), repo.ensureSettings(user.id)]);
    await repo.ensureSettings(user.id);

    const rows = await db
      .selectFrom('user_settings')
      .select('id')
      .where('user_id', '=', user.id)
      .execute();
    expect(rows).toHaveLength(1);

    const settings = await getSettingsByUserId(db, user.id);
    expect(settings).toMatchObject({
      autoReplyEnabled: false,
      autoReplyStartDate: null,
      autoReplyEndDate: null,
      autoReplyMessage: '',
      fontFamily: 'Arial',
      fontSize: 14,
      darkMode: false,
    });
  });

  it('toggling on fills a missing window; toggling off keeps the dates', async () => {
    const user = await seedUser(db);
    const repo = new SettingsRepo(db);
    await repo.ensureSettings(user.id);

    const on = await repo.toggleAutoReply(user.id, window);
    expect(on?.auto_reply_enabled).toBe(true);
    expect(on?.auto_reply_start_date?.toISOString()).toBe('2024-05-01T00:00:00.000Z');
    expect(on?.auto_reply_end_date?.toISOString()).toBe('2024-05-31T00:00:00.000Z');

    const later = {
      start: new Date('2024-07-01T00:00:00.000Z'),
      end: new Date('2024-07-31T00:00:00.000Z'),
    };
    const off = await repo.toggleAutoReply(user.id, later);
    expect(off?.auto_reply_enabled).toBe(false);
    expect(off?.auto_reply_start_date?.toISOString()).toBe('2024-05-01T00:00:00.000Z');
    expect(off?.auto_reply_end_date?.toISOString()).toBe('2024-05-31T00:00:00.000Z');
  });

  it('toggling on keeps dates that are already set', async () => {
    const user = await seedUser(db);
    const repo = new SettingsRepo(db);
    await repo.ensureSettings(user.id);
    await repo.updateAutoReply(user.id, {
      startDate: new Date('2024-06-10T00:00:00.000Z'),
      endDate: null,
    });

    const on = await repo.toggleAutoReply(user.id, window);

    expect(on?.auto_reply_start_date?.toISOString()).toBe('2024-06-10T00:00:00.000Z');
    expect(on?.auto_reply_end_date?.toISOString()).toBe('2024-05-31T00:00:00.000Z');
  });

  it('updates return undefined when the user has no settings row', async () => {
    const user = await seedUser(db);

    expect(await new SettingsRepo(db).setDarkMode(user.id, true)).toBeUndefined();
  });

  it('updateFont leaves unspecified fields alone', async () => {
    const user = await seedUser(db);
    const repo = new SettingsRepo(db);
    await repo.ensureSettings(user.id);

    const row = await repo.updateFont(user.id, { fontSize: 18 });

    expect(row?.font_family).toBe('Arial');
    expect(row?.font_size).toBe(18);
  });
});
