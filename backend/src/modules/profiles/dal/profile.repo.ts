/**
 * backend/src/modules/profiles/dal/profile.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for user_profiles.
 *
 * RULES:
 * - No transactions started here. No AppError.
 * - Every mutation is keyed by user_id (unique) and reports whether a row
 *   existed, so callers can answer 404 without a separate read.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class ProfileRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): ProfileRepo {
    return new ProfileRepo(db);
  }

  async insertProfile(params: { userId: string }): Promise<{ id: string }> {
    return this.db
      .insertInto('user_profiles')
      .values({ user_id: params.userId })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  async updateProfile(
    userId: string,
    patch: { bio?: string | null; birthdate?: string | null; profilePicture?: string },
  ): Promise<boolean> {
    const result = await this.db
      .updateTable('user_profiles')
      .set({
        ...(patch.bio !== undefined ? { bio: patch.bio } : {}),
        ...(patch.birthdate !== undefined ? { birthdate: patch.birthdate } : {}),
        ...(patch.profilePicture !== undefined ? { profile_picture: patch.profilePicture } : {}),
        updated_at: new Date(),
      })
      .where('user_id', '=', userId)
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }

  async setTwoFactorEnabled(userId: string, enabled: boolean): Promise<boolean> {
    const result = await this.db
      .updateTable('user_profiles')
      .set({ two_factor_enabled: enabled, updated_at: new Date() })
      .where('user_id', '=', userId)
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }

  /** Deletes the profile; returns its picture reference, or undefined when no row existed. */
  async deleteProfile(userId: string): Promise<{ profilePicture: string | null } | undefined> {
    const row = await this.db
      .deleteFrom('user_profiles')
      .where('user_id', '=', userId)
      .returning(['profile_picture'])
      .executeTakeFirst();

    return row ? { profilePicture: row.profile_picture } : undefined;
  }
}
