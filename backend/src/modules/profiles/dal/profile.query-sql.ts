/**
 * backend/src/modules/profiles/dal/profile.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for user_profiles.
 *
 * RULES:
 * - birthdate is a Postgres `date`; it is read back as text (YYYY-MM-DD) so
 *   no driver ever shifts it through a local-time Date.
 */

import { sql } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';

export type ProfileRow = {
  id: string;
  user_id: string;
  bio: string | null;
  birthdate: string | null;
  profile_picture: string | null;
  two_factor_enabled: boolean;
  created_at: Date;
  updated_at: Date;
};

export async function selectProfileByUserIdSql(
  db: DbExecutor,
  userId: string,
): Promise<ProfileRow | undefined> {
  return db
    .selectFrom('user_profiles')
    .select([
      'id',
      'user_id',
      'bio',
      sql<string | null>`to_char(birthdate, 'YYYY-MM-DD')`.as('birthdate'),
      'profile_picture',
      'two_factor_enabled',
      'created_at',
      'updated_at',
    ])
    .where('user_id', '=', userId)
    .executeTakeFirst();
}
