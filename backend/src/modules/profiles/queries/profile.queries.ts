/**
 * backend/src/modules/profiles/queries/profile.queries.ts
 *
 * Read-only; shapes profile rows into domain types.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectProfileByUserIdSql, type ProfileRow } from '../dal/profile.query-sql';
import type { Profile } from '../profile.types';

function toProfile(row: ProfileRow): Profile {
  return {
    id: row.id,
    userId: row.user_id,
    bio: row.bio,
    birthdate: row.birthdate,
    profilePicture: row.profile_picture,
    twoFactorEnabled: row.two_factor_enabled,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getProfileByUserId(
  db: DbExecutor,
  userId: string,
): Promise<Profile | undefined> {
  const row = await selectProfileByUserIdSql(db, userId);
  return row ? toProfile(row) : undefined;
}
