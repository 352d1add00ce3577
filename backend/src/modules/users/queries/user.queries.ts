/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUserByPhoneSql,
  selectUsersByPhonesOrEmailsSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User, UserCredentials } from '../user.types';
import type { UserIdentifier } from '../policies/user-identifier.policy';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    phoneNumber: row.phone_number,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  return row ? toUser(row) : undefined;
}

export async function getUserByPhone(
  db: DbExecutor,
  phoneNumber: string,
): Promise<User | undefined> {
  const row = await selectUserByPhoneSql(db, phoneNumber);
  return row ? toUser(row) : undefined;
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  return row ? toUser(row) : undefined;
}

/** Login lookup: includes the password hash. */
export async function getUserCredentials(
  db: DbExecutor,
  identifier: UserIdentifier,
): Promise<UserCredentials | undefined> {
  const row =
    identifier.kind === 'email'
      ? await selectUserByEmailSql(db, identifier.value)
      : await selectUserByPhoneSql(db, identifier.value);

  return row ? { ...toUser(row), passwordHash: row.password_hash } : undefined;
}

export async function getUsersByPhonesOrEmails(
  db: DbExecutor,
  params: { phoneNumbers: string[]; emails: string[] },
): Promise<User[]> {
  const rows = await selectUsersByPhonesOrEmailsSql(db, params);
  return rows.map(toUser);
}
