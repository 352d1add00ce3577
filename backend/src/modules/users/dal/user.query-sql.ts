/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Emails are stored lowercase; callers may pass any case.
 */

import type { Expression, Selectable, SqlBool } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectUserByPhoneSql(
  db: DbExecutor,
  phoneNumber: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('phone_number', '=', phoneNumber)
    .executeTakeFirst();
}

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}

/** Users matching any of the given phone numbers or (lowercased) emails. */
export async function selectUsersByPhonesOrEmailsSql(
  db: DbExecutor,
  params: { phoneNumbers: string[]; emails: string[] },
): Promise<UserRow[]> {
  const emails = params.emails.map((e) => e.toLowerCase());
  if (params.phoneNumbers.length === 0 && emails.length === 0) return [];

  return db
    .selectFrom('users')
    .selectAll()
    .where((eb) => {
      const ors: Expression<SqlBool>[] = [];
      if (params.phoneNumbers.length) ors.push(eb('phone_number', 'in', params.phoneNumbers));
      if (emails.length) ors.push(eb('email', 'in', emails));
      return eb.or(ors);
    })
    .execute();
}
