/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service/flow owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - Phone and email uniqueness is enforced by DB constraints
 *   (USER_PHONE_UNIQUE / USER_EMAIL_UNIQUE); callers map the violation.
 */

import type { DbExecutor } from '../../../shared/db/db';

export const USER_PHONE_UNIQUE = 'users_phone_number_unique';
export const USER_EMAIL_UNIQUE = 'users_email_unique';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  async insertUser(params: {
    phoneNumber: string;
    email: string;
    firstName: string;
    lastName: string;
    passwordHash: string;
  }): Promise<{ id: string }> {
    return this.db
      .insertInto('users')
      .values({
        phone_number: params.phoneNumber,
        email: params.email.toLowerCase(),
        first_name: params.firstName,
        last_name: params.lastName,
        password_hash: params.passwordHash,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  /** Partial update of the editable name/email fields. No-op when nothing is given. */
  async updateUser(
    userId: string,
    patch: { firstName?: string; lastName?: string; email?: string },
  ): Promise<void> {
    const values = {
      ...(patch.firstName !== undefined ? { first_name: patch.firstName } : {}),
      ...(patch.lastName !== undefined ? { last_name: patch.lastName } : {}),
      ...(patch.email !== undefined ? { email: patch.email.toLowerCase() } : {}),
    };
    if (Object.keys(values).length === 0) return;

    await this.db
      .updateTable('users')
      .set({ ...values, updated_at: new Date() })
      .where('id', '=', userId)
      .execute();
  }
}
