/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module (the credential store's identities).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash only travels on UserCredentials, which only the login flow reads.
 */

export type UserId = string;

export type User = {
  id: UserId;
  phoneNumber: string;
  email: string;
  firstName: string;
  lastName: string;

  createdAt: Date;
  updatedAt: Date;
};

export type UserCredentials = User & {
  passwordHash: string;
};

/** Snake_case wire shape returned by every endpoint that includes a user. */
export type UserView = {
  id: string;
  phone_number: string;
  email: string;
  first_name: string;
  last_name: string;
  created_at: string;
};

export type UserSummaryView = Omit<UserView, 'created_at'>;
