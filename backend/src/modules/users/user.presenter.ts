/**
 * backend/src/modules/users/user.presenter.ts
 *
 * Domain User → snake_case wire views. Never includes the password hash.
 */

import type { User, UserSummaryView, UserView } from './user.types';

export function toUserView(user: User): UserView {
  return {
    id: user.id,
    phone_number: user.phoneNumber,
    email: user.email,
    first_name: user.firstName,
    last_name: user.lastName,
    created_at: user.createdAt.toISOString(),
  };
}

export function toUserSummaryView(
  user: Pick<User, 'id' | 'phoneNumber' | 'email' | 'firstName' | 'lastName'>,
): UserSummaryView {
  return {
    id: user.id,
    phone_number: user.phoneNumber,
    email: user.email,
    first_name: user.firstName,
    last_name: user.lastName,
  };
}
