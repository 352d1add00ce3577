/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export {
  getUserById,
  getUserByPhone,
  getUserByEmail,
  getUserCredentials,
  getUsersByPhonesOrEmails,
} from './queries/user.queries';
export { toUserView, toUserSummaryView } from './user.presenter';
export { UserRepo, USER_PHONE_UNIQUE, USER_EMAIL_UNIQUE } from './dal/user.repo';
export { isValidPhoneNumber, INVALID_PHONE_NUMBER_MESSAGE } from './policies/phone-number.policy';
export { classifyUserIdentifier, type UserIdentifier } from './policies/user-identifier.policy';
export type { User, UserCredentials, UserView, UserSummaryView } from './user.types';
