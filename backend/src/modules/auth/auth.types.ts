/**
 * src/modules/auth/auth.types.ts
 */

import type { User, UserView } from '../users';
import type { RequestMeta } from '../../shared/http/request-meta';

export type RegisterParams = {
  phoneNumber: string;
  password: string;
  firstName: string;
  lastName: string;
  email: string;
  meta: RequestMeta;
};

export type LoginParams = {
  identifier: string;
  password: string;
  meta: RequestMeta;
};

/** Register/login outcome. The raw token leaves the server exactly once, here. */
export type AuthResult = {
  user: User;
  sessionToken: string;
};

export type AuthResultView = {
  user: UserView;
  session_token: string;
};

export type TwoFactorCodeIssued = {
  expiresAt: Date;
};
