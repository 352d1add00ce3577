/**
 * src/modules/auth/helpers/build-auth-result.ts
 */

import { toUserView } from '../../users';
import type { AuthResult, AuthResultView } from '../auth.types';

export function toAuthResultView(result: AuthResult): AuthResultView {
  return { user: toUserView(result.user), session_token: result.sessionToken };
}
