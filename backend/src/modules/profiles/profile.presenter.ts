/**
 * backend/src/modules/profiles/profile.presenter.ts
 */

import type { Profile, ProfileView } from './profile.types';

export function toProfileView(profile: Profile): ProfileView {
  return {
    id: profile.id,
    bio: profile.bio,
    birthdate: profile.birthdate,
    profile_picture: profile.profilePicture,
    two_factor_enabled: profile.twoFactorEnabled,
  };
}
