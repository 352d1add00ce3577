/**
 * backend/src/modules/profiles/profile.types.ts
 *
 * One profile per user, created at registration. It can be deleted on its
 * own (the account stays); profile-dependent features then answer 404.
 */

import type { UserView } from '../users';

export type Profile = {
  id: string;
  userId: string;
  bio: string | null;
  /** Calendar date, YYYY-MM-DD. */
  birthdate: string | null;
  /** FileStore reference. */
  profilePicture: string | null;
  twoFactorEnabled: boolean;

  createdAt: Date;
  updatedAt: Date;
};

export type ProfileView = {
  id: string;
  bio: string | null;
  birthdate: string | null;
  profile_picture: string | null;
  two_factor_enabled: boolean;
};

export type UserWithProfileView = {
  user: UserView;
  profile: ProfileView;
};

export type ProfilePatch = {
  firstName?: string;
  lastName?: string;
  email?: string;
  bio?: string | null;
  birthdate?: string | null;
};

export type ProfilePictureUpload = {
  data: Buffer;
  mimetype: string;
};
