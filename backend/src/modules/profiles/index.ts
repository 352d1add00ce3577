/**
 * backend/src/modules/profiles/index.ts
 *
 * Public surface of the profiles module.
 */

export { ProfileRepo } from './dal/profile.repo';
export { getProfileByUserId } from './queries/profile.queries';
export type { Profile } from './profile.types';
