/**
 * backend/src/modules/settings/index.ts
 *
 * Public surface of the settings module.
 */

export { SettingsRepo } from './dal/settings.repo';
export { getSettingsByUserId } from './queries/settings.queries';
export type { UserSettings } from './settings.types';
