/**
 * backend/src/modules/settings/settings.constants.ts
 */

/** Length of the window opened when auto-reply is switched on without dates. */
export const AUTO_REPLY_DEFAULT_WINDOW_DAYS = 30;

export const AUTO_REPLY_MESSAGE_MAX_LENGTH = 5000;

export const FONT_SIZE_MIN = 8;
export const FONT_SIZE_MAX = 72;
export const FONT_FAMILY_MAX_LENGTH = 64;
