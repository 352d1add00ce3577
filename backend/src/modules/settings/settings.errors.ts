/**
 * src/modules/settings/settings.errors.ts
 */

import { AppError } from '../../shared/http/errors';

const START_BEFORE_END = 'Start date must be before end date';
const DARK_MODE_REQUIRED = 'dark_mode field is required';

export const SettingsErrors = {
  startNotBeforeEnd() {
    return AppError.validationError(START_BEFORE_END, {
      auto_reply_start_date: [START_BEFORE_END],
    });
  },

  darkModeRequired() {
    return AppError.validationError(DARK_MODE_REQUIRED, { dark_mode: [DARK_MODE_REQUIRED] });
  },
} as const;
