/**
 * backend/src/modules/settings/settings.presenter.ts
 */

import type { AutoReplyView, DarkModeView, FontView, UserSettings } from './settings.types';

export function toAutoReplyView(s: UserSettings): AutoReplyView {
  return {
    auto_reply_enabled: s.autoReplyEnabled,
    auto_reply_start_date: s.autoReplyStartDate?.toISOString() ?? null,
    auto_reply_end_date: s.autoReplyEndDate?.toISOString() ?? null,
    auto_reply_message: s.autoReplyMessage,
  };
}

export function toFontView(s: UserSettings): FontView {
  return { font_family: s.fontFamily, font_size: s.fontSize };
}

export function toDarkModeView(s: UserSettings): DarkModeView {
  return { dark_mode: s.darkMode };
}
