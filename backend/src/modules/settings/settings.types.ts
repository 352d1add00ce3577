/**
 * backend/src/modules/settings/settings.types.ts
 *
 * One settings row per user (unique user_id), created lazily on first access
 * or eagerly at registration; both paths use the same idempotent insert.
 */

export type UserSettings = {
  id: string;
  userId: string;
  autoReplyEnabled: boolean;
  autoReplyStartDate: Date | null;
  autoReplyEndDate: Date | null;
  autoReplyMessage: string;
  fontFamily: string;
  fontSize: number;
  darkMode: boolean;
  updatedAt: Date;
};

export type AutoReplyPatch = {
  enabled?: boolean;
  startDate?: Date | null;
  endDate?: Date | null;
  message?: string;
};

export type FontPatch = {
  fontFamily?: string;
  fontSize?: number;
};

export type AutoReplyView = {
  auto_reply_enabled: boolean;
  auto_reply_start_date: string | null;
  auto_reply_end_date: string | null;
  auto_reply_message: string;
};

export type FontView = {
  font_family: string;
  font_size: number;
};

export type DarkModeView = {
  dark_mode: boolean;
};
