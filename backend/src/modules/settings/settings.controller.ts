/**
 * src/modules/settings/settings.controller.ts
 *
 * WHY:
 * - Maps HTTP → SettingsService for /settings/auto-reply, /settings/font and
 *   /settings/dark-mode.
 *
 * RULES:
 * - No DB access here. No business rules here.
 * - Every route requires a session.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { toFieldErrors } from '../../shared/http/validation';
import type { SettingsService } from './settings.service';
import { setDarkModeSchema, updateAutoReplySchema, updateFontSchema } from './settings.schemas';
import { SettingsErrors } from './settings.errors';
import { toAutoReplyView, toDarkModeView, toFontView } from './settings.presenter';

// An explicit null counts as a missing field.
function hasValue(body: unknown, key: string): boolean {
  if (typeof body !== 'object' || body === null) return false;
  const value: unknown = Reflect.get(body, key);
  return value !== undefined && value !== null;
}

export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  // ── Auto-reply ──────────────────────────────────────────

  async getAutoReply(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const settings = await this.settingsService.getSettings(session.userId);
    return reply.status(200).send(toAutoReplyView(settings));
  }

  async updateAutoReply(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = updateAutoReplySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const settings = await this.settingsService.updateAutoReply(session.userId, {
      enabled: parsed.data.auto_reply_enabled,
      startDate: parsed.data.auto_reply_start_date,
      endDate: parsed.data.auto_reply_end_date,
      message: parsed.data.auto_reply_message,
    });

    return reply.status(200).send(toAutoReplyView(settings));
  }

  async toggleAutoReply(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const settings = await this.settingsService.toggleAutoReply(session.userId);
    return reply.status(200).send(toAutoReplyView(settings));
  }

  // ── Font ────────────────────────────────────────────────

  async getFont(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const settings = await this.settingsService.getSettings(session.userId);
    return reply.status(200).send(toFontView(settings));
  }

  async updateFont(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = updateFontSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const settings = await this.settingsService.updateFont(session.userId, {
      fontFamily: parsed.data.font_family,
      fontSize: parsed.data.font_size,
    });

    return reply.status(200).send(toFontView(settings));
  }

  // ── Dark mode ───────────────────────────────────────────

  async getDarkMode(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const settings = await this.settingsService.getSettings(session.userId);
    return reply.status(200).send(toDarkModeView(settings));
  }

  async setDarkMode(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    if (!hasValue(req.body, 'dark_mode')) throw SettingsErrors.darkModeRequired();

    const parsed = setDarkModeSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const settings = await this.settingsService.setDarkMode(session.userId, parsed.data.dark_mode);
    return reply.status(200).send(toDarkModeView(settings));
  }
}
