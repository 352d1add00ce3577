/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for register, login, logout, validate-token and
 *   two-factor setup.
 *
 * RULES:
 * - No DB access here. No business rules here.
 * - register/login/logout/validate-token are public; /2fa/setup needs a session.
 * - The session token travels in the JSON body (`session_token`) or as the
 *   raw Authorization header; the body wins.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';
import { toFieldErrors } from '../../shared/http/validation';
import { readSessionToken } from '../../shared/session/session.types';
import { toUserView } from '../users';
import type { AuthService } from './auth.service';
import {
  loginSchema,
  registerSchema,
  sessionTokenSchema,
  verifyTwoFactorSchema,
} from './auth.schemas';
import { toAuthResultView } from './helpers/build-auth-result';
import {
  LOGOUT_MESSAGE,
  TOKEN_VALID_MESSAGE,
  TWO_FACTOR_CODE_SENT_MESSAGE,
  TWO_FACTOR_ENABLED_MESSAGE,
} from './auth.constants';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const result = await this.authService.register({
      phoneNumber: parsed.data.phone_number,
      password: parsed.data.password,
      firstName: parsed.data.first_name,
      lastName: parsed.data.last_name,
      email: parsed.data.email,
      meta: requestMeta(req),
    });

    return reply.status(201).send(toAuthResultView(result));
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const result = await this.authService.login({
      identifier: parsed.data.identifier,
      password: parsed.data.password,
      meta: requestMeta(req),
    });

    return reply.status(200).send(toAuthResultView(result));
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    // Logout never fails: an unreadable body just means "no token in the body".
    const parsed = sessionTokenSchema.safeParse(req.body ?? {});
    const bodyToken = parsed.success ? parsed.data.session_token : undefined;

    await this.authService.logout({
      sessionToken: bodyToken || readSessionToken(req),
      meta: requestMeta(req),
    });

    return reply.status(200).send({ message: LOGOUT_MESSAGE });
  }

  async validateToken(req: FastifyRequest, reply: FastifyReply) {
    const parsed = sessionTokenSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const user = await this.authService.validateToken(
      parsed.data.session_token || readSessionToken(req),
    );

    return reply.status(200).send({ user: toUserView(user), message: TOKEN_VALID_MESSAGE });
  }

  async issueTwoFactorCode(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const { expiresAt } = await this.authService.issueTwoFactorCode({
      userId: session.userId,
      meta: requestMeta(req),
    });

    return reply.status(200).send({
      message: TWO_FACTOR_CODE_SENT_MESSAGE,
      expires_at: expiresAt.toISOString(),
    });
  }

  async verifyTwoFactorCode(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = verifyTwoFactorSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    await this.authService.verifyTwoFactorCode({
      userId: session.userId,
      code: parsed.data.verification_code,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ message: TWO_FACTOR_ENABLED_MESSAGE });
  }
}
