/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - logout and validate-token accept the token from the Authorization header,
 *   so their JSON body is optional: an empty or unparseable body reads as {}.
 *   They live in their own encapsulated scope so the default parser stays
 *   strict everywhere else.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function parseOptionalJsonBody(body: string | Buffer): unknown {
  const text = typeof body === 'string' ? body : body.toString('utf8');
  if (!text.trim()) return {};

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // No body token; the header still counts.
    return {};
  }
}

export async function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/register', controller.register.bind(controller));
  app.post('/login', controller.login.bind(controller));

  await app.register(async (tokenScope) => {
    tokenScope.removeContentTypeParser('application/json');
    tokenScope.addContentTypeParser(
      'application/json',
      { parseAs: 'string' },
      (_req, body, done) => {
        done(null, parseOptionalJsonBody(body));
      },
    );

    tokenScope.post('/logout', controller.logout.bind(controller));
    tokenScope.post('/validate-token', controller.validateToken.bind(controller));
  });

  app.post('/2fa/setup', controller.issueTwoFactorCode.bind(controller));
  app.put('/2fa/setup', controller.verifyTwoFactorCode.bind(controller));
}
