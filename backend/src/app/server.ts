/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; routes are registered afterwards via app/routes.ts.
 *
 * ORDER MATTERS:
 * - requestContext → authContext → session middleware: each hook reads what
 *   the previous one attached.
 */

import Fastify from 'fastify';
import multipart from '@fastify/multipart';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerErrorHandler(app);

  // Profile pictures: one file per request, capped by MAX_UPLOAD_BYTES.
  await app.register(multipart, {
    limits: { fileSize: opts.config.uploads.maxBytes, files: 1 },
  });

  // Global context plugins
  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.sessions.sessionService);

  // Basic request logging (ids only; never headers or bodies)
  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('request', {
      method: req.method,
      path: req.url.split('?')[0],
      statusCode: reply.statusCode,
    });
    done();
  });

  return app;
}
