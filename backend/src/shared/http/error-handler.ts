/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every endpoint answers failures with the same envelope:
 *   { error: { code, message, fields? } }
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status, .code and .fields to the envelope.
 * - RateLimitError → 429 response.
 * - Zod validation errors → 400 (safety net if a controller misses).
 * - Fastify's own 4xx errors (bad JSON, body too large, unsupported media type) → 400 family.
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always log through withRequestContext(req) so requestId/userId ride along.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError, type FieldErrors } from './errors';
import { toFieldErrors } from './validation';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    fields?: FieldErrors;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'sessionToken',
  'tokenHash',
  'password',
  'passwordHash',
  'code',
  'verificationCode',
  'codeHash',
  'secret',
]);

function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string, fields?: FieldErrors): ErrorResponseBody {
  return fields ? { error: { code, message, fields } } : { error: { code, message } };
}

function clientStatusOf(err: Error): number | null {
  if (!('statusCode' in err)) return null;
  const status = err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message, err.fields));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Zod errors that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues.length });
      return reply
        .status(400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request', toFieldErrors(err)));
    }

    // 4) Fastify/plugin client errors (malformed JSON, payload too large, ...)
    const clientStatus = clientStatusOf(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, message: err.message });
      return reply.status(clientStatus).send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 5) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    return reply
      .status(404)
      .send(buildResponse('NOT_FOUND', `Route ${req.method} ${req.url} not found`));
  });
}
