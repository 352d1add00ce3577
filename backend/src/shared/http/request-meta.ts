/**
 * backend/src/shared/http/request-meta.ts
 *
 * WHY:
 * - Services take request metadata (for audit rows and logs) as plain data,
 *   never the Fastify request itself.
 */

import type { FastifyRequest } from 'fastify';

export type RequestMeta = Readonly<{
  requestId: string;
  ip: string | null;
  userAgent: string | null;
}>;

export function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.requestContext.ip,
    userAgent: req.requestContext.userAgent,
  };
}
