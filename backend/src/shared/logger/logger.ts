/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Adds stable metadata (service, env) for log querying.
 *
 * RULES:
 * - Pass `{ err }` rather than a bare Error so stack/message survive.
 * - Credentials never reach a transport: top-level meta keys listed in
 *   REDACTED_KEYS are masked before formatting.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'webmail-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const REDACTED_KEYS: readonly string[] = [
  'password',
  'session_token',
  'sessionToken',
  'token',
  'verification_code',
  'authorization',
];

export const redactSecrets = winston.format((info) => {
  for (const key of REDACTED_KEYS) {
    if (key in info && info[key] !== undefined) info[key] = '[redacted]';
  }
  return info;
});

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
