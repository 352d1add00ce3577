/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 * - redisUrl is nullable: without it the composition root falls back to the
 *   in-process cache (single instance only).
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1).optional(),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('webmail-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Session tokens (fixed TTL from issuance)
  SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(2_592_000).default(86400),

  // Two-factor verification codes
  TWO_FACTOR_CODE_TTL_SECONDS: z.coerce.number().int().min(60).max(3600).default(300),
  TWO_FACTOR_HMAC_KEY: z.string().min(32),

  // Profile pictures
  UPLOADS_DIR: z.string().default('uploads'),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .min(1024)
    .default(5 * 1024 * 1024),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string | null;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  sessionTtlSeconds: number;

  twoFactor: {
    codeTtlSeconds: number;
    hmacKey: string;
  };

  uploads: {
    dir: string;
    maxBytes: number;
  };
};

export function buildConfig(): AppConfig {
  const parsed = ConfigSchema.parse(process.env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL ?? null,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    twoFactor: {
      codeTtlSeconds: parsed.TWO_FACTOR_CODE_TTL_SECONDS,
      hmacKey: parsed.TWO_FACTOR_HMAC_KEY,
    },

    uploads: {
      dir: parsed.UPLOADS_DIR,
      maxBytes: parsed.MAX_UPLOAD_BYTES,
    },
  };
}
