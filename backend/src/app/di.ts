/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, cache, queue, file store) and shares them.
 * - Keeps modules testable: tests pass their own db through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { HmacSha256KeyedHasher } from '../shared/security/keyed-hasher';
import type { KeyedHasher } from '../shared/security/keyed-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import type { FileStore } from '../shared/storage/file-store';
import { LocalDiskFileStore } from '../shared/storage/local-disk-file-store';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createSessionModule } from '../modules/sessions/session.module';
import type { SessionModule } from '../modules/sessions/session.module';

import { createProfileModule } from '../modules/profiles/profile.module';
import type { ProfileModule } from '../modules/profiles/profile.module';

import { createSettingsModule } from '../modules/settings/settings.module';
import type { SettingsModule } from '../modules/settings/settings.module';

import { createLabelModule } from '../modules/labels/label.module';
import type { LabelModule } from '../modules/labels/label.module';

import { createEmailModule } from '../modules/emails/email.module';
import type { EmailModule } from '../modules/emails/email.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  twoFactorHasher: KeyedHasher;

  auditRepo: AuditRepo;

  // adapters
  queue: Queue;
  fileStore: FileStore;

  // modules
  users: UserModule;
  sessions: SessionModule;
  profiles: ProfileModule;
  settings: SettingsModule;
  labels: LabelModule;
  emails: EmailModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
  queue?: Queue;
  now?: () => Date;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const db = overrides.db ?? createDb(config.databaseUrl);

  // Without REDIS_URL the counters live in this process (single instance only).
  const redis = config.redisUrl ? await RedisCache.connect(config.redisUrl) : null;
  const cache: Cache = redis ?? new InMemCache();

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });
  const twoFactorHasher: KeyedHasher = new HmacSha256KeyedHasher(config.twoFactor.hmacKey);

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const auditRepo = new AuditRepo(db);

  // In-memory transport: swap for an SMS provider adapter here in production.
  const queue: Queue = overrides.queue ?? new InMemQueue();
  const fileStore: FileStore = new LocalDiskFileStore(config.uploads.dir);

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db });
  const sessions = createSessionModule({
    db,
    tokenHasher,
    ttlSeconds: config.sessionTtlSeconds,
    now: overrides.now,
  });
  const profiles = createProfileModule({
    db,
    logger,
    auditRepo,
    userRepo: users.userRepo,
    fileStore,
  });
  const settings = createSettingsModule({ db, logger, now: overrides.now });
  const labels = createLabelModule({ db });
  const emails = createEmailModule({ db, logger });

  const auth = createAuthModule({
    db,
    tokenHasher,
    passwordHasher,
    twoFactorHasher,
    logger,
    rateLimiter,
    auditRepo,
    queue,
    userRepo: users.userRepo,
    profileRepo: profiles.profileRepo,
    settingsRepo: settings.settingsRepo,
    labelRepo: labels.labelRepo,
    sessionService: sessions.sessionService,
    twoFactorCodeTtlSeconds: config.twoFactor.codeTtlSeconds,
    now: overrides.now,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    twoFactorHasher,
    auditRepo,
    queue,
    fileStore,
    users,
    sessions,
    profiles,
    settings,
    labels,
    emails,
    auth,
    close: async () => {
      if (redis) await redis.close();
      await db.destroy();
    },
  };
}
