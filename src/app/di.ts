/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, mail transport) and shares them.
 * - Tests pass overrides (in-memory stores, InMemQueue, a fixed clock) instead
 *   of reaching for globals.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (in-memory fallbacks, dev-mode mail) belong
 *   HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';

import { createDb, type Db } from '../shared/db/db';
import { createStoreOpRunner, type StoreOpRunner } from '../shared/db/store-timeout';

import type { Cache } from '../shared/cache/cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import { RedisCache } from '../shared/cache/redis-cache';

import { logger as rootLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { LogMailer } from '../shared/mail/log-mailer';
import type { Mailer } from '../shared/mail/mailer';
import { SmtpMailer } from '../shared/mail/smtp-mailer';
import { MailerQueue } from '../shared/messaging/mailer-queue';
import type { Queue } from '../shared/messaging/queue';

import { CredentialHasher } from '../shared/security/credential-hasher';
import { EncryptionService } from '../shared/security/encryption';
import { HmacSha256KeyedHasher } from '../shared/security/keyed-hasher';
import { RateLimiter } from '../shared/security/rate-limit';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import type { TokenHasher } from '../shared/security/token-hasher';

import { SessionStore } from '../shared/session/session.store';

import { createAccountModule, type AccountModule, type AccountStore } from '../modules/accounts';
import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';
import type { ResetRequestStore } from '../modules/auth/reset-codes/reset-request.types';
import { createSettingsModule, type SettingsModule } from '../modules/settings/settings.module';

export type DepsOverrides = {
  accountStore?: AccountStore;
  resetRequestStore?: ResetRequestStore;
  cache?: Cache;
  queue?: Queue;
  mailer?: Mailer;
  clock?: () => Date;
  logger?: Logger;
};

export type AppDeps = {
  db: Db | null;
  cache: Cache;
  logger: Logger;
  clock: () => Date;
  store: StoreOpRunner;

  credentials: CredentialHasher;
  rateLimiter: RateLimiter;
  emailHasher: TokenHasher;
  encryption: EncryptionService;
  sessionStore: SessionStore;

  // messaging
  queue: Queue;

  // modules
  accounts: AccountModule;
  auth: AuthModule;
  settings: SettingsModule;

  // lifecycle
  close: () => Promise<void>;
};

function buildMailer(config: AppConfig, logger: Logger): Mailer {
  if (!config.mail.smtp) {
    logger.warn('mail.dev_mode', { flow: 'di', reason: 'SMTP_HOST not set; emails are logged' });
    return new LogMailer(logger);
  }

  return new SmtpMailer({
    host: config.mail.smtp.host,
    port: config.mail.smtp.port,
    secure: config.mail.smtp.secure,
    user: config.mail.smtp.user,
    password: config.mail.smtp.password,
    from: config.mail.from,
  });
}

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const logger = overrides.logger ?? rootLogger;
  const clock = overrides.clock ?? (() => new Date());

  const db = config.databaseUrl ? createDb(config.databaseUrl) : null;
  if (!db && !overrides.accountStore) {
    logger.warn('db.in_memory', { flow: 'di', reason: 'DATABASE_URL not set; accounts are not persisted' });
  }

  let redis: RedisCache | null = null;
  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else if (config.redisUrl) {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  } else {
    logger.warn('cache.in_memory', { flow: 'di', reason: 'REDIS_URL not set; sessions and rate limits are per-process' });
    cache = new InMemCache();
  }

  const store = createStoreOpRunner(config.storeTimeoutMs);

  const emailHasher: TokenHasher = new Sha256TokenHasher();
  const credentials = new CredentialHasher({ bcryptCost: config.bcryptCost });
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    limit: config.rateLimit.maxAttempts,
    windowSeconds: config.rateLimit.windowSeconds,
  });
  const encryption = new EncryptionService(config.settingsEncryptionKeyBase64);
  const resetCodeHasher = new HmacSha256KeyedHasher(config.resetCode.hmacKey);
  const sessionStore = new SessionStore(cache, emailHasher, config.sessionTtlSeconds);

  let mailerQueue: MailerQueue | null = null;
  let queue: Queue;
  if (overrides.queue) {
    queue = overrides.queue;
  } else {
    mailerQueue = new MailerQueue({
      mailer: overrides.mailer ?? buildMailer(config, logger),
      logger,
      appName: config.appName,
    });
    queue = mailerQueue;
  }

  // modules (no HTTP / no business logic here)
  const accounts = createAccountModule({ db, accountStore: overrides.accountStore });

  const auth = createAuthModule({
    db,
    accountStore: accounts.accountStore,
    resetRequestStore: overrides.resetRequestStore,
    credentials,
    rateLimiter,
    resetCodeHasher,
    resetCodeTtlMinutes: config.resetCode.ttlMinutes,
    sessionStore,
    sessionTtlSeconds: config.sessionTtlSeconds,
    queue,
    emailHasher,
    logger,
    store,
    clock,
    isProduction: config.nodeEnv === 'production',
  });

  const settings = createSettingsModule({
    accountStore: accounts.accountStore,
    encryption,
    emailHasher,
    logger,
    store,
    clock,
  });

  return {
    db,
    cache,
    logger,
    clock,
    store,
    credentials,
    rateLimiter,
    emailHasher,
    encryption,
    sessionStore,
    queue,
    accounts,
    auth,
    settings,
    close: async () => {
      await mailerQueue?.close();
      await redis?.close();
      await db?.destroy();
    },
  };
}
