import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { buildDeps, type DepsOverrides } from '../../src/app/di';
import { InMemAccountStore } from '../../src/modules/accounts';
import { InMemResetRequestStore } from '../../src/modules/auth/reset-codes/dal/inmem-reset-request.store';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { createSilentLogger } from './silent-logger';
import { TestClock } from './test-clock';

export const TEST_RESET_CODE_HMAC_KEY = 'test-reset-code-hmac-key-0123456789abcdef';
export const TEST_SETTINGS_KEY_BASE64 = Buffer.alloc(32, 7).toString('base64');

export function buildTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    port: 0,

    databaseUrl: null,
    redisUrl: null,

    logLevel: 'error',
    serviceName: 'anki-study-auth-test',
    appName: 'Anki AI',

    // Low cost keeps suites fast; config parsing would refuse it, tests bypass parsing.
    bcryptCost: 4,

    sessionTtlSeconds: 3600,
    storeTimeoutMs: 2000,

    rateLimit: { maxAttempts: 5, windowSeconds: 300 },
    resetCode: { ttlMinutes: 15, hmacKey: TEST_RESET_CODE_HMAC_KEY },

    settingsEncryptionKeyBase64: TEST_SETTINGS_KEY_BASE64,

    mail: { smtp: null, from: 'no-reply@example.com' },

    ...overrides,
  };
}

type TestHarness = {
  accountStore: InMemAccountStore;
  resetRequestStore: InMemResetRequestStore;
  cache: InMemCache;
  queue: InMemQueue;
  clock: TestClock;
};

function buildHarnessOverrides(overrides: DepsOverrides): {
  harness: TestHarness;
  deps: DepsOverrides;
} {
  const harness: TestHarness = {
    accountStore: new InMemAccountStore(),
    resetRequestStore: new InMemResetRequestStore(),
    cache: new InMemCache(),
    queue: new InMemQueue(),
    clock: new TestClock(),
  };

  return {
    harness,
    deps: {
      accountStore: harness.accountStore,
      resetRequestStore: harness.resetRequestStore,
      cache: harness.cache,
      queue: harness.queue,
      clock: harness.clock.now,
      logger: createSilentLogger(),
      ...overrides,
    },
  };
}

/**
 * WHY:
 * - Service-level tests without HTTP: the full dependency graph on in-memory
 *   stores, an inspectable queue and a controllable clock.
 */
export async function buildTestDeps(opts: { config?: Partial<AppConfig>; overrides?: DepsOverrides } = {}) {
  const { harness, deps: overrides } = buildHarnessOverrides(opts.overrides ?? {});
  const deps = await buildDeps(buildTestConfig(opts.config), overrides);

  return { ...harness, deps, close: deps.close };
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - No Postgres, Redis or SMTP: every store is in-memory and every email lands
 *   in `queue` (drain it to read reset codes).
 */
export async function buildTestApp(opts: { config?: Partial<AppConfig>; overrides?: DepsOverrides } = {}) {
  const { harness, deps: overrides } = buildHarnessOverrides(opts.overrides ?? {});
  const built = await buildApp(buildTestConfig(opts.config), overrides);

  return {
    ...harness,
    app: built.app,
    deps: built.deps,
    close: built.close,
  };
}
