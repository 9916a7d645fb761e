/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, values come from .env via dotenv.
 * - In production, the platform injects env vars.
 *
 * RULES:
 * - DATABASE_URL / REDIS_URL are optional outside production: without them the
 *   app runs on in-memory stores (local dev, demos). Production requires both,
 *   plus SMTP_HOST.
 * - nodeEnv is a union, so invalid values ('prod', 'staging') fail at startup.
 */

import 'dotenv/config';
import { z } from 'zod';

import { RESET_CODE_TTL_MINUTES, SESSION_TTL_SECONDS_DEFAULT } from '../modules/auth/auth.constants';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    DATABASE_URL: optionalString,
    REDIS_URL: optionalString,

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('anki-study-auth'),
    APP_NAME: z.string().default('Anki AI'),

    BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

    // Session
    SESSION_TTL_SECONDS: z.coerce
      .number()
      .int()
      .min(300)
      .max(60 * 60 * 24 * 90)
      .default(SESSION_TTL_SECONDS_DEFAULT),

    // Store / cache call bound
    STORE_TIMEOUT_MS: z.coerce.number().int().min(50).max(30_000).default(2000),

    // Rate limiting (per identity, per operation, sliding window)
    RATE_LIMIT_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(100).default(5),
    RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().min(1).max(86_400).default(300),

    // Password reset codes
    RESET_CODE_TTL_MINUTES: z.coerce
      .number()
      .int()
      .min(RESET_CODE_TTL_MINUTES.min)
      .max(RESET_CODE_TTL_MINUTES.max)
      .default(RESET_CODE_TTL_MINUTES.default),
    RESET_CODE_HMAC_KEY: z.string().min(32),

    // Provider API keys at rest (base64-encoded 32 bytes)
    SETTINGS_ENCRYPTION_KEY_BASE64: z
      .string()
      .refine((v) => Buffer.from(v, 'base64').length === 32, 'must decode to 32 bytes'),

    // Mail (unset SMTP_HOST → dev-mode log mailer)
    SMTP_HOST: optionalString,
    SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
    SMTP_USER: optionalString,
    SMTP_PASSWORD: optionalString,
    SMTP_SECURE: booleanString,
    MAIL_FROM: z.string().default('no-reply@localhost'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'production') return;

    for (const key of ['DATABASE_URL', 'REDIS_URL', 'SMTP_HOST'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required in production`,
        });
      }
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string | null;
  redisUrl: string | null;

  logLevel: string;
  serviceName: string;
  appName: string;

  bcryptCost: number;
  sessionTtlSeconds: number;
  storeTimeoutMs: number;

  rateLimit: {
    maxAttempts: number;
    windowSeconds: number;
  };

  resetCode: {
    ttlMinutes: number;
    hmacKey: string;
  };

  settingsEncryptionKeyBase64: string;

  mail: {
    smtp: {
      host: string;
      port: number;
      secure: boolean;
      user?: string;
      password?: string;
    } | null;
    from: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL ?? null,
    redisUrl: parsed.REDIS_URL ?? null,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
    appName: parsed.APP_NAME,

    bcryptCost: parsed.BCRYPT_COST,
    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,

    rateLimit: {
      maxAttempts: parsed.RATE_LIMIT_MAX_ATTEMPTS,
      windowSeconds: parsed.RATE_LIMIT_WINDOW_SECONDS,
    },

    resetCode: {
      ttlMinutes: parsed.RESET_CODE_TTL_MINUTES,
      hmacKey: parsed.RESET_CODE_HMAC_KEY,
    },

    settingsEncryptionKeyBase64: parsed.SETTINGS_ENCRYPTION_KEY_BASE64,

    mail: {
      smtp: parsed.SMTP_HOST
        ? {
            host: parsed.SMTP_HOST,
            port: parsed.SMTP_PORT,
            secure: parsed.SMTP_SECURE,
            user: parsed.SMTP_USER,
            password: parsed.SMTP_PASSWORD,
          }
        : null,
      from: parsed.MAIL_FROM,
    },
  };
}
