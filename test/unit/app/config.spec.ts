import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

const REQUIRED = {
  RESET_CODE_HMAC_KEY: 'test-reset-code-hmac-key-0123456789abcdef',
  SETTINGS_ENCRYPTION_KEY_BASE64: Buffer.alloc(32, 1).toString('base64'),
};

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({ ...REQUIRED });

    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.databaseUrl).toBeNull();
    expect(config.redisUrl).toBeNull();
    expect(config.bcryptCost).toBe(12);
    expect(config.sessionTtlSeconds).toBe(2_592_000);
    expect(config.storeTimeoutMs).toBe(2000);
    expect(config.rateLimit).toEqual({ maxAttempts: 5, windowSeconds: 300 });
    expect(config.resetCode.ttlMinutes).toBe(15);
    expect(config.mail).toEqual({ smtp: null, from: 'no-reply@localhost' });
  });

  it('treats blank optional values as unset', () => {
    const config = buildConfig({ ...REQUIRED, DATABASE_URL: '   ', REDIS_URL: '' });

    expect(config.databaseUrl).toBeNull();
    expect(config.redisUrl).toBeNull();
  });

  it('builds SMTP settings when SMTP_HOST is set', () => {
    const config = buildConfig({ ...REQUIRED, SMTP_HOST: 'smtp.example.com', SMTP_SECURE: 'true' });

    expect(config.mail.smtp).toEqual({
      host: 'smtp.example.com',
      port: 587,
      secure: true,
      user: undefined,
      password: undefined,
    });
  });

  it('keeps the reset code lifetime between 15 and 30 minutes', () => {
    expect(buildConfig({ ...REQUIRED, RESET_CODE_TTL_MINUTES: '30' }).resetCode.ttlMinutes).toBe(30);
    expect(() => buildConfig({ ...REQUIRED, RESET_CODE_TTL_MINUTES: '45' })).toThrow();
  });

  it('rejects a short reset code key and a malformed encryption key', () => {
    expect(() => buildConfig({ ...REQUIRED, RESET_CODE_HMAC_KEY: 'short' })).toThrow();
    expect(() =>
      buildConfig({ ...REQUIRED, SETTINGS_ENCRYPTION_KEY_BASE64: Buffer.alloc(16).toString('base64') }),
    ).toThrow(/must decode to 32 bytes/);
  });

  it('requires the database, Redis and SMTP in production', () => {
    expect(() => buildConfig({ ...REQUIRED, NODE_ENV: 'production' })).toThrow(
      /DATABASE_URL is required in production/,
    );
    expect(() =>
      buildConfig({
        ...REQUIRED,
        NODE_ENV: 'production',
        DATABASE_URL: 'postgres://localhost/app',
        REDIS_URL: 'redis://localhost:6379',
        SMTP_HOST: 'smtp.example.com',
      }),
    ).not.toThrow();
  });
});
