import { describe, it, expect, vi } from 'vitest';
import { makeAccount } from '../helpers/accounts';
import { buildTestApp } from '../helpers/build-test-app';
import { EmailBodySchema, ErrorBodySchema, MessageBodySchema, sessionCookie } from '../helpers/http';

/**
 * E2E tests for POST /auth/login and POST /auth/logout.
 *
 * Accounts are seeded straight into the in-memory store (skipping the register
 * flow) so the login behavior is isolated.
 */

const EMAIL = 'alice@example.com';
const PASSWORD = 'Passw0rd!';

describe('POST /auth/login', () => {
  it('logs in and migrates a legacy password hash', async () => {
    const { app, accountStore, close } = await buildTestApp();

    try {
      await accountStore.create(makeAccount());

      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: EMAIL, password: PASSWORD },
      });

      expect(res.statusCode).toBe(200);
      expect(EmailBodySchema.parse(res.json())).toEqual({ email: EMAIL });
      expect(sessionCookie(res.headers)).toMatch(/^sid=[A-Za-z0-9_-]{43}$/);

      const stored = await accountStore.get(EMAIL);
      expect(stored?.hashScheme).toBe('bcrypt');
      expect(stored?.passwordHash.startsWith('$2')).toBe(true);
    } finally {
      await close();
    }
  });

  it('returns the same 401 for a wrong password and an unknown email', async () => {
    const { app, accountStore, close } = await buildTestApp();

    try {
      await accountStore.create(makeAccount());

      const wrong = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: EMAIL, password: 'Wrong1234' },
      });
      const unknown = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'nobody@example.com', password: PASSWORD },
      });

      expect(wrong.statusCode).toBe(401);
      expect(unknown.statusCode).toBe(401);
      expect(ErrorBodySchema.parse(wrong.json())).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Invalid email or password.' },
      });
      expect(unknown.json()).toEqual(wrong.json());
      expect(wrong.headers['set-cookie']).toBeUndefined();
    } finally {
      await close();
    }
  });

  it('returns 429 with Retry-After on the 6th attempt inside the window', async () => {
    const { app, accountStore, clock, close } = await buildTestApp();

    try {
      await accountStore.create(makeAccount());

      for (let i = 0; i < 5; i++) {
        const res = await app.inject({
          method: 'POST',
          url: '/auth/login',
          payload: { email: EMAIL, password: 'Wrong1234' },
        });
        expect(res.statusCode).toBe(401);
      }

      clock.advanceSeconds(60);
      const blocked = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: EMAIL, password: PASSWORD },
      });

      expect(blocked.statusCode).toBe(429);
      expect(blocked.headers['retry-after']).toBe('240');
      expect(ErrorBodySchema.parse(blocked.json())).toEqual({
        error: {
          code: 'RATE_LIMITED',
          message: 'Too many attempts. Please try again later.',
          retryAfterSeconds: 240,
        },
      });

      clock.advanceSeconds(240);
      const admitted = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: EMAIL, password: PASSWORD },
      });
      expect(admitted.statusCode).toBe(200);
    } finally {
      await close();
    }
  });
});

describe('POST /auth/logout', () => {
  it('revokes the session and clears the cookie', async () => {
    const { app, accountStore, close } = await buildTestApp();

    try {
      await accountStore.create(makeAccount());

      const login = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: EMAIL, password: PASSWORD },
      });
      const cookie = sessionCookie(login.headers);

      const logout = await app.inject({ method: 'POST', url: '/auth/logout', headers: { cookie } });
      expect(logout.statusCode).toBe(200);
      expect(MessageBodySchema.parse(logout.json())).toEqual({ message: 'Signed out.' });
      expect(logout.headers['set-cookie']).toBe('sid=; Path=/; HttpOnly; SameSite=Strict; Max-Age=0');

      const me = await app.inject({ method: 'GET', url: '/auth/me', headers: { cookie } });
      expect(me.statusCode).toBe(401);
      expect(ErrorBodySchema.parse(me.json())).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
    } finally {
      await close();
    }
  });

  it('answers 503 when the session cache is down', async () => {
    const { app, accountStore, cache, close } = await buildTestApp();

    try {
      await accountStore.create(makeAccount());

      const login = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: EMAIL, password: PASSWORD },
      });
      const cookie = sessionCookie(login.headers);

      vi.spyOn(cache, 'del').mockRejectedValue(new Error('connection refused'));

      const logout = await app.inject({ method: 'POST', url: '/auth/logout', headers: { cookie } });
      expect(logout.statusCode).toBe(503);
      expect(ErrorBodySchema.parse(logout.json())).toEqual({
        error: {
          code: 'SERVICE_UNAVAILABLE',
          message: 'Service temporarily unavailable. Please try again.',
        },
      });
    } finally {
      await close();
    }
  });
});
