import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import type { AuthContext } from '../../../../src/shared/http/auth-context';
import { AppError } from '../../../../src/shared/http/errors';
import { requireSession } from '../../../../src/shared/http/require-auth-context';

function makeReq(authContext: AuthContext): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

describe('requireSession', () => {
  it('throws 401 when no session is present', () => {
    const req = makeReq({ sessionId: null, email: null, emailKey: null });

    expect(() => requireSession(req)).toThrowError(AppError);
    expect(() => requireSession(req)).toThrowError('Authentication required');
  });

  it('returns the session fields when authenticated', () => {
    const req = makeReq({ sessionId: 'sess_1', email: 'alice@example.com', emailKey: 'abc123' });

    expect(requireSession(req)).toEqual({
      sessionId: 'sess_1',
      email: 'alice@example.com',
      emailKey: 'abc123',
    });
  });
});
