import { describe, it, expect } from 'vitest';
import { HmacSha256KeyedHasher } from '../../../../src/shared/security/keyed-hasher';

describe('HmacSha256KeyedHasher', () => {
  const key = 'test-reset-code-hmac-key-0123456789abcdef';

  it('is deterministic per key and differs across keys', () => {
    const a = new HmacSha256KeyedHasher(key);
    const b = new HmacSha256KeyedHasher(`${key}-other`);

    expect(a.hash('ABCD2345EF')).toBe(a.hash('ABCD2345EF'));
    expect(a.hash('ABCD2345EF')).toMatch(/^[0-9a-f]{64}$/);
    expect(a.hash('ABCD2345EF')).not.toBe(b.hash('ABCD2345EF'));
  });

  it('rejects a short key', () => {
    expect(() => new HmacSha256KeyedHasher('short')).toThrow(
      'HmacSha256KeyedHasher: key must be at least 32 characters. Got 5.',
    );
  });
});
