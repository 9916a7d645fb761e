/**
 * src/shared/security/keyed-hasher.ts
 *
 * WHY:
 * - Password reset codes are short (10 chars, ~50 bits). A plain digest of a
 *   leaked row could be brute-forced offline.
 * - HMAC-SHA256(code, RESET_CODE_HMAC_KEY) adds a server-side pepper: the
 *   password_reset_requests table alone is not enough to recover a code.
 *
 * KEY:
 * - RESET_CODE_HMAC_KEY from environment (min 32 chars, validated at startup).
 *   Generate with: openssl rand -base64 32
 *
 * RULES:
 * - Deterministic: same (input, key) → same output.
 * - No DB access. No business logic.
 */

import { createHmac } from 'node:crypto';

export interface KeyedHasher {
  hash(value: string): string;
}

export class HmacSha256KeyedHasher implements KeyedHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(`HmacSha256KeyedHasher: key must be at least 32 characters. Got ${key.length}.`);
    }
    this.key = key;
  }

  /** Lowercase hex. */
  hash(value: string): string {
    return createHmac('sha256', this.key).update(value, 'utf8').digest('hex');
  }
}
