/**
 * src/shared/security/safe-compare.ts
 *
 * Constant-time equality for hex digests. Length differences return false
 * without comparing (digest lengths are public).
 */

import { timingSafeEqual } from 'node:crypto';

export function safeEqualHex(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');

  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
