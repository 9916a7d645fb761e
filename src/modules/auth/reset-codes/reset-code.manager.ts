/**
 * src/modules/auth/reset-codes/reset-code.manager.ts
 *
 * WHY:
 * - Issues and verifies password reset codes.
 *
 * HOW TO USE:
 * - const code = await resetCodes.issue(email, now)        // email it, never store it
 * - const outcome = await resetCodes.verify(email, candidate, now)
 *
 * RULES:
 * - Only HMAC(code) is stored; comparison is constant-time.
 * - issue() overwrites the previous request (one active request per account).
 * - verify():
 *   - no request, or already consumed          → NOT_FOUND
 *   - past expiresAt                            → EXPIRED (request retired)
 *   - hash mismatch                             → INVALID (request stays usable)
 *   - match                                     → consume (compare-and-set) → VALID
 *   - match but another caller consumed first   → NOT_FOUND
 * - The flow maps every non-VALID outcome to one generic error.
 */

import { randomUUID } from 'node:crypto';

import type { KeyedHasher } from '../../../shared/security/keyed-hasher';
import { safeEqualHex } from '../../../shared/security/safe-compare';
import { generateResetCode, normalizeResetCode } from '../../../shared/security/token';
import type { ResetCodeVerification, ResetRequestStore } from './reset-request.types';

export class ResetCodeManager {
  private readonly ttlMs: number;

  constructor(
    private readonly deps: {
      store: ResetRequestStore;
      codeHasher: KeyedHasher;
      ttlMinutes: number;
      generateCode?: () => string;
    },
  ) {
    this.ttlMs = deps.ttlMinutes * 60 * 1000;
  }

  get ttlMinutes(): number {
    return this.deps.ttlMinutes;
  }

  async issue(email: string, now: Date): Promise<string> {
    const code = (this.deps.generateCode ?? generateResetCode)();

    await this.deps.store.replace({
      email,
      requestId: randomUUID(),
      codeHash: this.deps.codeHasher.hash(normalizeResetCode(code)),
      issuedAt: now,
      expiresAt: new Date(now.getTime() + this.ttlMs),
      consumedAt: null,
    });

    return code;
  }

  async verify(email: string, candidate: string, now: Date): Promise<ResetCodeVerification> {
    const request = await this.deps.store.get(email);
    if (!request || request.consumedAt !== null) return 'NOT_FOUND';

    if (now.getTime() > request.expiresAt.getTime()) {
      await this.deps.store.markConsumed({ email, requestId: request.requestId, at: now });
      return 'EXPIRED';
    }

    const candidateHash = this.deps.codeHasher.hash(normalizeResetCode(candidate));
    if (!safeEqualHex(candidateHash, request.codeHash)) return 'INVALID';

    const consumed = await this.deps.store.markConsumed({
      email,
      requestId: request.requestId,
      at: now,
    });

    return consumed ? 'VALID' : 'NOT_FOUND';
  }
}
