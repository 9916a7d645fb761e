/**
 * src/modules/auth/reset-codes/reset-request.types.ts
 *
 * WHY:
 * - A ResetRequest is the stored side of a password reset code.
 * - One row per account: issuing a new code overwrites the previous request,
 *   which is how "a second code invalidates the first" is enforced.
 *
 * RULES:
 * - codeHash is HMAC-SHA256 of the normalized code. The plaintext is never stored.
 */

export type ResetRequest = {
  email: string;
  /** Changes on every issue(); consume is a compare-and-set on it. */
  requestId: string;
  codeHash: string;
  issuedAt: Date;
  expiresAt: Date;
  consumedAt: Date | null;
};

export type ResetCodeVerification = 'VALID' | 'EXPIRED' | 'INVALID' | 'NOT_FOUND';

export interface ResetRequestStore {
  /** Upsert: replaces any existing request for the same email. */
  replace(request: ResetRequest): Promise<void>;
  get(email: string): Promise<ResetRequest | undefined>;
  /**
   * Sets consumedAt only if the stored request still has this requestId and is
   * unconsumed. True when this call did the consuming.
   */
  markConsumed(params: { email: string; requestId: string; at: Date }): Promise<boolean>;
}
