/**
 * src/modules/auth/reset-codes/dal/kysely-reset-request.store.ts
 *
 * WHY:
 * - ResetRequestStore on Postgres (password_reset_requests, PK email).
 *
 * RULES:
 * - replace(): INSERT ... ON CONFLICT (email) DO UPDATE, one statement.
 * - markConsumed(): UPDATE ... WHERE request_id = ? AND consumed_at IS NULL.
 *   Two concurrent verifications of one code cannot both succeed.
 * - No AppError here.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { ResetRequest, ResetRequestStore } from '../reset-request.types';

export class KyselyResetRequestStore implements ResetRequestStore {
  constructor(private readonly db: DbExecutor) {}

  async replace(request: ResetRequest): Promise<void> {
    await this.db
      .insertInto('password_reset_requests')
      .values({
        email: request.email,
        request_id: request.requestId,
        code_hash: request.codeHash,
        issued_at: request.issuedAt,
        expires_at: request.expiresAt,
        consumed_at: request.consumedAt,
      })
      .onConflict((oc) =>
        oc.column('email').doUpdateSet({
          request_id: request.requestId,
          code_hash: request.codeHash,
          issued_at: request.issuedAt,
          expires_at: request.expiresAt,
          consumed_at: request.consumedAt,
        }),
      )
      .execute();
  }

  async get(email: string): Promise<ResetRequest | undefined> {
    const row = await this.db
      .selectFrom('password_reset_requests')
      .selectAll()
      .where('email', '=', email)
      .executeTakeFirst();

    if (!row) return undefined;

    return {
      email: row.email,
      requestId: row.request_id,
      codeHash: row.code_hash,
      issuedAt: row.issued_at,
      expiresAt: row.expires_at,
      consumedAt: row.consumed_at,
    };
  }

  async markConsumed(params: { email: string; requestId: string; at: Date }): Promise<boolean> {
    const result = await this.db
      .updateTable('password_reset_requests')
      .set({ consumed_at: params.at })
      .where('email', '=', params.email)
      .where('request_id', '=', params.requestId)
      .where('consumed_at', 'is', null)
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }
}
