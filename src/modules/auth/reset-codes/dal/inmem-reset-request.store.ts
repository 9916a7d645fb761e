/**
 * src/modules/auth/reset-codes/dal/inmem-reset-request.store.ts
 *
 * ResetRequestStore for tests and local dev. Each method completes synchronously,
 * so replace() and markConsumed() are atomic.
 */

import type { ResetRequest, ResetRequestStore } from '../reset-request.types';

export class InMemResetRequestStore implements ResetRequestStore {
  private readonly requests = new Map<string, ResetRequest>();

  replace(request: ResetRequest): Promise<void> {
    this.requests.set(request.email, structuredClone(request));
    return Promise.resolve();
  }

  get(email: string): Promise<ResetRequest | undefined> {
    const found = this.requests.get(email);
    return Promise.resolve(found ? structuredClone(found) : undefined);
  }

  markConsumed(params: { email: string; requestId: string; at: Date }): Promise<boolean> {
    const current = this.requests.get(params.email);
    if (!current || current.requestId !== params.requestId || current.consumedAt !== null) {
      return Promise.resolve(false);
    }

    this.requests.set(params.email, { ...current, consumedAt: new Date(params.at.getTime()) });
    return Promise.resolve(true);
  }
}
