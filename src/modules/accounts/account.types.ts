/**
 * src/modules/accounts/account.types.ts
 *
 * WHY:
 * - One Account record per user, keyed by normalized email.
 * - `version` increments on every write; stores reject writes made against a
 *   stale version (optimistic concurrency).
 */

import { z } from 'zod';

import type { HashScheme } from '../../shared/security/credential-hasher';

export const PreferenceValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type PreferenceValue = z.infer<typeof PreferenceValueSchema>;

export const AccountSettingsSchema = z.object({
  /** provider → stored value (`enc:` sealed, or legacy plaintext) */
  apiKeys: z.record(z.string()).default({}),
  preferences: z.record(PreferenceValueSchema).default({}),
});

export type AccountSettings = z.infer<typeof AccountSettingsSchema>;

export type Account = {
  email: string;
  passwordHash: string;
  hashScheme: HashScheme;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
  settings: AccountSettings;
  version: number;
};

export function emptySettings(): AccountSettings {
  return { apiKeys: {}, preferences: {} };
}
