/**
 * src/modules/settings/settings.schemas.ts
 */

import { z } from 'zod';

import { PreferenceValueSchema } from '../accounts';

const providerName = z.string().regex(/^[a-z0-9_-]{1,40}$/, 'Invalid provider name');

export const saveApiKeysSchema = z.object({
  apiKeys: z
    .record(providerName, z.string().max(1024))
    .refine((keys) => Object.keys(keys).length <= 20, 'Too many providers'),
});

export type SaveApiKeysInput = z.infer<typeof saveApiKeysSchema>;

export const savePreferencesSchema = z.object({
  preferences: z
    .record(z.string().min(1).max(64), PreferenceValueSchema)
    .refine((prefs) => Object.keys(prefs).length <= 50, 'Too many preferences'),
});

export type SavePreferencesInput = z.infer<typeof savePreferencesSchema>;
