/**
 * src/modules/accounts/index.ts
 *
 * Public surface of the accounts module. Other modules import from here,
 * never from /dal.
 */

export type { AccountStore, NewAccount } from './account.store';
export type { Account, AccountSettings, PreferenceValue } from './account.types';
export { AccountSettingsSchema, PreferenceValueSchema, emptySettings } from './account.types';
export { createAccountModule } from './account.module';
export type { AccountModule } from './account.module';
export { emailDomain, normalizeEmail } from './email';
export { modifyAccount, MODIFY_ACCOUNT_MAX_ATTEMPTS } from './modify-account';
export { InMemAccountStore } from './dal/inmem-account.store';
