import type { Environment } from '../../config/env.js';

export interface EmailAccountSettings {
  enableEmailAccounts: boolean;
  defaultQuotaMb: number;
  enablePerAccountPurchase: boolean;
  accountPrice: number;
}

export interface EmailSettingsProvider {
  getSettings(): EmailAccountSettings;
}

export class StaticEmailSettingsProvider implements EmailSettingsProvider {
  constructor(private readonly settings: EmailAccountSettings) {}

  getSettings(): EmailAccountSettings {
    return this.settings;
  }
}

export const settingsFromEnvironment = (
  environment: Pick<
    Environment,
    'ENABLE_EMAIL_ACCOUNTS' | 'EMAIL_DEFAULT_QUOTA_MB' | 'ENABLE_EMAIL_PER_ACCOUNT_PURCHASE' | 'EMAIL_ACCOUNT_PRICE'
  >,
): EmailAccountSettings => ({
  enableEmailAccounts: environment.ENABLE_EMAIL_ACCOUNTS,
  defaultQuotaMb: environment.EMAIL_DEFAULT_QUOTA_MB,
  enablePerAccountPurchase: environment.ENABLE_EMAIL_PER_ACCOUNT_PURCHASE,
  accountPrice: environment.EMAIL_ACCOUNT_PRICE,
});
