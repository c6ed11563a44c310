import type { QuotaSummary, RemainingSlots } from '@mailhost/common';

import type { EmailSettingsProvider } from './email-accounts.settings.js';

export const EMAIL_ACCOUNTS_FEATURE = 'email_accounts';

/**
 * Membership limitation entry. `limit` of 0 or true is unlimited, false is none,
 * and a positive number is a hard cap.
 */
export interface Limitation {
  enabled: boolean;
  limit: number | boolean;
}

export interface QuotaOracle {
  /** Accounts in a counted status, scoped to the membership when one is given. */
  countAccounts(customerId: string, membershipId?: string | null): Promise<number>;
  getLimitation(membershipId: string, feature: string): Promise<Limitation | null>;
}

const isUnlimited = (limit: number | boolean): boolean => limit === true || limit === 0;

/** Whether one more account fits. */
export const checkLimit = (count: number, limitation: Limitation | null): boolean => {
  if (!limitation || !limitation.enabled) {
    return false;
  }
  const { limit } = limitation;
  if (isUnlimited(limit)) {
    return true;
  }
  if (limit === false) {
    return false;
  }
  return typeof limit === 'number' && count < limit;
};

export const remainingSlots = (count: number, limitation: Limitation | null): RemainingSlots => {
  if (!limitation || !limitation.enabled || limitation.limit === false) {
    return 0;
  }
  if (isUnlimited(limitation.limit)) {
    return 'unlimited';
  }
  return typeof limitation.limit === 'number' ? Math.max(0, limitation.limit - count) : 0;
};

export class QuotaService {
  constructor(
    private readonly oracle: QuotaOracle,
    private readonly settings: EmailSettingsProvider,
  ) {}

  async canCreateAccount(customerId: string, membershipId: string | null): Promise<boolean> {
    return (await this.getSummary(customerId, membershipId)).canCreate;
  }

  async getRemainingSlots(customerId: string, membershipId: string | null): Promise<RemainingSlots> {
    return (await this.getSummary(customerId, membershipId)).remaining;
  }

  async getSummary(customerId: string, membershipId: string | null): Promise<QuotaSummary> {
    const current = await this.oracle.countAccounts(customerId, membershipId);

    // Without a membership there is no limitation entry to grant slots
    if (!this.settings.getSettings().enableEmailAccounts || !membershipId) {
      return { canCreate: false, remaining: 0, current };
    }

    const limitation = await this.oracle.getLimitation(membershipId, EMAIL_ACCOUNTS_FEATURE);
    return {
      canCreate: checkLimit(current, limitation),
      remaining: remainingSlots(current, limitation),
      current,
    };
  }
}
