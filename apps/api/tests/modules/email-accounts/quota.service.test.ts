import { describe, expect, it } from 'vitest';

import { StaticEmailSettingsProvider } from '../../../src/modules/email-accounts/email-accounts.settings.js';
import {
  QuotaService,
  checkLimit,
  remainingSlots,
  type Limitation,
  type QuotaOracle,
} from '../../../src/modules/email-accounts/quota.service.js';

describe('checkLimit', () => {
  it('allows creation strictly below a numeric cap', () => {
    const limitation: Limitation = { enabled: true, limit: 3 };
    expect(checkLimit(2, limitation)).toBe(true);
    expect(checkLimit(3, limitation)).toBe(false);
    expect(checkLimit(4, limitation)).toBe(false);
  });

  it('treats 0 and true as unlimited', () => {
    expect(checkLimit(500, { enabled: true, limit: 0 })).toBe(true);
    expect(checkLimit(500, { enabled: true, limit: true })).toBe(true);
  });

  it('treats false as no accounts at all', () => {
    expect(checkLimit(0, { enabled: true, limit: false })).toBe(false);
  });

  it('denies when the limitation is missing or disabled', () => {
    expect(checkLimit(0, null)).toBe(false);
    expect(checkLimit(0, { enabled: false, limit: 10 })).toBe(false);
  });
});

describe('remainingSlots', () => {
  it('never goes negative', () => {
    expect(remainingSlots(1, { enabled: true, limit: 3 })).toBe(2);
    expect(remainingSlots(5, { enabled: true, limit: 3 })).toBe(0);
  });

  it('reports unlimited memberships', () => {
    expect(remainingSlots(7, { enabled: true, limit: 0 })).toBe('unlimited');
    expect(remainingSlots(7, { enabled: true, limit: true })).toBe('unlimited');
  });

  it('is zero without an enabled limitation', () => {
    expect(remainingSlots(0, null)).toBe(0);
    expect(remainingSlots(0, { enabled: false, limit: 0 })).toBe(0);
    expect(remainingSlots(0, { enabled: true, limit: false })).toBe(0);
  });
});

describe('QuotaService', () => {
  const createService = (count: number, limitation: Limitation | null, enableEmailAccounts = true) => {
    const oracle: QuotaOracle = {
      countAccounts: async () => count,
      getLimitation: async () => limitation,
    };
    const settings = new StaticEmailSettingsProvider({
      enableEmailAccounts,
      defaultQuotaMb: 1024,
      enablePerAccountPurchase: false,
      accountPrice: 5,
    });
    return new QuotaService(oracle, settings);
  };

  it('summarizes usage against the membership limit', async () => {
    const service = createService(1, { enabled: true, limit: 3 });
    expect(await service.getSummary('customer-1', 'membership-1')).toEqual({
      canCreate: true,
      remaining: 2,
      current: 1,
    });
  });

  it('denies everything when the feature is off', async () => {
    const service = createService(0, { enabled: true, limit: 0 }, false);
    expect(await service.canCreateAccount('customer-1', 'membership-1')).toBe(false);
    expect(await service.getRemainingSlots('customer-1', 'membership-1')).toBe(0);
  });

  it('denies accounts that are not tied to a membership', async () => {
    const service = createService(0, { enabled: true, limit: 0 });
    expect(await service.canCreateAccount('customer-1', null)).toBe(false);
  });
});
