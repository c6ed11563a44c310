import { describe, expect, it } from 'vitest';

import { DuplicateEmailAddressError, type NewEmailAccount } from '../../../src/modules/email-accounts/email-account.repository.js';
import { InMemoryEmailAccountRepository } from '../../../src/modules/email-accounts/email-account.repository.memory.js';

const newAccount = (overrides: Partial<NewEmailAccount> = {}): NewEmailAccount => ({
  emailAddress: 'info@example.com',
  domain: 'example.com',
  customerId: 'customer-1',
  membershipId: 'membership-1',
  siteId: null,
  provider: 'fake',
  externalId: null,
  quotaMb: 1024,
  purchaseType: 'membership_included',
  paymentId: null,
  status: 'pending',
  passwordDisplayToken: null,
  ...overrides,
});

describe('InMemoryEmailAccountRepository', () => {
  it('enforces unique addresses regardless of case', async () => {
    const repository = new InMemoryEmailAccountRepository();
    await repository.create(newAccount());

    await expect(repository.create(newAccount({ emailAddress: 'INFO@example.com' }))).rejects.toBeInstanceOf(
      DuplicateEmailAddressError,
    );
  });

  it('hands out copies', async () => {
    const repository = new InMemoryEmailAccountRepository();
    const account = await repository.create(newAccount());

    account.status = 'active';

    expect((await repository.findById(account.id))?.status).toBe('pending');
  });

  it('filters and counts by status list', async () => {
    const repository = new InMemoryEmailAccountRepository();
    await repository.create(newAccount({ emailAddress: 'a@example.com', status: 'active' }));
    await repository.create(newAccount({ emailAddress: 'b@example.com', status: 'failed' }));
    await repository.create(newAccount({ emailAddress: 'c@example.com', customerId: 'customer-2' }));

    expect(await repository.count({ customerId: 'customer-1', status: ['pending', 'active'] })).toBe(1);
    expect(await repository.count({ status: 'failed' })).toBe(1);
    expect(await repository.count()).toBe(3);
  });

  it('bumps dateModified on save and ignores deleted rows', async () => {
    let now = Date.UTC(2026, 0, 1);
    const repository = new InMemoryEmailAccountRepository(() => new Date(now));
    const account = await repository.create(newAccount());

    now += 5_000;
    const saved = await repository.save({ ...account, status: 'provisioning' });
    expect(saved?.dateModified.getTime()).toBe(Date.UTC(2026, 0, 1) + 5_000);
    expect(saved?.dateCreated.getTime()).toBe(Date.UTC(2026, 0, 1));

    expect(await repository.delete(account.id)).toBe(true);
    expect(await repository.save(account)).toBeNull();
    expect(await repository.findByEmailAddress('info@example.com')).toBeNull();
  });
});
