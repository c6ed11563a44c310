import { randomUUID } from 'crypto';

import type { EmailAccount } from './email-account.js';
import {
  DuplicateEmailAddressError,
  statusList,
  type EmailAccountFilter,
  type EmailAccountRepository,
  type NewEmailAccount,
} from './email-account.repository.js';

const matches = (account: EmailAccount, filter: EmailAccountFilter): boolean => {
  const statuses = statusList(filter.status);
  return (
    (filter.customerId === undefined || account.customerId === filter.customerId) &&
    (filter.membershipId === undefined || account.membershipId === filter.membershipId) &&
    (filter.siteId === undefined || account.siteId === filter.siteId) &&
    (filter.provider === undefined || account.provider === filter.provider) &&
    (statuses === undefined || statuses.includes(account.status))
  );
};

/**
 * Process-local repository. Records are copied in and out so callers cannot
 * mutate stored state without going through save().
 */
export class InMemoryEmailAccountRepository implements EmailAccountRepository {
  private readonly accounts = new Map<string, EmailAccount>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(input: NewEmailAccount): Promise<EmailAccount> {
    const emailAddress = input.emailAddress.toLowerCase();
    if (this.findIdByEmail(emailAddress)) {
      throw new DuplicateEmailAddressError(emailAddress);
    }

    const timestamp = this.now();
    const account: EmailAccount = {
      ...input,
      emailAddress,
      id: randomUUID(),
      dateCreated: timestamp,
      dateModified: timestamp,
    };
    this.accounts.set(account.id, structuredClone(account));
    return account;
  }

  async findById(id: string): Promise<EmailAccount | null> {
    const account = this.accounts.get(id);
    return account ? structuredClone(account) : null;
  }

  async findByEmailAddress(emailAddress: string): Promise<EmailAccount | null> {
    const id = this.findIdByEmail(emailAddress.toLowerCase());
    return id ? this.findById(id) : null;
  }

  async list(filter: EmailAccountFilter = {}): Promise<EmailAccount[]> {
    return [...this.accounts.values()]
      .filter((account) => matches(account, filter))
      .sort((a, b) => a.dateCreated.getTime() - b.dateCreated.getTime())
      .map((account) => structuredClone(account));
  }

  async count(filter: EmailAccountFilter = {}): Promise<number> {
    let total = 0;
    for (const account of this.accounts.values()) {
      if (matches(account, filter)) {
        total += 1;
      }
    }
    return total;
  }

  async save(account: EmailAccount): Promise<EmailAccount | null> {
    if (!this.accounts.has(account.id)) {
      return null;
    }
    const updated: EmailAccount = { ...account, dateModified: this.now() };
    this.accounts.set(updated.id, structuredClone(updated));
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.accounts.delete(id);
  }

  private findIdByEmail(emailAddress: string): string | undefined {
    for (const account of this.accounts.values()) {
      if (account.emailAddress === emailAddress) {
        return account.id;
      }
    }
    return undefined;
  }
}
