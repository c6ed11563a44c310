import type { EmailAccountStatus } from '@mailhost/common';

import type { EmailAccount } from './email-account.js';

export type NewEmailAccount = Omit<EmailAccount, 'id' | 'dateCreated' | 'dateModified'>;

export interface EmailAccountFilter {
  customerId?: string;
  membershipId?: string;
  siteId?: string;
  provider?: string;
  status?: EmailAccountStatus | readonly EmailAccountStatus[];
}

export class DuplicateEmailAddressError extends Error {
  constructor(readonly emailAddress: string) {
    super(`Email address already in use: ${emailAddress}`);
    this.name = 'DuplicateEmailAddressError';
  }
}

export interface EmailAccountRepository {
  /** Throws DuplicateEmailAddressError when the address is taken. */
  create(input: NewEmailAccount): Promise<EmailAccount>;
  findById(id: string): Promise<EmailAccount | null>;
  findByEmailAddress(emailAddress: string): Promise<EmailAccount | null>;
  list(filter?: EmailAccountFilter): Promise<EmailAccount[]>;
  count(filter?: EmailAccountFilter): Promise<number>;
  /** Replaces the stored record and bumps dateModified. Null when it no longer exists. */
  save(account: EmailAccount): Promise<EmailAccount | null>;
  delete(id: string): Promise<boolean>;
}

export const statusList = (status: EmailAccountFilter['status']): readonly EmailAccountStatus[] | undefined => {
  if (status === undefined) {
    return undefined;
  }
  return typeof status === 'string' ? [status] : status;
};
