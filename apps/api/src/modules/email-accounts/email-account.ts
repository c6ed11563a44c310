import type { EmailAccountStatus, PurchaseType } from '@mailhost/common';

export interface EmailAccount {
  id: string;
  emailAddress: string;
  domain: string;
  customerId: string;
  membershipId: string | null;
  siteId: string | null;
  provider: string;
  externalId: string | null;
  /** 0 means unlimited. */
  quotaMb: number;
  purchaseType: PurchaseType;
  paymentId: string | null;
  status: EmailAccountStatus;
  /** Handle into the password token store; never the password itself. */
  passwordDisplayToken: string | null;
  dateCreated: Date;
  dateModified: Date;
}

/** Statuses that occupy a quota slot. */
export const COUNTED_STATUSES: readonly EmailAccountStatus[] = ['pending', 'provisioning', 'active', 'suspended'];

export const ACCOUNT_STATUS_TRANSITIONS: Readonly<Record<EmailAccountStatus, readonly EmailAccountStatus[]>> = {
  pending: ['provisioning', 'failed'],
  provisioning: ['active', 'failed'],
  active: ['suspended'],
  suspended: ['active'],
  failed: ['pending'],
};

export const canTransition = (from: EmailAccountStatus, to: EmailAccountStatus): boolean =>
  ACCOUNT_STATUS_TRANSITIONS[from].includes(to);

export const accountUsername = (account: Pick<EmailAccount, 'emailAddress'>): string => {
  const at = account.emailAddress.lastIndexOf('@');
  return at === -1 ? account.emailAddress : account.emailAddress.slice(0, at);
};
