import { COUNTED_STATUSES } from './email-account.js';
import type { EmailAccountRepository } from './email-account.repository.js';
import type { MembershipDirectory } from './host-directory.js';
import type { Limitation, QuotaOracle } from './quota.service.js';

export class RepositoryQuotaOracle implements QuotaOracle {
  constructor(
    private readonly repository: EmailAccountRepository,
    private readonly memberships: MembershipDirectory,
  ) {}

  countAccounts(customerId: string, membershipId?: string | null): Promise<number> {
    return this.repository.count({
      customerId,
      ...(membershipId ? { membershipId } : {}),
      status: COUNTED_STATUSES,
    });
  }

  getLimitation(membershipId: string, feature: string): Promise<Limitation | null> {
    return this.memberships.getLimitation(membershipId, feature);
  }
}
