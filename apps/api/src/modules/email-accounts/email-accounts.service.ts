import {
  emailAddressSchema,
  err,
  ok,
  splitEmailAddress,
  type ConnectionSettings,
  type DnsRecordInstruction,
  type EmailAccountStatus,
  type Failure,
  type ProviderSummary,
  type PurchaseType,
  type QuotaSummary,
  type Result,
} from '@mailhost/common';

import type { TtlCache } from '../../core/cache/ttl-cache.js';
import type { JobDispatcher } from '../../core/jobs/job-dispatcher.js';
import { componentLogger } from '../../core/logger/index.js';
import type { EmailProvider, MailboxInfo, ProviderError } from '../email-providers/email-provider.js';
import { providerError } from '../email-providers/provider-errors.js';
import { isAvailable, toProviderSummary, type ProviderRegistry } from '../email-providers/provider-registry.js';
import { accountUsername, canTransition, type EmailAccount } from './email-account.js';
import type { EmailAccountEvents } from './email-account-events.js';
import {
  DuplicateEmailAddressError,
  type EmailAccountFilter,
  type EmailAccountRepository,
} from './email-account.repository.js';
import {
  PROVISION_JOB,
  REMOTE_DELETE_JOB,
  provisionJobSchema,
  provisionTokenKey,
  remoteDeleteJobSchema,
  type EmailAccountJobs,
  type ProvisionJob,
  type RemoteDeleteJob,
} from './email-accounts.jobs.js';
import type { EmailSettingsProvider } from './email-accounts.settings.js';
import type { CustomerDirectory } from './host-directory.js';
import { generatePassword } from './password-generator.js';
import type { PasswordTokenStore } from './password-token.store.js';
import type { QuotaService } from './quota.service.js';

export type EmailAccountErrorCode =
  | 'feature_disabled'
  | 'invalid_customer'
  | 'invalid_provider'
  | 'invalid_email'
  | 'domain_mismatch'
  | 'email_exists'
  | 'quota_exceeded'
  | 'purchase_disabled'
  | 'account_busy'
  | 'invalid_transition'
  | 'not_found'
  | 'token_not_found'
  | 'provider_error';

export interface EmailAccountError {
  code: EmailAccountErrorCode;
  message: string;
  providerError?: ProviderError;
}

export type EmailAccountResult<T> = Result<T, EmailAccountError>;

const accountError = (
  code: EmailAccountErrorCode,
  message: string,
  cause?: ProviderError,
): Failure<EmailAccountError> => err(cause ? { code, message, providerError: cause } : { code, message });

export interface CreateEmailAccountInput {
  customerId: string;
  membershipId?: string | null;
  siteId?: string | null;
  emailAddress: string;
  /** Must agree with the address when given. */
  domain?: string;
  provider: string;
  password?: string;
  quotaMb?: number;
  purchaseType?: PurchaseType;
  paymentId?: string | null;
}

export interface PasswordChange {
  account: EmailAccount;
  passwordDisplayToken: string;
}

export interface PurchaseOptions {
  perAccountPurchase: boolean;
  accountPrice: number;
}

export interface EmailAccountsServiceDependencies {
  repository: EmailAccountRepository;
  providers: ProviderRegistry;
  quota: QuotaService;
  passwordTokens: PasswordTokenStore;
  /** Holds the provision-time token pointer per account. */
  cache: TtlCache;
  jobs: JobDispatcher<EmailAccountJobs>;
  customers: CustomerDirectory;
  settings: EmailSettingsProvider;
  events: EmailAccountEvents;
  generatePassword?: () => string;
}

const PROVISIONED_STATUSES: readonly EmailAccountStatus[] = ['active', 'suspended'];

export class EmailAccountsService {
  private readonly log = componentLogger('email-accounts');
  private readonly newPassword: () => string;

  constructor(private readonly deps: EmailAccountsServiceDependencies) {
    this.newPassword = deps.generatePassword ?? (() => generatePassword());
  }

  registerJobHandlers(): void {
    this.deps.jobs.register(PROVISION_JOB, provisionJobSchema, (job) => this.provision(job));
    this.deps.jobs.register(REMOTE_DELETE_JOB, remoteDeleteJobSchema, (job) => this.deleteRemoteAccount(job));
  }

  /**
   * Admits and records a new account, then hands provisioning to the job queue.
   * Returns while the account is still `pending`.
   */
  async createAccount(input: CreateEmailAccountInput): Promise<EmailAccountResult<EmailAccount>> {
    const { repository, providers, customers, quota } = this.deps;
    const settings = this.deps.settings.getSettings();

    if (!settings.enableEmailAccounts) {
      return accountError('feature_disabled', 'Email accounts are disabled');
    }
    if (!(await customers.exists(input.customerId))) {
      return accountError('invalid_customer', `Customer ${input.customerId} does not exist`);
    }
    if (!providers.getAvailable(input.provider)) {
      return accountError('invalid_provider', `Email provider ${input.provider} is not available`);
    }

    const address = emailAddressSchema.safeParse(input.emailAddress);
    const parts = address.success ? splitEmailAddress(address.data) : null;
    if (!address.success || !parts) {
      return accountError('invalid_email', 'Email address is not valid');
    }
    const emailAddress = address.data;

    const domain = input.domain?.trim().toLowerCase() || parts.domain;
    if (domain !== parts.domain) {
      return accountError('domain_mismatch', `Domain ${domain} does not match ${emailAddress}`);
    }

    if (await repository.findByEmailAddress(emailAddress)) {
      return accountError('email_exists', `${emailAddress} is already in use`);
    }

    const membershipId = input.membershipId ?? null;
    const purchaseType = input.purchaseType ?? 'membership_included';
    if (purchaseType === 'membership_included') {
      if (!(await quota.canCreateAccount(input.customerId, membershipId))) {
        return accountError('quota_exceeded', 'Email account limit reached for this membership');
      }
    } else if (!settings.enablePerAccountPurchase) {
      return accountError('purchase_disabled', 'Individual email account purchases are disabled');
    }

    let account: EmailAccount;
    try {
      account = await repository.create({
        emailAddress,
        domain,
        customerId: input.customerId,
        membershipId,
        siteId: input.siteId ?? null,
        provider: input.provider,
        externalId: null,
        quotaMb: input.quotaMb ?? settings.defaultQuotaMb,
        purchaseType,
        paymentId: input.paymentId ?? null,
        status: 'pending',
        passwordDisplayToken: null,
      });
    } catch (error) {
      if (error instanceof DuplicateEmailAddressError) {
        return accountError('email_exists', `${emailAddress} is already in use`);
      }
      throw error;
    }

    await this.queueProvisioning(account, input.password ?? this.newPassword());

    this.log.info({ accountId: account.id, provider: account.provider }, 'Email account created');
    this.deps.events.publish('created', account);
    return ok(account);
  }

  /**
   * Job handler. Acts only on `pending` accounts so a redelivered job is a no-op.
   */
  async provision({ accountId }: ProvisionJob): Promise<void> {
    const account = await this.deps.repository.findById(accountId);
    if (!account) {
      this.log.error({ accountId }, 'Provisioning requested for unknown account');
      return;
    }
    if (account.status !== 'pending') {
      this.log.info({ accountId, status: account.status }, 'Account is not pending; skipping provisioning');
      return;
    }

    const provider = this.deps.providers.get(account.provider);
    if (!provider || !isAvailable(provider)) {
      await this.failProvisioning(
        account,
        providerError('not_configured', `Email provider ${account.provider} is not available`),
      );
      return;
    }

    const started = await this.transitionStatus(account, 'provisioning');
    if (!started.ok) {
      this.log.warn({ accountId, code: started.error.code }, 'Could not start provisioning');
      return;
    }

    const password = (await this.takeProvisionPassword(accountId)) ?? this.newPassword();
    const created = await provider.createEmailAccount({
      username: accountUsername(account),
      domain: account.domain,
      password,
      quotaMb: account.quotaMb,
    });
    if (!created.ok) {
      await this.failProvisioning(started.value, created.error);
      return;
    }

    const displayToken = await this.deps.passwordTokens.store(accountId, password);
    const activated = await this.transitionStatus(
      { ...started.value, externalId: created.value.externalId, passwordDisplayToken: displayToken },
      'active',
    );
    if (!activated.ok) {
      await this.deps.passwordTokens.discard(displayToken);
      this.log.error({ accountId, code: activated.error.code }, 'Mailbox created but account could not be activated');
      return;
    }

    this.log.info({ accountId, provider: provider.id }, 'Email account provisioned');
    this.deps.events.publish('provisioned', activated.value, password);
  }

  /**
   * The only path that writes `status`. Illegal edges write nothing.
   */
  async transitionStatus(account: EmailAccount, next: EmailAccountStatus): Promise<EmailAccountResult<EmailAccount>> {
    if (!canTransition(account.status, next)) {
      return accountError('invalid_transition', `Cannot move account from ${account.status} to ${next}`);
    }

    const saved = await this.deps.repository.save({ ...account, status: next });
    if (!saved) {
      return accountError('not_found', `Email account ${account.id} not found`);
    }

    if (account.status === 'active' && next === 'suspended') {
      this.deps.events.publish('suspended', saved);
    } else if (account.status === 'suspended' && next === 'active') {
      this.deps.events.publish('reactivated', saved);
    }
    return ok(saved);
  }

  async getAccount(accountId: string): Promise<EmailAccountResult<EmailAccount>> {
    const account = await this.deps.repository.findById(accountId);
    return account ? ok(account) : accountError('not_found', `Email account ${accountId} not found`);
  }

  listAccounts(filter: EmailAccountFilter = {}): Promise<EmailAccount[]> {
    return this.deps.repository.list(filter);
  }

  async suspendAccount(accountId: string): Promise<EmailAccountResult<EmailAccount>> {
    const account = await this.getAccount(accountId);
    return account.ok ? this.transitionStatus(account.value, 'suspended') : account;
  }

  async reactivateAccount(accountId: string): Promise<EmailAccountResult<EmailAccount>> {
    const account = await this.getAccount(accountId);
    if (!account.ok) {
      return account;
    }
    if (account.value.status !== 'suspended') {
      return accountError('invalid_transition', 'Only suspended accounts can be reactivated');
    }
    return this.transitionStatus(account.value, 'active');
  }

  /** Operator re-run of a failed provisioning with a fresh password. */
  async retryProvisioning(accountId: string): Promise<EmailAccountResult<EmailAccount>> {
    const account = await this.getAccount(accountId);
    if (!account.ok) {
      return account;
    }
    if (account.value.status !== 'failed') {
      return accountError('invalid_transition', 'Only failed accounts can be retried');
    }

    const pending = await this.transitionStatus(account.value, 'pending');
    if (!pending.ok) {
      return pending;
    }

    await this.queueProvisioning(pending.value, this.newPassword());
    this.log.info({ accountId }, 'Provisioning retried');
    return pending;
  }

  async deleteAccount(accountId: string): Promise<EmailAccountResult<void>> {
    const account = await this.getAccount(accountId);
    if (!account.ok) {
      return account;
    }
    if (account.value.status === 'provisioning') {
      return accountError('account_busy', 'Account is being provisioned; try again shortly');
    }

    await this.removeAccount(account.value);
    return ok(undefined);
  }

  async changePassword(accountId: string, newPassword?: string): Promise<EmailAccountResult<PasswordChange>> {
    const account = await this.getAccount(accountId);
    if (!account.ok) {
      return account;
    }
    if (account.value.status !== 'active') {
      return accountError('invalid_transition', 'Passwords can only be changed on active accounts');
    }

    const provider = this.availableProvider(account.value.provider);
    if (!provider.ok) {
      return provider;
    }

    const password = newPassword ?? this.newPassword();
    const changed = await provider.value.changePassword(account.value.emailAddress, password);
    if (!changed.ok) {
      this.log.warn({ accountId, kind: changed.error.kind }, 'Password change rejected by provider');
      return accountError('provider_error', 'Email provider rejected the password change', changed.error);
    }

    if (account.value.passwordDisplayToken) {
      await this.deps.passwordTokens.discard(account.value.passwordDisplayToken);
    }
    const token = await this.deps.passwordTokens.store(accountId, password);
    const saved = await this.deps.repository.save({ ...account.value, passwordDisplayToken: token });
    if (!saved) {
      await this.deps.passwordTokens.discard(token);
      return accountError('not_found', `Email account ${accountId} not found`);
    }

    return ok({ account: saved, passwordDisplayToken: token });
  }

  /**
   * Single read of the password behind the account's display token.
   */
  async revealPassword(accountId: string, token: string): Promise<EmailAccountResult<string>> {
    const account = await this.getAccount(accountId);
    if (!account.ok) {
      return account;
    }
    if (!account.value.passwordDisplayToken || account.value.passwordDisplayToken !== token) {
      return accountError('token_not_found', 'Password is no longer available');
    }

    const password = await this.deps.passwordTokens.retrieve(token, accountId);
    await this.deps.repository.save({ ...account.value, passwordDisplayToken: null });

    return password === null ? accountError('token_not_found', 'Password is no longer available') : ok(password);
  }

  async getAccountInfo(accountId: string): Promise<EmailAccountResult<MailboxInfo>> {
    const account = await this.getAccount(accountId);
    if (!account.ok) {
      return account;
    }
    if (!PROVISIONED_STATUSES.includes(account.value.status)) {
      return accountError('account_busy', 'Account has not been provisioned');
    }

    const provider = this.availableProvider(account.value.provider);
    if (!provider.ok) {
      return provider;
    }

    const info = await provider.value.getAccountInfo(account.value.emailAddress);
    return info.ok ? info : accountError('provider_error', 'Could not load mailbox details', info.error);
  }

  async getConnectionSettings(accountId: string): Promise<EmailAccountResult<ConnectionSettings>> {
    const account = await this.getAccount(accountId);
    if (!account.ok) {
      return account;
    }

    const provider = this.deps.providers.get(account.value.provider);
    if (!provider) {
      return accountError('invalid_provider', `Email provider ${account.value.provider} is not registered`);
    }

    const mailbox = { emailAddress: account.value.emailAddress, domain: account.value.domain };
    return ok({
      webmailUrl: provider.getWebmailUrl(mailbox),
      imap: provider.getImapSettings(mailbox),
      smtp: provider.getSmtpSettings(mailbox),
    });
  }

  listProviders(): ProviderSummary[] {
    return this.deps.providers.summaries();
  }

  listAvailableProviders(): ProviderSummary[] {
    return this.deps.providers.listAvailable().map(toProviderSummary);
  }

  getDnsInstructions(providerId: string, domain: string): EmailAccountResult<DnsRecordInstruction[]> {
    const provider = this.deps.providers.get(providerId);
    if (!provider) {
      return accountError('invalid_provider', `Email provider ${providerId} is not registered`);
    }
    return ok(provider.getDnsInstructions(domain.trim().toLowerCase()));
  }

  async testProviderConnection(providerId: string): Promise<EmailAccountResult<void>> {
    const provider = this.deps.providers.get(providerId);
    if (!provider) {
      return accountError('invalid_provider', `Email provider ${providerId} is not registered`);
    }

    const result = await provider.testConnection();
    if (!result.ok) {
      this.log.warn({ provider: providerId, kind: result.error.kind }, 'Provider connection test failed');
      return accountError('provider_error', `${provider.title} connection test failed`, result.error);
    }
    return ok(undefined);
  }

  getQuotaSummary(customerId: string, membershipId: string | null): Promise<QuotaSummary> {
    return this.deps.quota.getSummary(customerId, membershipId);
  }

  getPurchaseOptions(): PurchaseOptions {
    const settings = this.deps.settings.getSettings();
    return { perAccountPurchase: settings.enablePerAccountPurchase, accountPrice: settings.accountPrice };
  }

  /** Cascade: every account of the customer is removed here and remotely. */
  async handleCustomerDeleted(customerId: string): Promise<number> {
    return this.removeAll(await this.deps.repository.list({ customerId }), { customerId });
  }

  async handleMembershipDeleted(membershipId: string): Promise<number> {
    return this.removeAll(await this.deps.repository.list({ membershipId }), { membershipId });
  }

  /**
   * Job handler. Best effort: the local row is already gone, so failures are
   * only logged.
   */
  async deleteRemoteAccount({ emailAddress, provider: providerId }: RemoteDeleteJob): Promise<void> {
    const provider = this.deps.providers.get(providerId);
    if (!provider) {
      this.log.error({ provider: providerId }, 'Remote delete for unregistered provider');
      return;
    }

    try {
      const result = await provider.deleteEmailAccount(emailAddress);
      if (result.ok) {
        this.log.info({ provider: providerId }, 'Remote mailbox deleted');
      } else if (result.error.kind === 'not_found') {
        this.log.warn({ provider: providerId }, 'Remote mailbox was already gone');
      } else {
        this.log.error(
          { provider: providerId, kind: result.error.kind, message: result.error.message },
          'Remote mailbox deletion failed',
        );
      }
    } catch (error) {
      this.log.error({ err: error, provider: providerId }, 'Remote mailbox deletion threw');
    }
  }

  private availableProvider(providerId: string): EmailAccountResult<EmailProvider> {
    const provider = this.deps.providers.getAvailable(providerId);
    return provider ? ok(provider) : accountError('invalid_provider', `Email provider ${providerId} is not available`);
  }

  private async queueProvisioning(account: EmailAccount, password: string): Promise<void> {
    const { passwordTokens, cache, jobs } = this.deps;
    const token = await passwordTokens.store(account.id, password);
    await cache.set(provisionTokenKey(account.id), token, passwordTokens.ttlSeconds);
    await jobs.enqueue(PROVISION_JOB, { accountId: account.id });
  }

  private async takeProvisionPassword(accountId: string): Promise<string | null> {
    const token = await this.deps.cache.take(provisionTokenKey(accountId));
    return token ? this.deps.passwordTokens.retrieve(token, accountId) : null;
  }

  private async discardProvisionPassword(accountId: string): Promise<void> {
    const token = await this.deps.cache.take(provisionTokenKey(accountId));
    if (token) {
      await this.deps.passwordTokens.discard(token);
    }
  }

  private async failProvisioning(account: EmailAccount, cause: ProviderError): Promise<void> {
    await this.discardProvisionPassword(account.id);
    const failed = await this.transitionStatus(account, 'failed');
    this.log.error({ accountId: account.id, provider: account.provider, kind: cause.kind }, 'Provisioning failed');
    if (failed.ok) {
      this.deps.events.publish('provisioning_failed', failed.value, { kind: cause.kind, message: cause.message });
    }
  }

  private async removeAccount(account: EmailAccount): Promise<void> {
    const { repository, passwordTokens, jobs, events } = this.deps;

    await repository.delete(account.id);

    if (account.passwordDisplayToken) {
      await passwordTokens.discard(account.passwordDisplayToken);
    }
    await this.discardProvisionPassword(account.id);

    try {
      await jobs.enqueue(REMOTE_DELETE_JOB, { emailAddress: account.emailAddress, provider: account.provider });
    } catch (error) {
      this.log.error({ err: error, accountId: account.id }, 'Could not queue remote mailbox deletion');
    }

    this.log.info({ accountId: account.id }, 'Email account deleted');
    events.publish('deleted', account);
  }

  private async removeAll(accounts: EmailAccount[], owner: Record<string, string>): Promise<number> {
    for (const account of accounts) {
      await this.removeAccount(account);
    }
    if (accounts.length > 0) {
      this.log.info({ ...owner, count: accounts.length }, 'Owner deleted; email accounts removed');
    }
    return accounts.length;
  }
}
