import { ClientSecretCredential, type TokenCredential } from '@azure/identity';
import { Client } from '@microsoft/microsoft-graph-client';
import { err, ok, type DnsRecordInstruction, type MailServerSettings } from '@mailhost/common';
import { z } from 'zod';

import { BaseEmailProvider, type ProviderOptions } from '../base-email-provider.js';
import type {
  CreateMailboxInput,
  CreatedMailbox,
  MailboxInfo,
  MailboxRef,
  ProviderResult,
} from '../email-provider.js';
import { normalizeProviderError, notConfigured, providerError, providerFailure } from '../provider-errors.js';

export interface Microsoft365Config {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  /** SKU assigned to new users; left out when licensing is handled elsewhere. */
  licenseSku?: string;
}

export interface Microsoft365Credentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export type CredentialFactory = (credentials: Microsoft365Credentials) => TokenCredential;

export interface Microsoft365ProviderOptions extends ProviderOptions<Microsoft365Config> {
  credentialFactory?: CredentialFactory;
}

const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';
const TOKEN_CACHE_KEY = 'microsoft365:access_token';
const TOKEN_EXPIRY_MARGIN_SECONDS = 60;

const createdUserSchema = z.object({ id: z.string().min(1) });

const userSchema = z.object({
  id: z.string().optional(),
  displayName: z.string().nullish(),
  userPrincipalName: z.string().optional(),
  accountEnabled: z.boolean().nullish(),
});

const defaultCredentialFactory: CredentialFactory = ({ tenantId, clientId, clientSecret }) =>
  new ClientSecretCredential(tenantId, clientId, clientSecret);

export class Microsoft365Provider extends BaseEmailProvider<Microsoft365Config> {
  readonly id = 'microsoft365';
  readonly title = 'Microsoft 365';
  readonly description = 'Exchange Online mailboxes provisioned through Microsoft Graph.';
  protected readonly requiredSettings = ['tenantId', 'clientId', 'clientSecret'] as const;

  private readonly credentialFactory: CredentialFactory;
  private credential: TokenCredential | undefined;

  constructor(options: Microsoft365ProviderOptions) {
    super(options);
    this.credentialFactory = options.credentialFactory ?? defaultCredentialFactory;
  }

  async createEmailAccount(input: CreateMailboxInput): Promise<ProviderResult<CreatedMailbox>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const invalid = this.missingMailboxParams(input);
    if (invalid) {
      return invalid;
    }

    const emailAddress = `${input.username}@${input.domain}`;
    const created = await this.graph((client) =>
      client.api('/users').post({
        accountEnabled: true,
        displayName: input.displayName ?? input.username,
        mailNickname: input.username,
        userPrincipalName: emailAddress,
        givenName: input.username,
        surname: 'User',
        passwordProfile: {
          forceChangePasswordNextSignIn: false,
          password: input.password,
        },
        usageLocation: 'US',
      }),
    );
    if (!created.ok) {
      return created;
    }

    const user = createdUserSchema.safeParse(created.value);
    if (!user.success) {
      return providerFailure('remote_rejected', 'Microsoft Graph did not return a user id');
    }

    await this.assignLicense(user.data.id);

    return ok({ emailAddress, externalId: user.data.id, quotaMb: input.quotaMb });
  }

  async deleteEmailAccount(emailAddress: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.graph((client) => client.api(this.userPath(emailAddress)).delete());
    return result.ok ? ok(undefined) : result;
  }

  async changePassword(emailAddress: string, newPassword: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.graph((client) =>
      client.api(this.userPath(emailAddress)).patch({
        passwordProfile: {
          forceChangePasswordNextSignIn: false,
          password: newPassword,
        },
      }),
    );
    return result.ok ? ok(undefined) : result;
  }

  async getAccountInfo(emailAddress: string): Promise<ProviderResult<MailboxInfo>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.graph((client) =>
      client.api(`${this.userPath(emailAddress)}?$select=id,displayName,userPrincipalName,accountEnabled`).get(),
    );
    if (!result.ok) {
      return result;
    }

    const user = userSchema.safeParse(result.value);
    if (!user.success) {
      return providerFailure('remote_rejected', 'Unexpected user payload from Microsoft Graph');
    }

    return ok({
      emailAddress: user.data.userPrincipalName ?? emailAddress,
      quotaMb: 0,
      diskUsedMb: 0,
      suspended: user.data.accountEnabled === false,
      ...(user.data.displayName ? { displayName: user.data.displayName } : {}),
    });
  }

  async testConnection(): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.graph((client) => client.api('/organization').get());
    return result.ok ? ok(undefined) : result;
  }

  getWebmailUrl(): string {
    return 'https://outlook.office365.com/';
  }

  getImapSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: 'outlook.office365.com', port: 993, security: 'SSL/TLS', username: mailbox.emailAddress };
  }

  getSmtpSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: 'smtp.office365.com', port: 587, security: 'STARTTLS', username: mailbox.emailAddress };
  }

  getDnsInstructions(domain: string): DnsRecordInstruction[] {
    const dashed = domain.replace(/\./g, '-');
    return [
      {
        type: 'MX',
        name: '@',
        value: `${dashed}.mail.protection.outlook.com`,
        priority: 0,
        description: 'Delivers incoming mail to Exchange Online.',
      },
      {
        type: 'TXT',
        name: '@',
        value: 'v=spf1 include:spf.protection.outlook.com -all',
        description: 'SPF record allowing Exchange Online to send for this domain.',
      },
      {
        type: 'CNAME',
        name: 'autodiscover',
        value: 'autodiscover.outlook.com',
        description: 'Lets mail clients discover their settings automatically.',
      },
      {
        type: 'CNAME',
        name: 'selector1._domainkey',
        value: `selector1-${dashed}._domainkey.YOUR_TENANT.onmicrosoft.com`,
        description: 'First DKIM selector. Replace YOUR_TENANT with the tenant name.',
      },
      {
        type: 'CNAME',
        name: 'selector2._domainkey',
        value: `selector2-${dashed}._domainkey.YOUR_TENANT.onmicrosoft.com`,
        description: 'Second DKIM selector. Replace YOUR_TENANT with the tenant name.',
      },
    ];
  }

  private userPath(emailAddress: string): string {
    return `/users/${encodeURIComponent(emailAddress)}`;
  }

  /** A missing license leaves a usable account, so failures only warn. */
  private async assignLicense(userId: string): Promise<void> {
    const skuId = this.config.licenseSku;
    if (!skuId) {
      return;
    }

    const result = await this.graph((client) =>
      client.api(`/users/${userId}/assignLicense`).post({
        addLicenses: [{ skuId, disabledPlans: [] }],
        removeLicenses: [],
      }),
    );
    if (!result.ok) {
      this.log.warn({ userId, kind: result.error.kind, message: result.error.message }, 'License assignment failed');
    }
  }

  private getCredential(): TokenCredential {
    this.credential ??= this.credentialFactory({
      tenantId: this.config.tenantId ?? '',
      clientId: this.config.clientId ?? '',
      clientSecret: this.config.clientSecret ?? '',
    });
    return this.credential;
  }

  private async accessToken(): Promise<ProviderResult<string>> {
    const cached = await this.tokenCache.get(TOKEN_CACHE_KEY);
    if (cached) {
      return ok(cached);
    }

    try {
      const token = await this.getCredential().getToken(GRAPH_SCOPE, {
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!token) {
        return providerFailure('invalid_credentials', 'Microsoft identity platform returned no token');
      }

      const ttlSeconds = Math.floor((token.expiresOnTimestamp - Date.now()) / 1000) - TOKEN_EXPIRY_MARGIN_SECONDS;
      await this.tokenCache.set(TOKEN_CACHE_KEY, token.token, ttlSeconds);
      return ok(token.token);
    } catch (error) {
      const normalized = normalizeProviderError(error);
      this.log.error({ err: error, kind: normalized.kind }, 'Token request failed');
      if (normalized.kind === 'remote_unreachable' || normalized.kind === 'rate_limited') {
        return err(normalized);
      }
      return err(providerError('invalid_credentials', normalized.message, normalized.status));
    }
  }

  private async graph(run: (client: Client) => Promise<unknown>): Promise<ProviderResult<unknown>> {
    const token = await this.accessToken();
    if (!token.ok) {
      return token;
    }

    const client = Client.init({
      authProvider: (done) => done(null, token.value),
      fetchOptions: { signal: AbortSignal.timeout(this.timeoutMs) },
    });

    try {
      return ok(await run(client));
    } catch (error) {
      const normalized = normalizeProviderError(error);
      if (normalized.kind === 'invalid_credentials') {
        await this.tokenCache.delete(TOKEN_CACHE_KEY);
      }
      return err(normalized);
    }
  }
}
