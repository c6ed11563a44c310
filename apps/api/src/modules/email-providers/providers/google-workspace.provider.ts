import { readFile } from 'fs/promises';

import { err, ok, type DnsRecordInstruction, type MailServerSettings } from '@mailhost/common';
import { google, type admin_directory_v1 } from 'googleapis';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

import { BaseEmailProvider } from '../base-email-provider.js';
import type {
  CreateMailboxInput,
  CreatedMailbox,
  MailboxInfo,
  MailboxRef,
  ProviderResult,
} from '../email-provider.js';
import {
  errorFromStatus,
  normalizeProviderError,
  notConfigured,
  providerError,
  providerFailure,
} from '../provider-errors.js';
import { parseJsonBody } from '../provider-http.js';

export interface GoogleWorkspaceConfig {
  /** Service account key JSON, or a path to the key file. */
  serviceAccount?: string;
  /** Super admin the service account impersonates. */
  adminEmail?: string;
  customerId?: string;
}

export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const DIRECTORY_USER_SCOPE = 'https://www.googleapis.com/auth/admin.directory.user';

const TOKEN_CACHE_KEY = 'google_workspace:access_token';
const ASSERTION_LIFETIME_SECONDS = 3600;
const TOKEN_EXPIRY_MARGIN_SECONDS = 60;

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

type ServiceAccountKey = z.infer<typeof serviceAccountSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export class GoogleWorkspaceProvider extends BaseEmailProvider<GoogleWorkspaceConfig> {
  readonly id = 'google_workspace';
  readonly title = 'Google Workspace';
  readonly description = 'Gmail mailboxes managed through the Admin SDK Directory API.';
  protected readonly requiredSettings = ['serviceAccount', 'adminEmail', 'customerId'] as const;

  private serviceAccountKey: ServiceAccountKey | undefined;

  async createEmailAccount(input: CreateMailboxInput): Promise<ProviderResult<CreatedMailbox>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const invalid = this.missingMailboxParams(input);
    if (invalid) {
      return invalid;
    }

    const emailAddress = `${input.username}@${input.domain}`;
    const result = await this.directory((admin) =>
      admin.users.insert({
        requestBody: {
          primaryEmail: emailAddress,
          password: input.password,
          changePasswordAtNextLogin: false,
          name: {
            givenName: input.displayName ?? input.username,
            familyName: 'User',
          },
        },
      }),
    );
    if (!result.ok) {
      return result;
    }

    return ok({ emailAddress, externalId: result.value.data.id ?? emailAddress, quotaMb: input.quotaMb });
  }

  async deleteEmailAccount(emailAddress: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.directory((admin) => admin.users.delete({ userKey: emailAddress }));
    return result.ok ? ok(undefined) : result;
  }

  async changePassword(emailAddress: string, newPassword: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.directory((admin) =>
      admin.users.update({
        userKey: emailAddress,
        requestBody: { password: newPassword, changePasswordAtNextLogin: false },
      }),
    );
    return result.ok ? ok(undefined) : result;
  }

  async getAccountInfo(emailAddress: string): Promise<ProviderResult<MailboxInfo>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.directory((admin) => admin.users.get({ userKey: emailAddress }));
    if (!result.ok) {
      return result;
    }

    const user = result.value.data;
    const displayName = user.name?.fullName;
    return ok({
      emailAddress: user.primaryEmail ?? emailAddress,
      quotaMb: 0,
      diskUsedMb: 0,
      suspended: user.suspended === true,
      ...(displayName ? { displayName } : {}),
    });
  }

  async testConnection(): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const { customerId } = this.config;
    if (!customerId) {
      return notConfigured(this.title);
    }
    const result = await this.directory((admin) => admin.customers.get({ customerKey: customerId }));
    return result.ok ? ok(undefined) : result;
  }

  getWebmailUrl(): string {
    return 'https://mail.google.com/';
  }

  getImapSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: 'imap.gmail.com', port: 993, security: 'SSL/TLS', username: mailbox.emailAddress };
  }

  getSmtpSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: 'smtp.gmail.com', port: 587, security: 'STARTTLS', username: mailbox.emailAddress };
  }

  getDnsInstructions(): DnsRecordInstruction[] {
    const mx = (value: string, priority: number): DnsRecordInstruction => ({
      type: 'MX',
      name: '@',
      value,
      priority,
      description: 'Google mail exchanger.',
    });

    return [
      mx('aspmx.l.google.com', 1),
      mx('alt1.aspmx.l.google.com', 5),
      mx('alt2.aspmx.l.google.com', 5),
      mx('alt3.aspmx.l.google.com', 10),
      mx('alt4.aspmx.l.google.com', 10),
      {
        type: 'TXT',
        name: '@',
        value: 'v=spf1 include:_spf.google.com ~all',
        description: 'SPF record allowing Google to send for this domain.',
      },
    ];
  }

  private async loadServiceAccount(): Promise<ProviderResult<ServiceAccountKey>> {
    if (this.serviceAccountKey) {
      return ok(this.serviceAccountKey);
    }

    const source = (this.config.serviceAccount ?? '').trim();
    let raw: string;
    try {
      raw = source.startsWith('{') ? source : await readFile(source, 'utf8');
    } catch (error) {
      this.log.error({ err: error }, 'Service account key file could not be read');
      return providerFailure('invalid_credentials', 'Service account key file could not be read');
    }

    const parsed = serviceAccountSchema.safeParse(parseJsonBody(raw));
    if (!parsed.success) {
      return providerFailure('invalid_credentials', 'Service account key is missing client_email or private_key');
    }

    this.serviceAccountKey = parsed.data;
    return ok(parsed.data);
  }

  /**
   * Signed assertion for the JWT bearer grant, impersonating the configured admin.
   */
  private signAssertion(key: ServiceAccountKey): string {
    return jwt.sign({ scope: DIRECTORY_USER_SCOPE }, key.private_key, {
      algorithm: 'RS256',
      issuer: key.client_email,
      subject: this.config.adminEmail,
      audience: GOOGLE_TOKEN_URL,
      expiresIn: ASSERTION_LIFETIME_SECONDS,
    });
  }

  private async accessToken(): Promise<ProviderResult<string>> {
    const cached = await this.tokenCache.get(TOKEN_CACHE_KEY);
    if (cached) {
      return ok(cached);
    }

    const key = await this.loadServiceAccount();
    if (!key.ok) {
      return key;
    }

    let assertion: string;
    try {
      assertion = this.signAssertion(key.value);
    } catch (error) {
      this.log.error({ err: error }, 'Could not sign token assertion');
      return providerFailure('invalid_credentials', 'Service account private key is not usable');
    }

    const response = await this.http.request({
      method: 'POST',
      url: GOOGLE_TOKEN_URL,
      form: {
        grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
        assertion,
      },
    });
    if (!response.ok) {
      return response;
    }

    const { status, body } = response.value;
    if (status >= 400) {
      const failure = tokenErrorSchema.safeParse(body);
      const message = failure.success
        ? failure.data.error_description ?? failure.data.error
        : `Token exchange failed with HTTP ${status}`;
      if (status === 400 || status === 401) {
        return providerFailure('invalid_credentials', message, status);
      }
      return err(errorFromStatus(status, message));
    }

    const token = tokenResponseSchema.safeParse(body);
    if (!token.success) {
      return providerFailure('remote_rejected', 'Token endpoint returned no access token');
    }

    const ttlSeconds = (token.data.expires_in ?? ASSERTION_LIFETIME_SECONDS) - TOKEN_EXPIRY_MARGIN_SECONDS;
    await this.tokenCache.set(TOKEN_CACHE_KEY, token.data.access_token, ttlSeconds);
    return ok(token.data.access_token);
  }

  private async directory<T>(run: (admin: admin_directory_v1.Admin) => Promise<T>): Promise<ProviderResult<T>> {
    const token = await this.accessToken();
    if (!token.ok) {
      return token;
    }

    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: token.value });
    const admin = google.admin({ version: 'directory_v1', auth, timeout: this.timeoutMs });

    try {
      return ok(await run(admin));
    } catch (error) {
      const normalized = normalizeProviderError(error);
      if (normalized.kind === 'invalid_credentials') {
        await this.tokenCache.delete(TOKEN_CACHE_KEY);
      }
      this.log.warn({ kind: normalized.kind, status: normalized.status }, 'Directory API call failed');
      return err(providerError(normalized.kind, normalized.message, normalized.status));
    }
  }
}
