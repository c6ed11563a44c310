import { err, ok, splitEmailAddress, type DnsRecordInstruction, type MailServerSettings } from '@mailhost/common';
import { z } from 'zod';

import { BaseEmailProvider } from '../base-email-provider.js';
import type {
  CreateMailboxInput,
  CreatedMailbox,
  MailboxInfo,
  MailboxRef,
  ProviderResult,
} from '../email-provider.js';
import { errorFromMessage, errorFromStatus, notConfigured, providerFailure } from '../provider-errors.js';
import { parseJsonBody } from '../provider-http.js';

export interface CpanelConfig {
  host?: string;
  username?: string;
  password?: string;
  port: number;
}

interface CpanelSession {
  securityToken: string;
  cookie: string;
}

const SESSION_TTL_SECONDS = 15 * 60;

const sessionSchema = z.object({ securityToken: z.string().min(1), cookie: z.string().min(1) });

const loginResponseSchema = z.object({
  status: z.number(),
  security_token: z.string().optional(),
  message: z.string().optional(),
});

const uapiEnvelopeSchema = z.object({
  status: z.number(),
  errors: z.array(z.string()).nullish(),
  data: z.unknown().optional(),
});

const numeric = z
  .union([z.number(), z.string()])
  .optional()
  .transform((value) => {
    const parsed = typeof value === 'number' ? value : Number.parseFloat(value ?? '');
    return Number.isFinite(parsed) ? parsed : 0;
  });

const mailboxDiskSchema = z.object({
  email: z.string(),
  // "unlimited" parses to 0, which is also how quotas are expressed here
  _diskquota: numeric,
  _diskused: numeric,
  _diskusedpercent: numeric,
  suspended_login: numeric,
});

export class CpanelProvider extends BaseEmailProvider<CpanelConfig> {
  readonly id = 'cpanel';
  readonly title = 'cPanel';
  readonly description = 'Mailboxes hosted on a cPanel server through UAPI.';
  protected readonly requiredSettings = ['host', 'username', 'password'] as const;

  private get host(): string {
    return (this.config.host ?? '').replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  }

  private get baseUrl(): string {
    return `https://${this.host}:${this.config.port}`;
  }

  private get sessionKey(): string {
    return `cpanel:session:${this.host}:${this.config.username ?? ''}`;
  }

  async createEmailAccount(input: CreateMailboxInput): Promise<ProviderResult<CreatedMailbox>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const invalid = this.missingMailboxParams(input);
    if (invalid) {
      return invalid;
    }

    const result = await this.uapi('Email', 'add_pop', {
      email: input.username,
      domain: input.domain,
      password: input.password,
      quota: String(input.quotaMb),
    });
    if (!result.ok) {
      return result;
    }

    const emailAddress = `${input.username}@${input.domain}`;
    return ok({ emailAddress, externalId: emailAddress, quotaMb: input.quotaMb });
  }

  async deleteEmailAccount(emailAddress: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const parts = splitEmailAddress(emailAddress);
    if (!parts) {
      return providerFailure('missing_params', `Invalid email address: ${emailAddress}`);
    }

    const result = await this.uapi('Email', 'delete_pop', { email: parts.username, domain: parts.domain });
    return result.ok ? ok(undefined) : result;
  }

  async changePassword(emailAddress: string, newPassword: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const parts = splitEmailAddress(emailAddress);
    if (!parts) {
      return providerFailure('missing_params', `Invalid email address: ${emailAddress}`);
    }

    const result = await this.uapi('Email', 'passwd_pop', {
      email: parts.username,
      domain: parts.domain,
      password: newPassword,
    });
    return result.ok ? ok(undefined) : result;
  }

  async getAccountInfo(emailAddress: string): Promise<ProviderResult<MailboxInfo>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const parts = splitEmailAddress(emailAddress);
    if (!parts) {
      return providerFailure('missing_params', `Invalid email address: ${emailAddress}`);
    }

    const result = await this.uapi('Email', 'list_pops_with_disk', { domain: parts.domain });
    if (!result.ok) {
      return result;
    }

    const mailboxes = z.array(mailboxDiskSchema).safeParse(result.value);
    if (!mailboxes.success) {
      return providerFailure('remote_rejected', 'Unexpected mailbox listing from cPanel');
    }

    const target = emailAddress.toLowerCase();
    const mailbox = mailboxes.data.find((entry) => entry.email.toLowerCase() === target);
    if (!mailbox) {
      return providerFailure('not_found', `Mailbox ${emailAddress} not found`);
    }

    return ok({
      emailAddress: mailbox.email,
      quotaMb: mailbox._diskquota,
      diskUsedMb: mailbox._diskused,
      diskUsedPercent: mailbox._diskusedpercent,
      suspended: mailbox.suspended_login === 1,
    });
  }

  async testConnection(): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.uapi('Email', 'list_pops', {});
    return result.ok ? ok(undefined) : result;
  }

  getWebmailUrl(): string {
    return `https://${this.host}:2096/`;
  }

  getImapSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: `mail.${mailbox.domain}`, port: 993, security: 'SSL/TLS', username: mailbox.emailAddress };
  }

  getSmtpSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: `mail.${mailbox.domain}`, port: 587, security: 'STARTTLS', username: mailbox.emailAddress };
  }

  getDnsInstructions(domain: string): DnsRecordInstruction[] {
    return [
      {
        type: 'MX',
        name: '@',
        value: `mail.${domain}`,
        priority: 10,
        description: 'Routes incoming mail to the cPanel mail server.',
      },
      {
        type: 'A',
        name: 'mail',
        value: '[Your Server IP]',
        description: 'Points the mail host at the cPanel server address.',
      },
      {
        type: 'TXT',
        name: '@',
        value: 'v=spf1 +a +mx ~all',
        description: 'SPF record authorizing the server to send for this domain.',
      },
    ];
  }

  private async session(): Promise<ProviderResult<CpanelSession>> {
    const cached = await this.tokenCache.get(this.sessionKey);
    if (cached) {
      const parsed = sessionSchema.safeParse(parseJsonBody(cached));
      if (parsed.success) {
        return ok(parsed.data);
      }
    }

    const response = await this.http.request({
      method: 'POST',
      url: `${this.baseUrl}/login/?login_only=1`,
      form: { user: this.config.username ?? '', pass: this.config.password ?? '' },
    });
    if (!response.ok) {
      return response;
    }

    const { status, body, headers } = response.value;
    if (status === 401 || status === 403) {
      return providerFailure('invalid_credentials', 'cPanel rejected the configured credentials', status);
    }
    if (status >= 400) {
      return err(errorFromStatus(status, `cPanel login failed with HTTP ${status}`));
    }

    const login = loginResponseSchema.safeParse(body);
    if (!login.success || login.data.status !== 1) {
      return providerFailure(
        'invalid_credentials',
        login.success && login.data.message ? login.data.message : 'cPanel login failed',
      );
    }

    const cookie = /cpsession=([^;]+)/.exec(headers.get('set-cookie') ?? '')?.[1];
    if (!login.data.security_token || !cookie) {
      return providerFailure('remote_rejected', 'cPanel login did not return a session');
    }

    const session: CpanelSession = { securityToken: login.data.security_token, cookie };
    await this.tokenCache.set(this.sessionKey, JSON.stringify(session), SESSION_TTL_SECONDS);
    this.log.debug({ host: this.host }, 'cPanel session established');
    return ok(session);
  }

  private async uapi(
    module: string,
    fn: string,
    params: Record<string, string>,
    isRetry = false,
  ): Promise<ProviderResult<unknown>> {
    const session = await this.session();
    if (!session.ok) {
      return session;
    }

    const response = await this.http.request({
      method: 'POST',
      url: `${this.baseUrl}${session.value.securityToken}/execute/${module}/${fn}`,
      headers: { Cookie: `cpsession=${session.value.cookie}` },
      form: params,
    });
    if (!response.ok) {
      return response;
    }

    const { status, body } = response.value;
    if (status === 401) {
      await this.tokenCache.delete(this.sessionKey);
      if (!isRetry) {
        return this.uapi(module, fn, params, true);
      }
      return providerFailure('invalid_credentials', 'cPanel session was rejected', status);
    }
    if (status >= 400) {
      return err(errorFromStatus(status, `cPanel ${module}/${fn} failed with HTTP ${status}`));
    }

    const envelope = uapiEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      return providerFailure('remote_rejected', `Unexpected response from cPanel ${module}/${fn}`);
    }
    if (envelope.data.status !== 1) {
      const message = envelope.data.errors?.join('; ') || `cPanel ${module}/${fn} failed`;
      this.log.warn({ module, fn, message }, 'UAPI call rejected');
      return err(errorFromMessage(message));
    }

    return ok(envelope.data.data);
  }
}
