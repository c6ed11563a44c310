import { err, ok, type DnsRecordInstruction, type MailServerSettings } from '@mailhost/common';
import { z } from 'zod';

import { BaseEmailProvider } from '../base-email-provider.js';
import type {
  CreateMailboxInput,
  CreatedMailbox,
  MailboxInfo,
  MailboxRef,
  ProviderResult,
} from '../email-provider.js';
import { errorFromMessage, errorFromStatus, notConfigured } from '../provider-errors.js';

export interface PurelymailConfig {
  apiKey?: string;
}

const API_BASE_URL = 'https://purelymail.com/api/v0';

const envelopeSchema = z.object({
  success: z.boolean().optional(),
  type: z.string().optional(),
  message: z.string().optional(),
  result: z.unknown().optional(),
});

const userSchema = z
  .object({
    userName: z.string().optional(),
    displayName: z.string().optional(),
  })
  .passthrough();

export class PurelymailProvider extends BaseEmailProvider<PurelymailConfig> {
  readonly id = 'purelymail';
  readonly title = 'Purelymail';
  readonly description = 'Low-cost hosted mailboxes managed through the Purelymail API.';
  protected readonly requiredSettings = ['apiKey'] as const;

  async createEmailAccount(input: CreateMailboxInput): Promise<ProviderResult<CreatedMailbox>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const invalid = this.missingMailboxParams(input);
    if (invalid) {
      return invalid;
    }

    await this.ensureDomain(input.domain);

    const emailAddress = `${input.username}@${input.domain}`;
    const result = await this.call('createUser', {
      userName: emailAddress,
      password: input.password,
      enablePasswordReset: false,
    });
    if (!result.ok) {
      return result;
    }

    // Purelymail does not enforce per-mailbox quotas
    return ok({ emailAddress, externalId: emailAddress, quotaMb: 0 });
  }

  async deleteEmailAccount(emailAddress: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.call('deleteUser', { userName: emailAddress });
    return result.ok ? ok(undefined) : result;
  }

  async changePassword(emailAddress: string, newPassword: string): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.call('modifyUser', { userName: emailAddress, newPassword });
    return result.ok ? ok(undefined) : result;
  }

  async getAccountInfo(emailAddress: string): Promise<ProviderResult<MailboxInfo>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.call('getUser', { userName: emailAddress });
    if (!result.ok) {
      return result;
    }

    const user = userSchema.safeParse(result.value ?? {});
    const displayName = user.success ? user.data.displayName : undefined;

    return ok({
      emailAddress,
      quotaMb: 0,
      diskUsedMb: 0,
      suspended: false,
      ...(displayName ? { displayName } : {}),
    });
  }

  async testConnection(): Promise<ProviderResult<void>> {
    if (!this.isSetup()) {
      return notConfigured(this.title);
    }
    const result = await this.call('listDomainNames', {});
    return result.ok ? ok(undefined) : result;
  }

  getWebmailUrl(): string {
    return 'https://app.purelymail.com/';
  }

  getImapSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: 'imap.purelymail.com', port: 993, security: 'SSL/TLS', username: mailbox.emailAddress };
  }

  getSmtpSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: 'smtp.purelymail.com', port: 587, security: 'STARTTLS', username: mailbox.emailAddress };
  }

  getDnsInstructions(domain: string): DnsRecordInstruction[] {
    return [
      {
        type: 'MX',
        name: '@',
        value: 'mailserver.purelymail.com',
        priority: 10,
        description: 'Delivers incoming mail to Purelymail.',
      },
      {
        type: 'TXT',
        name: '@',
        value: 'v=spf1 include:_spf.purelymail.com ~all',
        description: 'SPF record allowing Purelymail to send for this domain.',
      },
      {
        type: 'CNAME',
        name: 'purelymail._domainkey',
        value: 'key1._domainkey.purelymail.com',
        description: 'DKIM signing key.',
      },
      {
        type: 'TXT',
        name: '_dmarc',
        value: `v=DMARC1; p=quarantine; rua=mailto:dmarc@${domain}`,
        description: 'DMARC policy with aggregate reports.',
      },
    ];
  }

  /**
   * Registers the domain with the account before the first mailbox is created on it.
   * Failures are logged only; the mailbox call reports anything that actually blocks.
   */
  private async ensureDomain(domain: string): Promise<void> {
    const result = await this.call('addDomainName', { domainName: domain });
    if (result.ok) {
      this.log.info({ domain }, 'Domain added to Purelymail');
      return;
    }
    if (/already/i.test(result.error.message)) {
      return;
    }
    this.log.warn({ domain, kind: result.error.kind, message: result.error.message }, 'Could not add domain');
  }

  private async call(endpoint: string, payload: Record<string, unknown>): Promise<ProviderResult<unknown>> {
    const response = await this.http.request({
      method: 'POST',
      url: `${API_BASE_URL}/${endpoint}`,
      headers: { 'Purelymail-Api-Key': this.config.apiKey ?? '' },
      json: payload,
    });
    if (!response.ok) {
      return response;
    }

    const { status, body } = response.value;
    const envelope = envelopeSchema.safeParse(body);
    const message = envelope.success ? envelope.data.message : undefined;

    if (status >= 400) {
      return err(errorFromStatus(status, message ?? `Purelymail ${endpoint} failed with HTTP ${status}`));
    }
    if (!envelope.success) {
      return err(errorFromMessage(`Unexpected response from Purelymail ${endpoint}`));
    }
    if (envelope.data.success === false || envelope.data.type === 'error') {
      return err(errorFromMessage(message ?? `Purelymail ${endpoint} failed`));
    }

    return ok(envelope.data.result);
  }
}
