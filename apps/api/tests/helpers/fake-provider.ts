import { ok, type DnsRecordInstruction, type MailServerSettings } from '@mailhost/common';
import { vi } from 'vitest';

import type {
  CreateMailboxInput,
  CreatedMailbox,
  EmailProvider,
  MailboxInfo,
  MailboxRef,
  ProviderResult,
} from '../../src/modules/email-providers/email-provider.js';

/**
 * Scriptable provider: every remote operation is a vi.fn that succeeds by default.
 */
export class FakeEmailProvider implements EmailProvider {
  readonly title = 'Fake Mail';
  readonly description = 'Test double';
  enabled = true;
  setup = true;

  readonly createEmailAccount = vi.fn(
    async (input: CreateMailboxInput): Promise<ProviderResult<CreatedMailbox>> =>
      ok({
        emailAddress: `${input.username}@${input.domain}`,
        externalId: `ext-${input.username}`,
        quotaMb: input.quotaMb,
      }),
  );

  readonly deleteEmailAccount = vi.fn(async (_emailAddress: string): Promise<ProviderResult<void>> => ok(undefined));

  readonly changePassword = vi.fn(
    async (_emailAddress: string, _newPassword: string): Promise<ProviderResult<void>> => ok(undefined),
  );

  readonly getAccountInfo = vi.fn(
    async (emailAddress: string): Promise<ProviderResult<MailboxInfo>> =>
      ok({ emailAddress, quotaMb: 1024, diskUsedMb: 12, suspended: false }),
  );

  readonly testConnection = vi.fn(async (): Promise<ProviderResult<void>> => ok(undefined));

  constructor(readonly id = 'fake') {}

  isEnabled(): boolean {
    return this.enabled;
  }

  isSetup(): boolean {
    return this.setup;
  }

  getMissingSettings(): string[] {
    return this.setup ? [] : ['apiKey'];
  }

  getWebmailUrl(): string {
    return 'https://webmail.fake.test/';
  }

  getImapSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: `imap.${mailbox.domain}`, port: 993, security: 'SSL/TLS', username: mailbox.emailAddress };
  }

  getSmtpSettings(mailbox: MailboxRef): MailServerSettings {
    return { server: `smtp.${mailbox.domain}`, port: 587, security: 'STARTTLS', username: mailbox.emailAddress };
  }

  getDnsInstructions(domain: string): DnsRecordInstruction[] {
    return [{ type: 'MX', name: '@', value: `mx.${domain}`, priority: 10, description: 'Inbound mail.' }];
  }
}
