import type { DnsRecordInstruction, MailServerSettings, Result } from '@mailhost/common';

export type ProviderErrorKind =
  | 'missing_params'
  | 'invalid_credentials'
  | 'not_configured'
  | 'remote_unreachable'
  | 'remote_rejected'
  | 'already_exists'
  | 'not_found'
  | 'rate_limited';

export interface ProviderError {
  kind: ProviderErrorKind;
  message: string;
  status?: number;
}

export type ProviderResult<T> = Result<T, ProviderError>;

export interface CreateMailboxInput {
  username: string;
  domain: string;
  password: string;
  /** 0 means unlimited. */
  quotaMb: number;
  displayName?: string;
}

export interface CreatedMailbox {
  emailAddress: string;
  externalId: string;
  quotaMb: number;
}

export interface MailboxInfo {
  emailAddress: string;
  quotaMb: number;
  diskUsedMb: number;
  suspended: boolean;
  displayName?: string;
  diskUsedPercent?: number;
}

/** The slice of an account the connection helpers need. */
export interface MailboxRef {
  emailAddress: string;
  domain: string;
}

/**
 * Uniform contract over the supported mailbox backends. Implementations hold no
 * per-account state; everything that identifies a mailbox is passed in.
 */
export interface EmailProvider {
  readonly id: string;
  readonly title: string;
  readonly description: string;

  isEnabled(): boolean;
  isSetup(): boolean;
  /** Required configuration keys that are currently empty. */
  getMissingSettings(): string[];

  createEmailAccount(input: CreateMailboxInput): Promise<ProviderResult<CreatedMailbox>>;
  deleteEmailAccount(emailAddress: string): Promise<ProviderResult<void>>;
  changePassword(emailAddress: string, newPassword: string): Promise<ProviderResult<void>>;
  getAccountInfo(emailAddress: string): Promise<ProviderResult<MailboxInfo>>;
  testConnection(): Promise<ProviderResult<void>>;

  getWebmailUrl(mailbox: MailboxRef): string;
  getImapSettings(mailbox: MailboxRef): MailServerSettings;
  getSmtpSettings(mailbox: MailboxRef): MailServerSettings;
  getDnsInstructions(domain: string): DnsRecordInstruction[];
}
