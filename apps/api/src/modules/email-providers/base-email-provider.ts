import type { DnsRecordInstruction, Failure, MailServerSettings } from '@mailhost/common';

import type { TtlCache } from '../../core/cache/ttl-cache.js';
import { componentLogger, type Logger } from '../../core/logger/index.js';
import type {
  CreateMailboxInput,
  CreatedMailbox,
  EmailProvider,
  MailboxInfo,
  MailboxRef,
  ProviderError,
  ProviderResult,
} from './email-provider.js';
import { providerFailure } from './provider-errors.js';
import { PROVIDER_TIMEOUT_MS, ProviderHttpClient, type FetchLike } from './provider-http.js';

/** Shared by every adapter the registry builds. */
export interface ProviderDependencies {
  tokenCache: TtlCache;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export interface ProviderOptions<TConfig> extends ProviderDependencies {
  config: TConfig;
  enabled: boolean;
}

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && value.trim().length === 0);

export abstract class BaseEmailProvider<TConfig extends object> implements EmailProvider {
  abstract readonly id: string;
  abstract readonly title: string;
  abstract readonly description: string;

  protected abstract readonly requiredSettings: ReadonlyArray<keyof TConfig & string>;

  protected readonly config: TConfig;
  protected readonly tokenCache: TtlCache;
  protected readonly http: ProviderHttpClient;
  protected readonly timeoutMs: number;
  private readonly enabled: boolean;
  private logger: Logger | undefined;

  constructor(options: ProviderOptions<TConfig>) {
    this.config = options.config;
    this.enabled = options.enabled;
    this.tokenCache = options.tokenCache;
    this.timeoutMs = options.timeoutMs ?? PROVIDER_TIMEOUT_MS;
    this.http = new ProviderHttpClient(options.fetch, this.timeoutMs);
  }

  protected get log(): Logger {
    this.logger ??= componentLogger(`email-provider:${this.id}`);
    return this.logger;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getMissingSettings(): string[] {
    return this.requiredSettings.filter((key) => isBlank(this.config[key]));
  }

  isSetup(): boolean {
    return this.getMissingSettings().length === 0;
  }

  /** Checked before any remote call; a mailbox needs a username, domain and password. */
  protected missingMailboxParams(input: CreateMailboxInput): Failure<ProviderError> | null {
    const missing = (['username', 'domain', 'password'] as const).filter((key) => isBlank(input[key]));
    return missing.length > 0 ? providerFailure('missing_params', `Missing mailbox parameters: ${missing.join(', ')}`) : null;
  }

  abstract createEmailAccount(input: CreateMailboxInput): Promise<ProviderResult<CreatedMailbox>>;
  abstract deleteEmailAccount(emailAddress: string): Promise<ProviderResult<void>>;
  abstract changePassword(emailAddress: string, newPassword: string): Promise<ProviderResult<void>>;
  abstract getAccountInfo(emailAddress: string): Promise<ProviderResult<MailboxInfo>>;
  abstract testConnection(): Promise<ProviderResult<void>>;
  abstract getWebmailUrl(mailbox: MailboxRef): string;
  abstract getImapSettings(mailbox: MailboxRef): MailServerSettings;
  abstract getSmtpSettings(mailbox: MailboxRef): MailServerSettings;
  abstract getDnsInstructions(domain: string): DnsRecordInstruction[];
}
