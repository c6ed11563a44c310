export type EmailAccountStatus = 'pending' | 'provisioning' | 'active' | 'suspended' | 'failed';

export type PurchaseType = 'membership_included' | 'per_account_purchase';

export type DnsRecordType = 'MX' | 'TXT' | 'CNAME' | 'A';

export interface DnsRecordInstruction {
  type: DnsRecordType;
  name: string;
  value: string;
  priority?: number;
  description: string;
}

export type MailSecurity = 'SSL/TLS' | 'STARTTLS';

export interface MailServerSettings {
  server: string;
  port: number;
  security: MailSecurity;
  username: string;
}

export interface ConnectionSettings {
  webmailUrl: string;
  imap: MailServerSettings;
  smtp: MailServerSettings;
}

export type RemainingSlots = number | 'unlimited';

export interface QuotaSummary {
  canCreate: boolean;
  remaining: RemainingSlots;
  current: number;
}

export interface ProviderSummary {
  id: string;
  title: string;
  description: string;
  enabled: boolean;
  setup: boolean;
  missingSettings: string[];
}
