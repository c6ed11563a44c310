import type { Environment } from '../../config/env.js';
import type { CpanelConfig } from './providers/cpanel.provider.js';
import type { GoogleWorkspaceConfig } from './providers/google-workspace.provider.js';
import type { Microsoft365Config } from './providers/microsoft365.provider.js';
import type { PurelymailConfig } from './providers/purelymail.provider.js';

export interface EmailProvidersConfig {
  /** Provider ids switched on by the operator. */
  enabled: string[];
  cpanel: CpanelConfig;
  purelymail: PurelymailConfig;
  microsoft365: Microsoft365Config;
  googleWorkspace: GoogleWorkspaceConfig;
}

type ProviderEnvironment = Pick<
  Environment,
  | 'EMAIL_PROVIDERS_ENABLED'
  | 'CPANEL_HOST'
  | 'CPANEL_USERNAME'
  | 'CPANEL_PASSWORD'
  | 'CPANEL_PORT'
  | 'PURELYMAIL_API_KEY'
  | 'MS365_TENANT_ID'
  | 'MS365_CLIENT_ID'
  | 'MS365_CLIENT_SECRET'
  | 'MS365_LICENSE_SKU'
  | 'GOOGLE_SERVICE_ACCOUNT_JSON'
  | 'GOOGLE_ADMIN_EMAIL'
  | 'GOOGLE_CUSTOMER_ID'
>;

export const buildEmailProvidersConfig = (environment: ProviderEnvironment): EmailProvidersConfig => ({
  enabled: environment.EMAIL_PROVIDERS_ENABLED,
  cpanel: {
    host: environment.CPANEL_HOST,
    username: environment.CPANEL_USERNAME,
    password: environment.CPANEL_PASSWORD,
    port: environment.CPANEL_PORT,
  },
  purelymail: {
    apiKey: environment.PURELYMAIL_API_KEY,
  },
  microsoft365: {
    tenantId: environment.MS365_TENANT_ID,
    clientId: environment.MS365_CLIENT_ID,
    clientSecret: environment.MS365_CLIENT_SECRET,
    licenseSku: environment.MS365_LICENSE_SKU,
  },
  googleWorkspace: {
    serviceAccount: environment.GOOGLE_SERVICE_ACCOUNT_JSON,
    adminEmail: environment.GOOGLE_ADMIN_EMAIL,
    customerId: environment.GOOGLE_CUSTOMER_ID,
  },
});
