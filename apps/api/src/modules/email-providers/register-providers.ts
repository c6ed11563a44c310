import type { EmailProvidersConfig } from './email-providers.config.js';
import type { ProviderRegistry } from './provider-registry.js';
import { CpanelProvider } from './providers/cpanel.provider.js';
import { GoogleWorkspaceProvider } from './providers/google-workspace.provider.js';
import { Microsoft365Provider } from './providers/microsoft365.provider.js';
import { PurelymailProvider } from './providers/purelymail.provider.js';

export const registerBuiltInProviders = (registry: ProviderRegistry, config: EmailProvidersConfig): ProviderRegistry => {
  const enabled = (id: string) => config.enabled.includes(id);

  return registry
    .register('cpanel', (deps) => new CpanelProvider({ ...deps, config: config.cpanel, enabled: enabled('cpanel') }))
    .register(
      'purelymail',
      (deps) => new PurelymailProvider({ ...deps, config: config.purelymail, enabled: enabled('purelymail') }),
    )
    .register(
      'microsoft365',
      (deps) => new Microsoft365Provider({ ...deps, config: config.microsoft365, enabled: enabled('microsoft365') }),
    )
    .register(
      'google_workspace',
      (deps) =>
        new GoogleWorkspaceProvider({ ...deps, config: config.googleWorkspace, enabled: enabled('google_workspace') }),
    );
};
