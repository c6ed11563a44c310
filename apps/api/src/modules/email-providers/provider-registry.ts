import type { ProviderSummary } from '@mailhost/common';

import type { ProviderDependencies } from './base-email-provider.js';
import type { EmailProvider } from './email-provider.js';

export type ProviderFactory = (dependencies: ProviderDependencies) => EmailProvider;

/**
 * Explicit id → factory table. Adapters are built lazily, once, and shared by every
 * caller; they hold no per-account state.
 */
export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();
  private readonly instances = new Map<string, EmailProvider>();

  constructor(private readonly dependencies: ProviderDependencies) {}

  register(id: string, factory: ProviderFactory): this {
    if (this.factories.has(id)) {
      throw new Error(`Email provider already registered: ${id}`);
    }
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  get(id: string): EmailProvider | null {
    const existing = this.instances.get(id);
    if (existing) {
      return existing;
    }

    const factory = this.factories.get(id);
    if (!factory) {
      return null;
    }

    const provider = factory(this.dependencies);
    this.instances.set(id, provider);
    return provider;
  }

  /** Registered, enabled and fully configured. */
  getAvailable(id: string): EmailProvider | null {
    const provider = this.get(id);
    return provider && isAvailable(provider) ? provider : null;
  }

  list(): EmailProvider[] {
    return [...this.factories.keys()].flatMap((id) => {
      const provider = this.get(id);
      return provider ? [provider] : [];
    });
  }

  listAvailable(): EmailProvider[] {
    return this.list().filter(isAvailable);
  }

  summaries(): ProviderSummary[] {
    return this.list().map(toProviderSummary);
  }
}

export const isAvailable = (provider: EmailProvider): boolean => provider.isEnabled() && provider.isSetup();

export const toProviderSummary = (provider: EmailProvider): ProviderSummary => ({
  id: provider.id,
  title: provider.title,
  description: provider.description,
  enabled: provider.isEnabled(),
  setup: provider.isSetup(),
  missingSettings: provider.getMissingSettings(),
});
