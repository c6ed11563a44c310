import { env } from '../../config/env.js';
import { createRedisConnection, getRedis } from '../../config/redis.js';
import { RedisTtlCache } from '../../core/cache/redis-ttl-cache.js';
import { MemoryTtlCache, type TtlCache } from '../../core/cache/ttl-cache.js';
import { BullMqJobDispatcher } from '../../core/jobs/bullmq-dispatcher.js';
import { InProcessJobDispatcher, type JobDispatcher } from '../../core/jobs/job-dispatcher.js';
import { logger } from '../../core/logger/index.js';
import { buildEmailProvidersConfig } from '../email-providers/email-providers.config.js';
import { ProviderRegistry } from '../email-providers/provider-registry.js';
import { registerBuiltInProviders } from '../email-providers/register-providers.js';
import { EmailAccountEvents } from './email-account-events.js';
import { MongoEmailAccountRepository } from './email-account.mongo-repository.js';
import type { EmailAccountRepository } from './email-account.repository.js';
import type { EmailAccountJobs } from './email-accounts.jobs.js';
import { createEmailAccountsRouter } from './email-accounts.router.js';
import { EmailAccountsService } from './email-accounts.service.js';
import { StaticEmailSettingsProvider, settingsFromEnvironment, type EmailSettingsProvider } from './email-accounts.settings.js';
import {
  MongoCustomerDirectory,
  MongoMembershipDirectory,
  type CustomerDirectory,
  type MembershipDirectory,
} from './host-directory.js';
import { createPasswordCipher, PasswordTokenStore } from './password-token.store.js';
import { RepositoryQuotaOracle } from './quota-oracle.js';
import { QuotaService } from './quota.service.js';

/** Collaborators a host application or a test may supply instead of the defaults. */
export interface EmailAccountsModuleOverrides {
  repository?: EmailAccountRepository;
  customers?: CustomerDirectory;
  memberships?: MembershipDirectory;
  settings?: EmailSettingsProvider;
  cache?: TtlCache;
  jobs?: JobDispatcher<EmailAccountJobs>;
  providers?: ProviderRegistry;
  events?: EmailAccountEvents;
}

export async function createEmailAccountsModule(overrides: EmailAccountsModuleOverrides = {}) {
  const redisUrl = env.REDIS_URL;

  const cache = overrides.cache ?? (redisUrl ? new RedisTtlCache(getRedis(redisUrl)) : new MemoryTtlCache());
  // BullMQ workers block on their connection, so the dispatcher gets its own
  const jobs =
    overrides.jobs ??
    (redisUrl
      ? new BullMqJobDispatcher<EmailAccountJobs>(createRedisConnection(redisUrl))
      : new InProcessJobDispatcher<EmailAccountJobs>());

  if (!redisUrl && (!overrides.cache || !overrides.jobs)) {
    logger.warn('REDIS_URL is not set; email account jobs and tokens stay in this process');
  }

  const repository = overrides.repository ?? new MongoEmailAccountRepository();
  const settings = overrides.settings ?? new StaticEmailSettingsProvider(settingsFromEnvironment(env));
  const providers =
    overrides.providers ??
    registerBuiltInProviders(new ProviderRegistry({ tokenCache: cache }), buildEmailProvidersConfig(env));
  const events = overrides.events ?? new EmailAccountEvents();

  const quota = new QuotaService(
    new RepositoryQuotaOracle(repository, overrides.memberships ?? new MongoMembershipDirectory()),
    settings,
  );

  const service = new EmailAccountsService({
    repository,
    providers,
    quota,
    passwordTokens: new PasswordTokenStore(cache, createPasswordCipher(env.SITE_SECRET)),
    cache,
    jobs,
    customers: overrides.customers ?? new MongoCustomerDirectory(),
    settings,
    events,
  });
  service.registerJobHandlers();

  return {
    router: createEmailAccountsRouter(service),
    service,
    events,
    close: async () => {
      await jobs.close();
      events.removeAllListeners();
    },
  };
}

export type EmailAccountsModule = Awaited<ReturnType<typeof createEmailAccountsModule>>;
