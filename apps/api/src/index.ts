import { createServer } from 'http';

import { createApp } from './app.js';
import { env } from './config/env.js';
import { closeMongoClient } from './config/mongo.js';
import { closeRedis } from './config/redis.js';
import { logger } from './core/logger/index.js';
import { createEmailAccountsModule } from './modules/email-accounts/email-accounts.module.js';

const port = env.PORT;

const emailAccountsModule = await createEmailAccountsModule();
const server = createServer(createApp(emailAccountsModule));

server.listen(port, () => {
  const baseUrl = env.API_BASE_URL ?? `http://localhost:${port}`;
  logger.info({ baseUrl, port }, 'API server started');
});

const closeResources = async () => {
  await emailAccountsModule.close();
  logger.info('Job dispatcher closed');
  await closeRedis();
  await closeMongoClient();
  logger.info('MongoDB client closed');
};

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Received shutdown signal');

  server.close((err?: Error) => {
    if (err) {
      logger.error({ err }, 'Error during server shutdown');
      process.exitCode = 1;
    }
    logger.info('Server closed');
    closeResources()
      .then(() => {
        process.exit();
      })
      .catch((closeErr: unknown) => {
        logger.error({ err: closeErr }, 'Failed to release resources');
        process.exit(1);
      });
  });
};

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.on(signal, () => shutdown(signal));
});
