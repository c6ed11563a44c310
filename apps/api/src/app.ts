import cors from 'cors';
import express, { type Request } from 'express';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';

import { env } from './config/env.js';
import { errorHandler } from './core/middleware/error-handler.js';
import { notFoundHandler } from './core/middleware/not-found.js';
import { requestId } from './core/middleware/request-id.js';
import { logger } from './core/logger/index.js';
import type { EmailAccountsModule } from './modules/email-accounts/email-accounts.module.js';
import { createApiRouter } from './routes/index.js';

export const createApp = (emailAccountsModule: EmailAccountsModule) => {
  const app = express();

  app.set('trust proxy', 1);

  app.use(
    cors({
      origin: true,
      credentials: true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'X-Request-Id'],
    }),
  );
  app.use(helmet());
  app.use(express.json({ limit: '100kb' }));
  app.use(requestId);
  app.use(
    pinoHttp({
      logger,
      quietReqLogger: env.NODE_ENV === 'test',
      customProps: (req: Request) => ({ requestId: req.id }),
    }),
  );

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createApiRouter(emailAccountsModule));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
