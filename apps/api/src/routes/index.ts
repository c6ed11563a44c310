import { Router } from 'express';

import type { EmailAccountsModule } from '../modules/email-accounts/email-accounts.module.js';
import { createHealthRouter } from './health.js';

export function createApiRouter(emailAccountsModule: EmailAccountsModule): Router {
  const router = Router();

  router.use('/health', createHealthRouter(emailAccountsModule.service));
  router.use('/email-accounts', emailAccountsModule.router);

  return router;
}
