import { Router } from 'express';
import os from 'os';

import type { EmailAccountsService } from '../modules/email-accounts/email-accounts.service.js';

export const createHealthRouter = (emailAccounts: EmailAccountsService) => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      hostname: os.hostname(),
      uptime: process.uptime(),
      providers: emailAccounts.listAvailableProviders().map((provider) => provider.id),
    });
  });

  return router;
};
