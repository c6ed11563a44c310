import { Router } from 'express';

import { createEmailAccountsController } from './email-accounts.controller.js';
import type { EmailAccountsService } from './email-accounts.service.js';

export const createEmailAccountsRouter = (service: EmailAccountsService) => {
  const router = Router();
  const controller = createEmailAccountsController(service);

  router.get('/providers', controller.listProviders);
  router.get('/providers/:providerId/dns', controller.getDnsInstructions);
  router.post('/providers/:providerId/test', controller.testProviderConnection);
  router.get('/quota', controller.getQuota);

  router.delete('/owners/customers/:customerId', controller.handleCustomerDeleted);
  router.delete('/owners/memberships/:membershipId', controller.handleMembershipDeleted);

  router.get('/', controller.listAccounts);
  router.post('/', controller.createAccount);
  router.get('/:accountId', controller.getAccount);
  router.delete('/:accountId', controller.deleteAccount);
  router.post('/:accountId/suspend', controller.suspendAccount);
  router.post('/:accountId/reactivate', controller.reactivateAccount);
  router.post('/:accountId/retry', controller.retryProvisioning);
  router.post('/:accountId/password', controller.changePassword);
  router.post('/:accountId/password/reveal', controller.revealPassword);
  router.get('/:accountId/info', controller.getAccountInfo);
  router.get('/:accountId/settings', controller.getConnectionSettings);

  return router;
};
