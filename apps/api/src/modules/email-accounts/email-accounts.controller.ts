import { paginate } from '@mailhost/common';
import type { Request, Response } from 'express';

import {
  BadGatewayError,
  BadRequestError,
  ConflictError,
  ForbiddenError,
  HttpError,
  NotFoundError,
} from '../../shared/errors.js';
import { asyncHandler } from '../../shared/http/async-handler.js';
import {
  accountParamsSchema,
  changePasswordBodySchema,
  createAccountBodySchema,
  customerParamsSchema,
  dnsQuerySchema,
  listAccountsQuerySchema,
  membershipParamsSchema,
  providerParamsSchema,
  quotaQuerySchema,
  revealPasswordBodySchema,
} from './email-accounts.schemas.js';
import type { EmailAccountError, EmailAccountResult, EmailAccountsService } from './email-accounts.service.js';

export const toHttpError = (error: EmailAccountError): HttpError => {
  switch (error.code) {
    case 'quota_exceeded':
    case 'feature_disabled':
      return new ForbiddenError(error.message, { code: error.code });
    case 'not_found':
    case 'token_not_found':
      return new NotFoundError(error.message, { code: error.code });
    case 'email_exists':
    case 'account_busy':
      return new ConflictError(error.message, { code: error.code });
    case 'provider_error':
      // Provider payloads stay in the logs
      return new BadGatewayError(error.message, { code: error.code, kind: error.providerError?.kind });
    default:
      return new BadRequestError(error.message, { code: error.code });
  }
};

const unwrap = <T>(result: EmailAccountResult<T>): T => {
  if (!result.ok) {
    throw toHttpError(result.error);
  }
  return result.value;
};

export const createEmailAccountsController = (service: EmailAccountsService) => ({
  listProviders: asyncHandler(async (req: Request, res: Response) => {
    const availableOnly = req.query.available === 'true';
    res.json({ items: availableOnly ? service.listAvailableProviders() : service.listProviders() });
  }),

  getDnsInstructions: asyncHandler(async (req: Request, res: Response) => {
    const { providerId } = providerParamsSchema.parse(req.params);
    const { domain } = dnsQuerySchema.parse(req.query);
    res.json({ domain, records: unwrap(service.getDnsInstructions(providerId, domain)) });
  }),

  testProviderConnection: asyncHandler(async (req: Request, res: Response) => {
    const { providerId } = providerParamsSchema.parse(req.params);
    unwrap(await service.testProviderConnection(providerId));
    res.json({ ok: true });
  }),

  getQuota: asyncHandler(async (req: Request, res: Response) => {
    const { customerId, membershipId } = quotaQuerySchema.parse(req.query);
    const summary = await service.getQuotaSummary(customerId, membershipId ?? null);
    res.json({ ...summary, ...service.getPurchaseOptions() });
  }),

  listAccounts: asyncHandler(async (req: Request, res: Response) => {
    const { page, pageSize, ...filter } = listAccountsQuerySchema.parse(req.query);
    const accounts = await service.listAccounts(filter);
    res.json(paginate(accounts, { page, pageSize }));
  }),

  createAccount: asyncHandler(async (req: Request, res: Response) => {
    const body = createAccountBodySchema.parse(req.body);
    const account = unwrap(await service.createAccount(body));
    res.status(202).json(account);
  }),

  getAccount: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    res.json(unwrap(await service.getAccount(accountId)));
  }),

  deleteAccount: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    unwrap(await service.deleteAccount(accountId));
    res.status(204).send();
  }),

  suspendAccount: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    res.json(unwrap(await service.suspendAccount(accountId)));
  }),

  reactivateAccount: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    res.json(unwrap(await service.reactivateAccount(accountId)));
  }),

  retryProvisioning: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    res.status(202).json(unwrap(await service.retryProvisioning(accountId)));
  }),

  changePassword: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const { password } = changePasswordBodySchema.parse(req.body);
    const change = unwrap(await service.changePassword(accountId, password));
    res.json({ passwordDisplayToken: change.passwordDisplayToken });
  }),

  revealPassword: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const { token } = revealPasswordBodySchema.parse(req.body);
    const password = unwrap(await service.revealPassword(accountId, token));
    res.set('Cache-Control', 'no-store').json({ password });
  }),

  getAccountInfo: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    res.json(unwrap(await service.getAccountInfo(accountId)));
  }),

  getConnectionSettings: asyncHandler(async (req: Request, res: Response) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    res.json(unwrap(await service.getConnectionSettings(accountId)));
  }),

  handleCustomerDeleted: asyncHandler(async (req: Request, res: Response) => {
    const { customerId } = customerParamsSchema.parse(req.params);
    const removed = await service.handleCustomerDeleted(customerId);
    res.json({ removed });
  }),

  handleMembershipDeleted: asyncHandler(async (req: Request, res: Response) => {
    const { membershipId } = membershipParamsSchema.parse(req.params);
    const removed = await service.handleMembershipDeleted(membershipId);
    res.json({ removed });
  }),
});
