import { domainNameSchema, emailAccountStatusSchema, paginationQuerySchema, purchaseTypeSchema } from '@mailhost/common';
import { z } from 'zod';

const id = z.string().trim().min(1).max(128);
const password = z.string().min(8).max(128);

export const accountParamsSchema = z.object({ accountId: id });

export const providerParamsSchema = z.object({ providerId: id });

export const customerParamsSchema = z.object({ customerId: id });

export const membershipParamsSchema = z.object({ membershipId: id });

export const createAccountBodySchema = z.object({
  customerId: id,
  membershipId: id.nullish(),
  siteId: id.nullish(),
  // Syntax is checked by the service so it can answer with invalid_email
  emailAddress: z.string().max(254),
  domain: z.string().max(253).optional(),
  provider: id,
  password: password.optional(),
  quotaMb: z.number().int().nonnegative().optional(),
  purchaseType: purchaseTypeSchema.optional(),
  paymentId: id.nullish(),
});

export const listAccountsQuerySchema = paginationQuerySchema.extend({
  customerId: id.optional(),
  membershipId: id.optional(),
  siteId: id.optional(),
  provider: id.optional(),
  status: emailAccountStatusSchema.optional(),
});

export const quotaQuerySchema = z.object({
  customerId: id,
  membershipId: id.optional(),
});

export const dnsQuerySchema = z.object({ domain: domainNameSchema });

export const changePasswordBodySchema = z.object({ password: password.optional() }).default({});

export const revealPasswordBodySchema = z.object({ token: z.string().min(1).max(256) });

export type CreateAccountBody = z.infer<typeof createAccountBodySchema>;
export type ListAccountsQuery = z.infer<typeof listAccountsQuerySchema>;
