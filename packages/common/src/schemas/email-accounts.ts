import { z } from 'zod';

export const emailAccountStatusSchema = z.enum(['pending', 'provisioning', 'active', 'suspended', 'failed']);

export const purchaseTypeSchema = z.enum(['membership_included', 'per_account_purchase']);

export const emailAddressSchema = z.string().trim().toLowerCase().email();

export const domainNameSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(3)
  .regex(/^(?!-)[a-z0-9-]+(\.[a-z0-9-]+)+$/, 'Invalid domain name');

/**
 * Splits `local@domain`. Returns null unless there is exactly one `@` with text on both sides.
 */
export const splitEmailAddress = (emailAddress: string): { username: string; domain: string } | null => {
  const parts = emailAddress.split('@');
  if (parts.length !== 2) {
    return null;
  }
  const [username, domain] = parts;
  if (!username || !domain) {
    return null;
  }
  return { username, domain };
};
