import { describe, expect, it } from 'vitest';

import { paginate } from '../src/schemas/pagination.js';
import { domainNameSchema, emailAddressSchema, splitEmailAddress } from '../src/schemas/email-accounts.js';

describe('splitEmailAddress', () => {
  it('splits the local part from the domain', () => {
    expect(splitEmailAddress('info@example.com')).toEqual({ username: 'info', domain: 'example.com' });
  });

  it.each(['no-at-sign', '@example.com', 'info@', 'a@b@c.com'])('rejects %s', (value) => {
    expect(splitEmailAddress(value)).toBeNull();
  });
});

describe('address schemas', () => {
  it('normalizes addresses to lower case', () => {
    expect(emailAddressSchema.parse('  Info@Example.COM ')).toBe('info@example.com');
  });

  it('rejects malformed domains', () => {
    expect(domainNameSchema.safeParse('localhost').success).toBe(false);
    expect(domainNameSchema.parse('Mail.Example.com')).toBe('mail.example.com');
  });
});

describe('paginate', () => {
  it('slices the requested page', () => {
    const page = paginate([1, 2, 3, 4, 5], { page: 2, pageSize: 2 });
    expect(page).toEqual({ items: [3, 4], total: 5, page: 2, pageSize: 2, pageCount: 3 });
  });
});
