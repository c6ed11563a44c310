import { once } from 'events';
import type { AddressInfo } from 'net';

import { err } from '@mailhost/common';
import { afterEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { createApp } from '../../../src/app.js';
import { providerError } from '../../../src/modules/email-providers/provider-errors.js';
import { createEmailAccountsRouter } from '../../../src/modules/email-accounts/email-accounts.router.js';
import { createHarness, CUSTOMER_ID, MEMBERSHIP_ID, type Harness } from '../../helpers/harness.js';

interface ApiResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

const accountSchema = z.object({ id: z.string(), passwordDisplayToken: z.string().nullable() });

const closers: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (closers.length > 0) {
    await closers.pop()?.();
  }
});

const startApi = async (harness: Harness) => {
  const app = createApp({
    router: createEmailAccountsRouter(harness.service),
    service: harness.service,
    events: harness.events,
    close: async () => {},
  });
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  closers.push(
    () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  );

  const { port } = z.custom<AddressInfo>((value) => typeof value === 'object' && value !== null).parse(server.address());

  return async (method: string, path: string, body?: unknown): Promise<ApiResponse> => {
    const response = await fetch(`http://127.0.0.1:${port}/api/email-accounts${path}`, {
      method,
      headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();
    const parsed: unknown = text ? JSON.parse(text) : null;
    return { status: response.status, headers: response.headers, body: parsed };
  };
};

const createBody = {
  customerId: CUSTOMER_ID,
  membershipId: MEMBERSHIP_ID,
  emailAddress: 'info@example.com',
  provider: 'fake',
};

const createActiveAccount = async (harness: Harness, call: Awaited<ReturnType<typeof startApi>>) => {
  const created = await call('POST', '/', createBody);
  await harness.jobs.drain();
  const { id } = accountSchema.parse(created.body);
  return accountSchema.parse((await call('GET', `/${id}`)).body);
};

describe('email accounts routes', () => {
  it('accepts a create request and provisions in the background', async () => {
    const harness = createHarness();
    const call = await startApi(harness);

    const created = await call('POST', '/', createBody);
    expect(created.status).toBe(202);
    expect(created.body).toMatchObject({ emailAddress: 'info@example.com', domain: 'example.com', status: 'pending' });

    await harness.jobs.drain();
    const { id } = accountSchema.parse(created.body);
    const fetched = await call('GET', `/${id}`);

    expect(fetched.status).toBe(200);
    expect(fetched.body).toMatchObject({ status: 'active', externalId: 'ext-info', quotaMb: 1024 });
  });

  it('reveals the generated password exactly once', async () => {
    const harness = createHarness();
    const call = await startApi(harness);
    const account = await createActiveAccount(harness, call);

    const first = await call('POST', `/${account.id}/password/reveal`, { token: account.passwordDisplayToken });
    expect(first.status).toBe(200);
    expect(first.body).toEqual({ password: 'Generated-pass-1' });
    expect(first.headers.get('cache-control')).toBe('no-store');

    const second = await call('POST', `/${account.id}/password/reveal`, { token: account.passwordDisplayToken });
    expect(second.status).toBe(404);
    expect(second.body).toMatchObject({
      message: 'Password is no longer available',
      details: { code: 'token_not_found' },
    });
  });

  it('answers 403 when the membership has no slots left', async () => {
    const harness = createHarness();
    harness.limitations.set(MEMBERSHIP_ID, { enabled: true, limit: false });
    const call = await startApi(harness);

    const response = await call('POST', '/', createBody);

    expect(response.status).toBe(403);
    expect(response.body).toMatchObject({ details: { code: 'quota_exceeded' } });
  });

  it('rejects malformed bodies before reaching the service', async () => {
    const harness = createHarness();
    const call = await startApi(harness);

    const response = await call('POST', '/', { customerId: CUSTOMER_ID, emailAddress: 'info@example.com' });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ message: 'Validation failed' });
    expect(await harness.repository.count()).toBe(0);
  });

  it('reports invalid addresses with their error code', async () => {
    const harness = createHarness();
    const call = await startApi(harness);

    const response = await call('POST', '/', { ...createBody, emailAddress: 'not-an-address' });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ message: 'Email address is not valid', details: { code: 'invalid_email' } });
  });

  it('deletes accounts and queues the remote removal', async () => {
    const harness = createHarness();
    const call = await startApi(harness);
    const account = await createActiveAccount(harness, call);

    const deleted = await call('DELETE', `/${account.id}`);
    await harness.jobs.drain();

    expect(deleted.status).toBe(204);
    expect((await call('GET', `/${account.id}`)).status).toBe(404);
    expect(harness.provider.deleteEmailAccount).toHaveBeenCalledWith('info@example.com');
  });

  it('maps provider failures to 502 without the provider message', async () => {
    const harness = createHarness();
    const call = await startApi(harness);
    const account = await createActiveAccount(harness, call);
    harness.provider.getAccountInfo.mockResolvedValueOnce(err(providerError('remote_unreachable', 'connect ETIMEDOUT')));

    const response = await call('GET', `/${account.id}/info`);

    expect(response.status).toBe(502);
    expect(response.body).toMatchObject({
      message: 'Could not load mailbox details',
      details: { code: 'provider_error', kind: 'remote_unreachable' },
    });
  });

  it('lists available providers and their DNS records', async () => {
    const harness = createHarness();
    const call = await startApi(harness);

    const providers = await call('GET', '/providers?available=true');
    expect(providers.body).toEqual({
      items: [
        { id: 'fake', title: 'Fake Mail', description: 'Test double', enabled: true, setup: true, missingSettings: [] },
      ],
    });

    const dns = await call('GET', '/providers/fake/dns?domain=Example.com');
    expect(dns.body).toEqual({
      domain: 'example.com',
      records: [{ type: 'MX', name: '@', value: 'mx.example.com', priority: 10, description: 'Inbound mail.' }],
    });
  });

  it('combines the quota summary with purchase options', async () => {
    const harness = createHarness();
    const call = await startApi(harness);
    await createActiveAccount(harness, call);

    const response = await call('GET', `/quota?customerId=${CUSTOMER_ID}&membershipId=${MEMBERSHIP_ID}`);

    expect(response.body).toEqual({
      canCreate: true,
      remaining: 1,
      current: 1,
      perAccountPurchase: false,
      accountPrice: 5,
    });
  });

  it('removes every account of a deleted customer', async () => {
    const harness = createHarness();
    const call = await startApi(harness);
    await createActiveAccount(harness, call);

    const response = await call('DELETE', `/owners/customers/${CUSTOMER_ID}`);

    expect(response.body).toEqual({ removed: 1 });
    expect(await harness.repository.count({ customerId: CUSTOMER_ID })).toBe(0);
  });
});
