import { generateKeyPairSync } from 'crypto';

import jwt from 'jsonwebtoken';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MemoryTtlCache } from '../../../../src/core/cache/ttl-cache.js';
import {
  DIRECTORY_USER_SCOPE,
  GOOGLE_TOKEN_URL,
  GoogleWorkspaceProvider,
  type GoogleWorkspaceConfig,
} from '../../../../src/modules/email-providers/providers/google-workspace.provider.js';
import { createFetchStub, jsonResponse, type RecordedRequest } from '../../../helpers/fetch-stub.js';

interface DirectoryCall {
  method: string;
  params: unknown;
  accessToken: string | undefined;
}

interface Credentials {
  access_token?: string;
}

const directory = vi.hoisted(() => ({
  request: vi.fn<(call: DirectoryCall) => Promise<{ data: unknown }>>(),
}));

vi.mock('googleapis', () => {
  class OAuth2 {
    credentials: Credentials = {};

    setCredentials(credentials: Credentials): void {
      this.credentials = credentials;
    }
  }

  const endpoint = (auth: OAuth2, method: string) => (params: unknown) =>
    directory.request({ method, params, accessToken: auth.credentials.access_token });

  return {
    google: {
      auth: { OAuth2 },
      admin: ({ auth }: { auth: OAuth2 }) => ({
        users: {
          insert: endpoint(auth, 'users.insert'),
          delete: endpoint(auth, 'users.delete'),
          update: endpoint(auth, 'users.update'),
          get: endpoint(auth, 'users.get'),
        },
        customers: { get: endpoint(auth, 'customers.get') },
      }),
    },
  };
});

const { privateKey, publicKey } = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
});

const CLIENT_EMAIL = 'provisioner@test-project.iam.gserviceaccount.com';

const config: GoogleWorkspaceConfig = {
  serviceAccount: JSON.stringify({ client_email: CLIENT_EMAIL, private_key: privateKey }),
  adminEmail: 'admin@example.com',
  customerId: 'C0test123',
};

const tokenResponse = () => jsonResponse({ access_token: 'google-token-1', expires_in: 3600, token_type: 'Bearer' });

const createProvider = (
  overrides: Partial<GoogleWorkspaceConfig> = {},
  respond: (request: RecordedRequest) => Response = tokenResponse,
) => {
  let now = Date.UTC(2026, 0, 1);
  const stub = createFetchStub(respond);
  const tokenCache = new MemoryTtlCache(() => now);
  const provider = new GoogleWorkspaceProvider({
    config: { ...config, ...overrides },
    enabled: true,
    tokenCache,
    fetch: stub.fetch,
  });
  return {
    provider,
    tokenCache,
    ...stub,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

const input = {
  username: 'info',
  domain: 'example.com',
  password: 'Mailbox-pass-1',
  quotaMb: 1024,
  displayName: 'Front Desk',
};

describe('GoogleWorkspaceProvider', () => {
  beforeEach(() => {
    directory.request.mockResolvedValue({ data: {} });
  });

  it('exchanges a signed assertion for an access token', async () => {
    const { provider, requests } = createProvider();

    await provider.testConnection();

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe(GOOGLE_TOKEN_URL);
    const body = new URLSearchParams(requests[0]?.body);
    expect(body.get('grant_type')).toBe('urn:ietf:params:oauth:grant-type:jwt-bearer');

    const claims = jwt.verify(body.get('assertion') ?? '', publicKey, {
      algorithms: ['RS256'],
      audience: GOOGLE_TOKEN_URL,
      issuer: CLIENT_EMAIL,
    });
    expect(claims).toMatchObject({ scope: DIRECTORY_USER_SCOPE, sub: 'admin@example.com' });
    expect(directory.request).toHaveBeenCalledWith({
      method: 'customers.get',
      params: { customerKey: 'C0test123' },
      accessToken: 'google-token-1',
    });
  });

  it('creates users through the directory', async () => {
    directory.request.mockResolvedValue({ data: { id: 'google-user-1', primaryEmail: 'info@example.com' } });
    const { provider } = createProvider();

    const result = await provider.createEmailAccount(input);

    expect(result).toEqual({
      ok: true,
      value: { emailAddress: 'info@example.com', externalId: 'google-user-1', quotaMb: 1024 },
    });
    expect(directory.request).toHaveBeenCalledWith({
      method: 'users.insert',
      params: {
        requestBody: {
          primaryEmail: 'info@example.com',
          password: 'Mailbox-pass-1',
          changePasswordAtNextLogin: false,
          name: { givenName: 'Front Desk', familyName: 'User' },
        },
      },
      accessToken: 'google-token-1',
    });
  });

  it('reuses the token until a minute before it expires', async () => {
    const { provider, requests, advance } = createProvider();

    await provider.deleteEmailAccount('info@example.com');
    advance(3_539_000);
    await provider.deleteEmailAccount('sales@example.com');
    expect(requests).toHaveLength(1);

    advance(1_000);
    await provider.deleteEmailAccount('billing@example.com');
    expect(requests).toHaveLength(2);
  });

  it('reports a rejected assertion as invalid credentials', async () => {
    const { provider } = createProvider({}, () =>
      jsonResponse({ error: 'invalid_grant', error_description: 'Invalid JWT Signature.' }, 400),
    );

    expect(await provider.testConnection()).toEqual({
      ok: false,
      error: { kind: 'invalid_credentials', message: 'Invalid JWT Signature.', status: 400 },
    });
    expect(directory.request).not.toHaveBeenCalled();
  });

  it('rejects incomplete service account keys', async () => {
    const { provider, requests } = createProvider({ serviceAccount: JSON.stringify({ client_email: CLIENT_EMAIL }) });

    expect(await provider.testConnection()).toEqual({
      ok: false,
      error: { kind: 'invalid_credentials', message: 'Service account key is missing client_email or private_key' },
    });
    expect(requests).toHaveLength(0);
  });

  it('needs the customer id to be set up', async () => {
    const { provider, requests } = createProvider({ customerId: undefined });

    expect(provider.isSetup()).toBe(false);
    expect(provider.getMissingSettings()).toEqual(['customerId']);
    expect(await provider.testConnection()).toEqual({
      ok: false,
      error: { kind: 'not_configured', message: 'Google Workspace is not configured' },
    });
    expect(requests).toHaveLength(0);
  });

  it('rejects blank mailbox parameters before signing an assertion', async () => {
    const { provider, requests } = createProvider();

    expect(await provider.createEmailAccount({ ...input, password: '' })).toEqual({
      ok: false,
      error: { kind: 'missing_params', message: 'Missing mailbox parameters: password' },
    });
    expect(requests).toHaveLength(0);
    expect(directory.request).not.toHaveBeenCalled();
  });

  it('reports an unreadable key file', async () => {
    const { provider } = createProvider({ serviceAccount: '/nonexistent/service-account.json' });

    expect(await provider.testConnection()).toEqual({
      ok: false,
      error: { kind: 'invalid_credentials', message: 'Service account key file could not be read' },
    });
  });

  it('forgets the token when the directory rejects it', async () => {
    directory.request.mockRejectedValue(
      Object.assign(new Error('Not Authorized to access this resource/api'), { status: 403 }),
    );
    const { provider, tokenCache } = createProvider();

    expect(await provider.changePassword('info@example.com', 'Mailbox-pass-2')).toEqual({
      ok: false,
      error: { kind: 'invalid_credentials', message: 'Not Authorized to access this resource/api', status: 403 },
    });
    expect(await tokenCache.get('google_workspace:access_token')).toBeNull();
  });

  it('maps directory users onto mailbox info', async () => {
    directory.request.mockResolvedValue({
      data: { primaryEmail: 'info@example.com', suspended: true, name: { fullName: 'Front Desk' } },
    });
    const { provider } = createProvider();

    expect(await provider.getAccountInfo('info@example.com')).toEqual({
      ok: true,
      value: { emailAddress: 'info@example.com', quotaMb: 0, diskUsedMb: 0, suspended: true, displayName: 'Front Desk' },
    });
  });

  it('lists the Google mail exchangers by priority', () => {
    const { provider } = createProvider();

    expect(
      provider
        .getDnsInstructions()
        .filter((record) => record.type === 'MX')
        .map((record) => record.priority),
    ).toEqual([1, 5, 5, 10, 10]);
  });
});
