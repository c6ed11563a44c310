import { describe, expect, it } from 'vitest';

import { MemoryTtlCache } from '../../../src/core/cache/ttl-cache.js';
import {
  PASSWORD_TOKEN_TTL_SECONDS,
  PasswordTokenStore,
  createPasswordCipher,
} from '../../../src/modules/email-accounts/password-token.store.js';

const createStore = (aead = true) => {
  const clock = { now: 0 };
  const cache = new MemoryTtlCache(() => clock.now);
  const cipher = createPasswordCipher('test-secret', aead);
  return { clock, cache, cipher, store: new PasswordTokenStore(cache, cipher) };
};

describe('PasswordTokenStore', () => {
  it('issues 32 character tokens', async () => {
    const { store } = createStore();
    expect(await store.store('account-1', 'pw-1')).toMatch(/^[A-Za-z0-9_-]{32}$/);
  });

  it('returns the password exactly once', async () => {
    const { store } = createStore();
    const token = await store.store('account-1', 'Sup3r!secret');

    expect(await store.retrieve(token, 'account-1')).toBe('Sup3r!secret');
    expect(await store.retrieve(token, 'account-1')).toBeNull();
  });

  it('keeps the record when another account asks for it', async () => {
    const { store } = createStore();
    const token = await store.store('account-1', 'Sup3r!secret');

    expect(await store.retrieve(token, 'account-2')).toBeNull();
    expect(await store.retrieve(token, 'account-1')).toBe('Sup3r!secret');
  });

  it('expires records after the TTL', async () => {
    const { clock, store } = createStore();
    const token = await store.store('account-1', 'Sup3r!secret');

    clock.now += PASSWORD_TOKEN_TTL_SECONDS * 1000;
    expect(await store.retrieve(token, 'account-1')).toBeNull();
  });

  it('is still readable just before expiry', async () => {
    const { clock, store } = createStore();
    const token = await store.store('account-1', 'Sup3r!secret');

    clock.now += PASSWORD_TOKEN_TTL_SECONDS * 1000 - 1;
    expect(await store.retrieve(token, 'account-1')).toBe('Sup3r!secret');
  });

  it('never stores the plaintext', async () => {
    const { cache, store } = createStore();
    const token = await store.store('account-1', 'Sup3r!secret');

    const raw = await cache.get(`email-account:password-token:${token}`);
    expect(raw).not.toBeNull();
    expect(raw).not.toContain('Sup3r!secret');
  });

  it('discards tokens', async () => {
    const { store } = createStore();
    const token = await store.store('account-1', 'Sup3r!secret');
    await store.discard(token);

    expect(await store.retrieve(token, 'account-1')).toBeNull();
  });

  it('labels the base64 fallback when AEAD is unavailable', async () => {
    const { cache, cipher, store } = createStore(false);
    expect(cipher.scheme).toBe('insecure-base64');

    const token = await store.store('account-1', 'hunter2');
    expect(JSON.parse((await cache.get(`email-account:password-token:${token}`)) ?? '{}')).toEqual({
      accountId: 'account-1',
      scheme: 'insecure-base64',
      payload: 'aHVudGVyMg==',
    });
    expect(await store.retrieve(token, 'account-1')).toBe('hunter2');
  });

  it('ignores unknown tokens', async () => {
    const { store } = createStore();
    expect(await store.retrieve('missing', 'account-1')).toBeNull();
  });
});
