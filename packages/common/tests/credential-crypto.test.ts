import { describe, expect, it } from 'vitest';

import {
  decodeInsecure,
  decryptSecret,
  encodeInsecure,
  encryptSecret,
  generateToken,
  isAeadAvailable,
} from '../src/utils/credential-crypto.js';

describe('credential-crypto', () => {
  const passphrase = 'test-secret';

  it('round-trips a secret through AES-256-GCM', () => {
    const encrypted = encryptSecret('Mailbox#Pass1', passphrase);
    expect(decryptSecret(encrypted, passphrase)).toBe('Mailbox#Pass1');
  });

  it('writes iv, auth tag and ciphertext as base64 segments', () => {
    const [iv, tag, ciphertext] = encryptSecret('abc', passphrase).split(':');
    expect(Buffer.from(iv ?? '', 'base64')).toHaveLength(12);
    expect(Buffer.from(tag ?? '', 'base64')).toHaveLength(16);
    expect(Buffer.from(ciphertext ?? '', 'base64')).toHaveLength(3);
  });

  it('uses a fresh IV per call', () => {
    expect(encryptSecret('same', passphrase)).not.toBe(encryptSecret('same', passphrase));
  });

  it('refuses to decrypt with the wrong passphrase', () => {
    const encrypted = encryptSecret('secret', passphrase);
    expect(() => decryptSecret(encrypted, 'other-secret')).toThrow();
  });

  it('refuses a tampered ciphertext', () => {
    const [iv, tag] = encryptSecret('secret', passphrase).split(':');
    const forged = `${iv}:${tag}:${Buffer.from('public').toString('base64')}`;
    expect(() => decryptSecret(forged, passphrase)).toThrow();
  });

  it('rejects a payload without all three segments', () => {
    expect(() => decryptSecret('only-one-part', passphrase)).toThrow('Corrupted encrypted payload');
  });

  it('reports AEAD support on a standard runtime', () => {
    expect(isAeadAvailable()).toBe(true);
  });

  it('encodes the insecure fallback as plain base64', () => {
    expect(encodeInsecure('hunter2')).toBe('aHVudGVyMg==');
    expect(decodeInsecure('aHVudGVyMg==')).toBe('hunter2');
  });

  it('generates 32 character url-safe tokens by default', () => {
    const token = generateToken();
    expect(token).toMatch(/^[A-Za-z0-9_-]{32}$/);
    expect(generateToken()).not.toBe(token);
  });
});
