import { decodeInsecure, decryptSecret, encodeInsecure, encryptSecret, generateToken, isAeadAvailable } from '@mailhost/common';
import { z } from 'zod';

import type { TtlCache } from '../../core/cache/ttl-cache.js';
import { componentLogger } from '../../core/logger/index.js';

export const PASSWORD_TOKEN_TTL_SECONDS = 600;

export type PasswordCipherScheme = 'aes-256-gcm' | 'insecure-base64';

export interface PasswordCipher {
  readonly scheme: PasswordCipherScheme;
  encrypt(plaintext: string): string;
  decrypt(payload: string): string;
}

const log = componentLogger('password-tokens');
let insecureWarningLogged = false;

export const createPasswordCipher = (secret: string, aeadAvailable = isAeadAvailable()): PasswordCipher => {
  if (aeadAvailable) {
    return {
      scheme: 'aes-256-gcm',
      encrypt: (plaintext) => encryptSecret(plaintext, secret),
      decrypt: (payload) => decryptSecret(payload, secret),
    };
  }

  if (!insecureWarningLogged) {
    insecureWarningLogged = true;
    log.warn('aes-256-gcm is unavailable; one-time passwords are stored base64-encoded only');
  }
  return {
    scheme: 'insecure-base64',
    encrypt: encodeInsecure,
    decrypt: decodeInsecure,
  };
};

const recordSchema = z.object({
  accountId: z.string(),
  scheme: z.enum(['aes-256-gcm', 'insecure-base64']),
  payload: z.string(),
});

const recordKey = (token: string) => `email-account:password-token:${token}`;

/**
 * One-time password handoff. A token resolves once, for the account it was issued
 * to, within its TTL.
 */
export class PasswordTokenStore {
  constructor(
    private readonly cache: TtlCache,
    private readonly cipher: PasswordCipher,
    readonly ttlSeconds: number = PASSWORD_TOKEN_TTL_SECONDS,
  ) {}

  async store(accountId: string, password: string): Promise<string> {
    const token = generateToken();
    const record = { accountId, scheme: this.cipher.scheme, payload: this.cipher.encrypt(password) };
    await this.cache.set(recordKey(token), JSON.stringify(record), this.ttlSeconds);
    return token;
  }

  /**
   * Null when the token is unknown, expired, already used, or issued to another
   * account. A mismatched account leaves the record in place.
   */
  async retrieve(token: string, accountId: string): Promise<string | null> {
    const key = recordKey(token);
    const peeked = this.parse(await this.cache.get(key));
    if (!peeked || peeked.accountId !== accountId) {
      return null;
    }

    const taken = this.parse(await this.cache.take(key));
    if (!taken || taken.accountId !== accountId) {
      // Consumed concurrently
      return null;
    }
    if (taken.scheme !== this.cipher.scheme) {
      log.warn({ scheme: taken.scheme }, 'Password token was written with a different cipher');
      return null;
    }

    try {
      return this.cipher.decrypt(taken.payload);
    } catch (error) {
      log.error({ err: error }, 'Password token could not be decrypted');
      return null;
    }
  }

  async discard(token: string): Promise<void> {
    await this.cache.delete(recordKey(token));
  }

  private parse(raw: string | null): z.infer<typeof recordSchema> | null {
    if (raw === null) {
      return null;
    }
    try {
      const parsed = recordSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
}
