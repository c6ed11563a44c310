import { err, type Failure } from '@mailhost/common';

import type { ProviderError, ProviderErrorKind } from './email-provider.js';

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export const providerError = (kind: ProviderErrorKind, message: string, status?: number): ProviderError =>
  status === undefined ? { kind, message } : { kind, message, status };

export const providerFailure = (kind: ProviderErrorKind, message: string, status?: number): Failure<ProviderError> =>
  err(providerError(kind, message, status));

export const notConfigured = (title: string): Failure<ProviderError> =>
  providerFailure('not_configured', `${title} is not configured`);

const mentionsAlreadyExists = (message: string): boolean => /already exists/i.test(message);

/**
 * Maps an HTTP status plus the backend's message onto a provider error kind.
 */
export const errorFromStatus = (status: number, message: string): ProviderError => {
  if (status === 401 || status === 403) {
    return providerError('invalid_credentials', message, status);
  }
  if (status === 404) {
    return providerError('not_found', message, status);
  }
  if (status === 409) {
    return providerError('already_exists', message, status);
  }
  if (status === 429) {
    return providerError('rate_limited', message, status);
  }
  return providerError(mentionsAlreadyExists(message) ? 'already_exists' : 'remote_rejected', message, status);
};

/** For backends that report failure inside a 200 envelope. */
export const errorFromMessage = (message: string): ProviderError =>
  providerError(mentionsAlreadyExists(message) ? 'already_exists' : 'remote_rejected', message);

const readProperty = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null && key in value ? Reflect.get(value, key) : undefined;

const readStatus = (error: unknown): number | undefined => {
  for (const candidate of [
    readProperty(error, 'statusCode'),
    readProperty(error, 'status'),
    readProperty(readProperty(error, 'response'), 'status'),
  ]) {
    if (typeof candidate === 'number') {
      return candidate;
    }
  }
  return undefined;
};

const isNetworkFailure = (error: unknown): boolean => {
  const name = readProperty(error, 'name');
  if (name === 'AbortError' || name === 'TimeoutError') {
    return true;
  }
  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
  if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }
  // fetch wraps socket failures in a TypeError
  return error instanceof TypeError && /fetch failed/i.test(error.message);
};

/**
 * Normalizes anything a client library throws. SDK errors carry the HTTP status
 * as `statusCode` (Graph) or `status` / `response.status` (Gaxios).
 */
export const normalizeProviderError = (error: unknown): ProviderError => {
  const message = error instanceof Error ? error.message : String(error);

  if (isNetworkFailure(error)) {
    return providerError('remote_unreachable', message);
  }

  const status = readStatus(error);
  if (status !== undefined && status >= 400) {
    return errorFromStatus(status, message);
  }
  if (status !== undefined && status <= 0) {
    return providerError('remote_unreachable', message);
  }

  return providerError(mentionsAlreadyExists(message) ? 'already_exists' : 'remote_rejected', message);
};
