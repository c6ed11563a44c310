import { describe, expect, it } from 'vitest';

import {
  errorFromMessage,
  errorFromStatus,
  normalizeProviderError,
} from '../../../src/modules/email-providers/provider-errors.js';

describe('errorFromStatus', () => {
  it.each([
    [401, 'invalid_credentials'],
    [403, 'invalid_credentials'],
    [404, 'not_found'],
    [409, 'already_exists'],
    [429, 'rate_limited'],
    [400, 'remote_rejected'],
    [500, 'remote_rejected'],
  ])('maps HTTP %i to %s', (status, kind) => {
    expect(errorFromStatus(status, 'message')).toEqual({ kind, message: 'message', status });
  });

  it('recognizes duplicates reported with a generic status', () => {
    expect(errorFromStatus(400, 'User already exists').kind).toBe('already_exists');
  });
});

describe('errorFromMessage', () => {
  it('keeps the backend message', () => {
    expect(errorFromMessage('Domain not verified')).toEqual({ kind: 'remote_rejected', message: 'Domain not verified' });
    expect(errorFromMessage('Mailbox Already Exists').kind).toBe('already_exists');
  });
});

describe('normalizeProviderError', () => {
  it('reads the status of SDK errors', () => {
    expect(normalizeProviderError(Object.assign(new Error('Forbidden'), { statusCode: 403 }))).toEqual({
      kind: 'invalid_credentials',
      message: 'Forbidden',
      status: 403,
    });
    expect(normalizeProviderError(Object.assign(new Error('Missing'), { response: { status: 404 } })).kind).toBe(
      'not_found',
    );
  });

  it('treats timeouts and socket failures as unreachable', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    expect(normalizeProviderError(timeout).kind).toBe('remote_unreachable');
    expect(normalizeProviderError(new TypeError('fetch failed')).kind).toBe('remote_unreachable');
    expect(normalizeProviderError(Object.assign(new Error('connect'), { code: 'ECONNREFUSED' })).kind).toBe(
      'remote_unreachable',
    );
  });

  it('falls back to remote_rejected', () => {
    expect(normalizeProviderError('odd failure')).toEqual({ kind: 'remote_rejected', message: 'odd failure' });
  });
});
