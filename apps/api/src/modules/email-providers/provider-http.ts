import { err, ok, type Result } from '@mailhost/common';

import type { ProviderError } from './email-provider.js';
import { normalizeProviderError, providerError } from './provider-errors.js';

export const PROVIDER_TIMEOUT_MS = 30_000;

export type FetchLike = typeof fetch;

export interface ProviderHttpRequest {
  method: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  url: string;
  headers?: Record<string, string>;
  /** Sent as JSON. */
  json?: unknown;
  /** Sent as application/x-www-form-urlencoded. */
  form?: Record<string, string>;
}

export interface ProviderHttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON, the raw text when it is not JSON, or null when empty. */
  body: unknown;
}

export const parseJsonBody = (text: string): unknown => {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

/**
 * Thin fetch wrapper: every call is bounded by the timeout and transport failures
 * come back as `remote_unreachable` instead of throwing. Status handling stays with
 * the caller since each backend signals failure differently.
 */
export class ProviderHttpClient {
  constructor(
    private readonly fetchImpl: FetchLike = fetch,
    private readonly timeoutMs: number = PROVIDER_TIMEOUT_MS,
  ) {}

  async request(request: ProviderHttpRequest): Promise<Result<ProviderHttpResponse, ProviderError>> {
    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
    let body: string | undefined;

    if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    } else if (request.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(request.form).toString();
    }

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const text = await response.text();
      return ok({ status: response.status, headers: response.headers, body: parseJsonBody(text) });
    } catch (error) {
      const normalized = normalizeProviderError(error);
      return err(providerError('remote_unreachable', normalized.message));
    }
  }
}
