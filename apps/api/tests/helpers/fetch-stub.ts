import { vi } from 'vitest';

import type { FetchLike } from '../../src/modules/email-providers/provider-http.js';

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string;
}

export const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });

const urlOf = (input: string | URL | Request): string => {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
};

/**
 * Records every request and answers through `respond`, so adapters can be driven
 * without a network.
 */
export const createFetchStub = (respond: (request: RecordedRequest) => Response | Promise<Response>) => {
  const requests: RecordedRequest[] = [];
  const fetch = vi.fn<FetchLike>(async (input, init) => {
    const request: RecordedRequest = {
      url: urlOf(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : '',
    };
    requests.push(request);
    return respond(request);
  });
  return { fetch, requests };
};
