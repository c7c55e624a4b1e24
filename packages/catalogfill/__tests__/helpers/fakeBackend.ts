import type { SupabaseClient } from '@supabase/supabase-js';
import { createBackendClient } from '../../src/db/client.js';

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

export type Responder = (req: RecordedRequest) => Response | Promise<Response>;

export const BACKEND_URL = 'https://backend.test';
export const API_KEY = 'test-key';

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, headers });
}

/**
 * A real supabase-js client whose transport is an in-process function.
 * Every request is recorded for assertions.
 */
export function createFakeBackend(responder: Responder): {
  supabase: SupabaseClient;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input: string | URL | Request, init?: RequestInit) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    let body: unknown;
    if (typeof init?.body === 'string') {
      body = JSON.parse(init.body);
    }
    const req: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: new URL(href),
      headers: new Headers(init?.headers),
      body,
    };
    requests.push(req);
    return responder(req);
  };

  return {
    supabase: createBackendClient({ url: BACKEND_URL, apiKey: API_KEY }, { fetch: fakeFetch }),
    requests,
  };
}
