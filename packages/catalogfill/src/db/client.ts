import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { BackendConfig } from '../config/env.js';

export interface BackendClientOptions {
  /** Transport override; tests pass an in-process fake. */
  fetch?: typeof fetch;
}

/**
 * PostgREST client for the hosted backend. The API key goes out both as
 * `apikey` and as the bearer token, which is what the backend expects for
 * service access.
 */
export function createBackendClient(
  config: Pick<BackendConfig, 'url' | 'apiKey'>,
  opts: BackendClientOptions = {},
): SupabaseClient {
  return createClient(config.url, config.apiKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(opts.fetch ? { global: { fetch: opts.fetch } } : {}),
  });
}
