/**
 * Supabase Client Configuration
 * Service-role client used by the cloud backup backend
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { CloudConfig } from './config.js';

/**
 * Create a Supabase admin client for storage access
 * NEVER expose this client to user-facing code
 */
export function createSupabaseAdmin(
  config: Pick<CloudConfig, 'url' | 'serviceKey'>,
  fetchImpl?: typeof fetch
): SupabaseClient {
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
    ...(fetchImpl !== undefined && { global: { fetch: fetchImpl } }),
  });
}
