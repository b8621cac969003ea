/**
 * supabase.ts - Backend Supabase client (service_role)
 *
 * WARNING: the service_role key bypasses RLS.
 * Server side only, never exposed to a client.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { storeLogger } from '../utils/logger';

export interface SupabaseSettings {
  url?: string;
  serviceRoleKey?: string;
}

/**
 * Client with the service_role key, or null when persistence is not configured
 */
export function createSupabaseAdmin(settings: SupabaseSettings): SupabaseClient | null {
  if (!settings.url || !settings.serviceRoleKey) {
    storeLogger.warn('SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY not configured, feedback and conversation logs are disabled');
    return null;
  }

  storeLogger.info({ url: settings.url }, 'Initializing Supabase client');

  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
