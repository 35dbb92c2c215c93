/**
 * Supabase client factory.
 * Uses the service role key: the core runs server-side only.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function getSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
