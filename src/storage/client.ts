import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { config } from '../config.js';
import { StorageBucket } from './supabase-store.js';

let supabase: SupabaseClient | null = null;

// Service-role client; only Storage is used, so no auth session is kept
function getSupabase(): SupabaseClient {
  if (!config.supabaseUrl || !config.supabaseServiceKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase storage driver');
  }

  if (!supabase) {
    supabase = createClient(config.supabaseUrl, config.supabaseServiceKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }
  return supabase;
}

/** Bucket holding source images and their derivatives. */
export function getDerivativesBucket(bucket: string = config.derivativesBucket): StorageBucket {
  return getSupabase().storage.from(bucket);
}
