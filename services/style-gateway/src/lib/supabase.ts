import { createClient, SupabaseClient } from '@supabase/supabase-js';

let supabaseInstance: SupabaseClient | null = null;
let missingConfigReported = false;

/**
 * Shared service-role client, or null without credentials.
 * The missing-credentials error is logged once per process.
 */
export const getSupabase = (): SupabaseClient | null => {
  if (supabaseInstance) return supabaseInstance;

  const supabaseUrl = process.env.SUPABASE_URL;
  const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_SERVICE_ROLE;

  if (!supabaseUrl || !supabaseKey) {
    if (!missingConfigReported) {
      missingConfigReported = true;
      console.error(
        '[Supabase] SUPABASE_URL or SUPABASE_SERVICE_ROLE not set: ' +
        'table-backed style rules and decision audit are unavailable'
      );
    }
    return null;
  }

  supabaseInstance = createClient(supabaseUrl, supabaseKey, {
    auth: { persistSession: false }
  });
  return supabaseInstance;
};

export function resetSupabase(): void {
  supabaseInstance = null;
  missingConfigReported = false;
}
