import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { requireSupabaseCredentials, type AppConfig } from '../../modules/config';

/**
 * Service-role client for ledger writes. Sessions are not persisted:
 * the intake runs as a background process, never as a signed-in user.
 */
export function createLedgerClient(config: AppConfig): SupabaseClient {
  const { url, key } = requireSupabaseCredentials(config);
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
