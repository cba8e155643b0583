import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { ConfigError } from '../errors';

let _adminClient: SupabaseClient | null = null;

function assertEnv(url: string | null, serviceKey: string | null): { url: string; serviceKey: string } {
  if (!url) throw new ConfigError('SUPABASE_URL is not set');
  try {
    // eslint-disable-next-line no-new
    new URL(url);
  } catch {
    throw new ConfigError(`Invalid SUPABASE_URL: '${url}'. Expected a valid https URL like https://YOUR_PROJECT.supabase.co`);
  }
  if (!serviceKey) throw new ConfigError('SUPABASE_SERVICE_ROLE_KEY is not set (table writes need the service role)');
  return { url, serviceKey };
}

export function getAdminClient(opts: { url: string | null; serviceKey: string | null }): SupabaseClient {
  if (_adminClient) return _adminClient;
  const { url, serviceKey } = assertEnv(opts.url, opts.serviceKey);
  _adminClient = createClient(url, serviceKey, {
    auth: { persistSession: false, detectSessionInUrl: false },
  });
  return _adminClient;
}
