import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getConfig } from '@/lib/config';

let cachedClient: SupabaseClient | null = null;

/** Server-side client; prefers the service-role key so row policies do not hide shop data from API routes. */
export function getSupabaseClient(): SupabaseClient {
  if (cachedClient) return cachedClient;

  const config = getConfig();
  const isServer = typeof window === 'undefined';
  const key = isServer ? (config.supabaseServiceRoleKey ?? config.supabaseAnonKey) : config.supabaseAnonKey;
  if (!config.supabaseUrl || !key) {
    throw new Error(
      'Missing Supabase environment variables. Set NEXT_PUBLIC_SUPABASE_URL and NEXT_PUBLIC_SUPABASE_ANON_KEY, and SUPABASE_SERVICE_ROLE_KEY for server routes.'
    );
  }

  cachedClient = createClient(config.supabaseUrl, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return cachedClient;
}
