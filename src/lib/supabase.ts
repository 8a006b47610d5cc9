import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { config } from './config';

// Without credentials (tests, local runs against a bare API) a placeholder client keeps the module
// importable; its auth calls fail with an error result instead of throwing at import time.
function makeClient(): SupabaseClient {
  const real = config.supabaseUrl && config.supabaseAnonKey;
  return createClient(
    real ? config.supabaseUrl ?? '' : 'https://example.com',
    real ? config.supabaseAnonKey ?? '' : 'public-anon-key',
    {
      auth: {
        persistSession: true,
        autoRefreshToken: true,
      },
    }
  );
}

export const supabase = makeClient();
