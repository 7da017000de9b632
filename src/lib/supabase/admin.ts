import { createClient } from '@supabase/supabase-js';

/**
 * Server-side Supabase client (service role).
 * Use only in route handlers, server components and scripts.
 * Sessions are not persisted: every client lives for one request.
 */
export function createAdminClient(env: NodeJS.ProcessEnv = process.env) {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !key || key.length === 0) {
    throw new Error(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set for the meal board store',
    );
  }

  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
