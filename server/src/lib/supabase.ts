import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { ServerConfig } from './config.js';
import logger from './logger.js';

export type VerifiedUser = { id: string; email: string };

/**
 * Service-role client, or null when SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY
 * are not set. Accounts and history are optional: the analysis routes work
 * without them.
 */
export function createSupabaseAdmin(config: ServerConfig['supabase']): SupabaseClient | null {
  if (!config) {
    logger.info('Supabase not configured: accounts and history are disabled');
    return null;
  }
  return createClient(config.url, config.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

/** Verifies access tokens with `auth.getUser`; failures resolve null. */
export function createSupabaseTokenVerifier(client: SupabaseClient) {
  return async (token: string): Promise<VerifiedUser | null> => {
    const { data: { user }, error } = await client.auth.getUser(token);
    if (error || !user) {
      if (error) logger.debug({ error: error.message }, 'Token verification failed');
      return null;
    }
    return { id: user.id, email: user.email ?? '' };
  };
}
