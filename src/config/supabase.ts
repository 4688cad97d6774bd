import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { getEnvironmentConfig, EnvironmentError } from './env';
import { getLogger } from './logger';

let supabaseClient: SupabaseClient | null = null;

export interface SupabaseConnectionOptions {
  url: string;
  serviceRoleKey: string;
  fetch?: typeof fetch;
}

/**
 * Creates a server-side client. No session persistence: the engine runs
 * with the service role key only.
 */
export function createSupabaseClient(options: SupabaseConnectionOptions): SupabaseClient {
  return createClient(options.url, options.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}

export function getSupabaseClient(): SupabaseClient {
  if (supabaseClient) {
    return supabaseClient;
  }

  const config = getEnvironmentConfig();
  if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
    throw new EnvironmentError(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase snapshot backend'
    );
  }

  supabaseClient = createSupabaseClient({
    url: config.SUPABASE_URL,
    serviceRoleKey: config.SUPABASE_SERVICE_ROLE_KEY,
  });

  getLogger().info(
    { url: config.SUPABASE_URL, hasServiceKey: true },
    'Supabase client initialized successfully'
  );

  return supabaseClient;
}

export async function testSupabaseConnection(client: SupabaseClient = getSupabaseClient()): Promise<boolean> {
  const logger = getLogger();
  const { error } = await client.from('engine_snapshots').select('id').limit(1);

  if (error) {
    logger.error({ error: error.message, code: error.code }, 'Supabase connection test failed');
    return false;
  }

  logger.info('Supabase connection test successful');
  return true;
}

export function resetSupabaseClient(): void {
  supabaseClient = null;
}

export type { SupabaseClient };
