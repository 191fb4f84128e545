import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';

// Tables created by supabase/migrations/001_init.sql
export const LEDGER_TABLES = [
  'accounts',
  'resources',
  'bookings',
  'booking_starts',
  'booking_ends',
  'factory_state',
  'provisioned_names',
  'provisioning_attempts',
] as const;

let supabaseClient: SupabaseClient | null = null;

/**
 * Shared Supabase client, created on first use
 *
 * Uses the service role key: callers are identified by X-Account-Id, not
 * by Supabase auth sessions, so row-level security does not apply.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (supabaseClient) return supabaseClient;

  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
    throw new Error('Supabase is not configured (set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY)');
  }

  supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: { autoRefreshToken: false, persistSession: false },
    db: { schema: 'public' },
  });
  logger.info('Supabase client initialized', { url: env.SUPABASE_URL });
  return supabaseClient;
};

/**
 * Check that the database is reachable and migrated
 *
 * Queries every ledger table; a missing table means the migration has not
 * been applied.
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    const client = getSupabaseClient();
    const results = await Promise.all(
      LEDGER_TABLES.map(async (table) => ({ table, ...(await client.from(table).select('*', { head: true }).limit(1)) }))
    );

    const missing = results.filter((result) => result.error !== null);
    if (missing.length > 0) {
      logger.error('Database connection test failed', {
        tables: missing.map((result) => ({ table: result.table, error: result.error?.message })),
      });
      return false;
    }

    logger.info('Database connection test successful', { tables: LEDGER_TABLES.length });
    return true;
  } catch (error) {
    logger.error('Database connection test failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
};

/**
 * Drop the client on shutdown; connection pooling is on Supabase's side
 */
export const closeConnection = (): void => {
  if (!supabaseClient) return;
  supabaseClient = null;
  logger.info('Supabase client released');
};
