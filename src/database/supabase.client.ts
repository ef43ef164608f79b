import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { databaseConfig, tableNames } from '../config/database.config';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

export class SupabaseClientManager {
  private static instance: SupabaseClientManager;
  private client: SupabaseClient;

  private constructor() {
    const { supabaseUrl, supabaseServiceRoleKey } = databaseConfig;
    if (!supabaseUrl || !supabaseServiceRoleKey) {
      throw new ConfigurationError('SINK_TYPE=supabase needs SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
    }

    // Service-role writer; no user session to keep
    this.client = createClient(supabaseUrl, supabaseServiceRoleKey, {
      auth: { persistSession: false },
    });
  }

  public static getInstance(): SupabaseClientManager {
    if (!SupabaseClientManager.instance) {
      SupabaseClientManager.instance = new SupabaseClientManager();
    }
    return SupabaseClientManager.instance;
  }

  public getClient(): SupabaseClient {
    return this.client;
  }

  public findUnreadableTables(): Promise<string[]> {
    return findUnreadableTables(this.client);
  }
}

/**
 * Probes every capture table with a one-row select. Returns the tables that
 * could not be read; empty means the sink is usable.
 */
export const findUnreadableTables = async (client: SupabaseClient): Promise<string[]> => {
  const unreadable: string[] = [];

  for (const table of Object.values(tableNames)) {
    const { error } = await client.from(table).select('symbol').limit(1);
    if (error) {
      logger.error(`Cannot read table ${table}: ${error.message}`);
      unreadable.push(table);
    }
  }

  if (unreadable.length === 0) {
    logger.info(`Supabase tables ready: ${Object.values(tableNames).join(', ')}`);
  }
  return unreadable;
};
