import * as dotenv from 'dotenv';

dotenv.config();

export interface DatabaseConfig {
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
}

export const databaseConfig: DatabaseConfig = {
  supabaseUrl: process.env.SUPABASE_URL || '',
  supabaseServiceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY || '',
};

export const tableNames = {
  fundingCandles: 'funding_candles',
  fundingSnapshots: 'funding_snapshots',
};
