import type { ExchangeConfig } from '../../types/common';
import * as dotenv from 'dotenv';

dotenv.config();

export const buildMexcConfig = (
  env: Record<string, string | undefined> = process.env
): ExchangeConfig => ({
  name: 'mexc',
  baseUrl: env.MEXC_BASE_URL || 'https://contract.mexc.com',
  quoteCoin: 'USDT',
  timeoutMs: parseInt(env.REQUEST_TIMEOUT_MS || '10000'),
  retryAttempts: parseInt(env.REQUEST_RETRIES || '1'),
  retryDelayMs: 500,
  fundingBatchSize: 10,
  fundingBatchDelayMs: 1000, // 1 second between batches
  rateLimits: {
    requests: 20,
    interval: 2000, // 2 seconds
  },
});

export const mexcEndpoints = {
  ping: '/api/v1/contract/ping',
  contractDetail: '/api/v1/contract/detail',
  fundingRate: (symbol: string) => `/api/v1/contract/funding_rate/${symbol}`,
  kline: (symbol: string) => `/api/v1/contract/kline/${symbol}`,
};

// Contract error codes meaning the symbol is unknown
export const mexcSymbolNotFoundCodes = new Set<number>([1001]);
