import { describe, it, expect } from 'vitest';
import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { MexcExchange } from '../mexc/MexcExchange';
import { SourceUnavailable, SymbolNotFound } from '../../utils/errors';
import type { ExchangeConfig } from '../../types/common';

type Params = Record<string, string | number>;
type Route = (params: Params) => { status: number; data: unknown };

const T_SECONDS = 1754150400;
const T = new Date(T_SECONDS * 1000);

const testConfig: ExchangeConfig = {
  name: 'mexc',
  baseUrl: 'https://contract.example.test',
  quoteCoin: 'USDT',
  timeoutMs: 1000,
  retryAttempts: 0,
  retryDelayMs: 0,
  fundingBatchSize: 2,
  fundingBatchDelayMs: 0,
  rateLimits: { requests: 100, interval: 1000 },
};

const ok = (data: unknown) => ({ status: 200, data: { success: true, code: 0, data } });

const stubAdapter =
  (routes: Record<string, Route>) =>
  async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const route = config.url ? routes[config.url] : undefined;
    const { status, data } = route ? route(config.params ?? {}) : { status: 404, data: {} };
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };

    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    return response;
  };

const connect = async (routes: Record<string, Route>): Promise<MexcExchange> => {
  const exchange = new MexcExchange(testConfig, {
    adapter: stubAdapter({ '/api/v1/contract/ping': () => ok(Date.now()), ...routes }),
  });
  await exchange.initialize();
  return exchange;
};

const contracts = () =>
  ok([
    { symbol: 'BTC_USDT', quoteCoin: 'USDT' },
    { symbol: 'ETH_USDT', quoteCoin: 'USDT' },
    { symbol: 'BTC_USDC', quoteCoin: 'USDC' },
    { symbol: 'XRP_USDT', quoteCoin: 'USDT' },
  ]);

describe('MexcExchange funding rates', () => {
  it('lists funding events for USDT perpetuals and drops symbols that fail', async () => {
    const exchange = await connect({
      '/api/v1/contract/detail': contracts,
      '/api/v1/contract/funding_rate/BTC_USDT': () =>
        ok({ symbol: 'BTC_USDT', fundingRate: 0.0001, nextSettleTime: T_SECONDS * 1000 }),
      '/api/v1/contract/funding_rate/ETH_USDT': () =>
        ok({ symbol: 'ETH_USDT', fundingRate: '-0.0005', nextSettleTime: T_SECONDS * 1000 }),
      '/api/v1/contract/funding_rate/XRP_USDT': () => ({
        status: 200,
        data: { success: false, code: 1001, message: 'contract not exist' },
      }),
    });

    const events = await exchange.listFundingEvents();

    expect(events).toEqual([
      { symbol: 'BTC_USDT', fundingRate: 0.0001, fundingTime: T },
      { symbol: 'ETH_USDT', fundingRate: -0.0005, fundingTime: T },
    ]);
  });

  it('fails the listing when no funding rate could be fetched', async () => {
    const serverError: Route = () => ({ status: 500, data: {} });
    const exchange = await connect({
      '/api/v1/contract/detail': contracts,
      '/api/v1/contract/funding_rate/BTC_USDT': serverError,
      '/api/v1/contract/funding_rate/ETH_USDT': serverError,
      '/api/v1/contract/funding_rate/XRP_USDT': serverError,
    });

    await expect(exchange.listFundingEvents()).rejects.toBeInstanceOf(SourceUnavailable);
  });

  it('rejects a funding rate without a settle time', async () => {
    const exchange = await connect({
      '/api/v1/contract/funding_rate/BTC_USDT': () => ok({ symbol: 'BTC_USDT', fundingRate: 0.0001, nextSettleTime: 0 }),
    });

    await expect(exchange.getFundingEvent('BTC_USDT')).rejects.toThrow('Malformed funding rate for BTC_USDT');
  });
});

describe('MexcExchange candles', () => {
  it('requests klines in seconds and parses the columnar response', async () => {
    const requests: Params[] = [];
    const exchange = await connect({
      '/api/v1/contract/kline/ETH_USDT': params => {
        requests.push(params);
        return ok({
          time: [T_SECONDS - 600, T_SECONDS - 540],
          open: [3500, 3505],
          high: [3510, 3512],
          low: [3495, 3500],
          close: [3505, 3508],
          vol: [120, 80],
        });
      },
    });

    const candles = await exchange.getCandles(
      'ETH_USDT',
      '1m',
      new Date(T.getTime() - 10 * 60_000),
      new Date(T.getTime() + 10 * 60_000)
    );

    expect(requests).toEqual([{ interval: 'Min1', start: T_SECONDS - 600, end: T_SECONDS + 600 }]);
    expect(candles).toEqual([
      { timestamp: new Date('2025-08-02T15:50:00.000Z'), open: 3500, high: 3510, low: 3495, close: 3505, volume: 120 },
      { timestamp: new Date('2025-08-02T15:51:00.000Z'), open: 3505, high: 3512, low: 3500, close: 3508, volume: 80 },
    ]);
  });

  it('builds 10m candles from 5m klines', async () => {
    const requests: Params[] = [];
    const exchange = await connect({
      '/api/v1/contract/kline/BTC_USDT': params => {
        requests.push(params);
        return ok({
          time: [T_SECONDS - 1200, T_SECONDS - 900, T_SECONDS - 600, T_SECONDS - 300],
          open: [100, 101, 103, 104],
          high: [102, 104, 105, 110],
          low: [99, 100, 102, 101],
          close: [101, 103, 104, 108],
          vol: [1, 2, 3, 4],
        });
      },
    });

    const candles = await exchange.getCandles('BTC_USDT', '10m', new Date(T.getTime() - 3_600_000), T);

    expect(requests[0].interval).toBe('Min5');
    expect(candles).toEqual([
      { timestamp: new Date('2025-08-02T15:40:00.000Z'), open: 100, high: 104, low: 99, close: 103, volume: 3 },
      { timestamp: new Date('2025-08-02T15:50:00.000Z'), open: 103, high: 110, low: 101, close: 108, volume: 7 },
    ]);
  });

  it('maps a 404 to SymbolNotFound', async () => {
    const exchange = await connect({});

    await expect(exchange.getCandles('GONE_USDT', '1h', new Date(T.getTime() - 3_600_000), T)).rejects.toBeInstanceOf(
      SymbolNotFound
    );
  });

  it('maps an unknown-contract error code to SymbolNotFound', async () => {
    const exchange = await connect({
      '/api/v1/contract/kline/GONE_USDT': () => ({
        status: 200,
        data: { success: false, code: 1001, message: 'contract not exist' },
      }),
    });

    await expect(exchange.getCandles('GONE_USDT', '1d', new Date(T.getTime() - 86_400_000), T)).rejects.toThrow(
      'Symbol GONE_USDT not found'
    );
  });

  it('maps a server error to SourceUnavailable', async () => {
    const exchange = await connect({
      '/api/v1/contract/kline/ETH_USDT': () => ({ status: 500, data: {} }),
    });

    const result = exchange.getCandles('ETH_USDT', '1m', new Date(T.getTime() - 600_000), T);

    await expect(result).rejects.toBeInstanceOf(SourceUnavailable);
    await expect(result).rejects.toHaveProperty('context.status', 500);
  });
});
