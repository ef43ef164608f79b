import { BaseExchange, type HttpOptions } from '../BaseExchange';
import { buildMexcConfig, mexcEndpoints, mexcSymbolNotFoundCodes } from '../../config/exchanges/mexc.config';
import type { Candle, CandleInterval, ExchangeConfig, FundingEvent } from '../../types/common';
import { SourceUnavailable, SymbolNotFound } from '../../utils/errors';
import { aggregateCandles, INTERVAL_MS } from '../../utils/candles';
import { chunk, sleep } from '../../utils/helpers';
import { logger } from '../../utils/logger';

interface MexcEnvelope<T> {
  success: boolean;
  code: number;
  message?: string;
  data?: T;
}

interface MexcContractDetail {
  symbol: string;
  quoteCoin: string;
}

interface MexcFundingRate {
  symbol: string;
  fundingRate: number | string;
  nextSettleTime: number | string;
}

interface MexcKlineData {
  time: number[];
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  vol: number[];
}

type MexcKlineInterval = 'Min1' | 'Min5' | 'Min60' | 'Day1';

// MEXC has no 10-minute kline; 10m is built from 5m candles
const klineIntervals: Record<CandleInterval, MexcKlineInterval> = {
  '1m': 'Min1',
  '10m': 'Min5',
  '1h': 'Min60',
  '1d': 'Day1',
};

export class MexcExchange extends BaseExchange {
  constructor(config: ExchangeConfig = buildMexcConfig(), httpOptions: HttpOptions = {}) {
    super(config, httpOptions);
  }

  protected async testConnection(): Promise<void> {
    try {
      await this.httpClient.get(mexcEndpoints.ping);
      logger.info('MEXC connection test successful');
    } catch (error) {
      throw this.toSourceError(error, mexcEndpoints.ping);
    }
  }

  public async listPerpetualSymbols(): Promise<string[]> {
    const envelope = await this.makeRequest<MexcEnvelope<MexcContractDetail[]>>(
      mexcEndpoints.contractDetail
    );
    const contracts = this.unwrap(envelope, mexcEndpoints.contractDetail);

    return contracts
      .filter(contract => contract.symbol && contract.quoteCoin === this.config.quoteCoin)
      .map(contract => contract.symbol);
  }

  public async listFundingEvents(): Promise<FundingEvent[]> {
    const symbols = await this.listPerpetualSymbols();
    if (symbols.length === 0) {
      throw new SourceUnavailable('MEXC returned no perpetual symbols');
    }

    const batches = chunk(symbols, this.config.fundingBatchSize);
    const events: FundingEvent[] = [];
    let failed = 0;

    for (const [index, batch] of batches.entries()) {
      logger.debug(`Fetching funding batch ${index + 1}/${batches.length} (${batch.length} symbols)`);

      const results = await Promise.allSettled(batch.map(symbol => this.getFundingEvent(symbol)));
      results.forEach((result, i) => {
        if (result.status === 'fulfilled') {
          events.push(result.value);
        } else {
          failed++;
          logger.warn(`Failed to fetch funding rate for ${batch[i]}: ${String(result.reason)}`);
        }
      });

      if (index < batches.length - 1) {
        await sleep(this.config.fundingBatchDelayMs);
      }
    }

    if (events.length === 0) {
      throw new SourceUnavailable(`Funding rates unavailable for all ${symbols.length} symbols`);
    }

    logger.debug(`Fetched ${events.length} funding rates (${failed} failed)`);
    return events;
  }

  public async getFundingEvent(symbol: string): Promise<FundingEvent> {
    const endpoint = mexcEndpoints.fundingRate(symbol);
    const envelope = await this.makeRequest<MexcEnvelope<MexcFundingRate>>(endpoint);
    const data = this.unwrap(envelope, endpoint, symbol);

    const fundingRate = Number(data.fundingRate);
    const nextSettleTime = Number(data.nextSettleTime);
    if (!Number.isFinite(fundingRate) || !Number.isFinite(nextSettleTime) || nextSettleTime <= 0) {
      throw new SourceUnavailable(`Malformed funding rate for ${symbol}`, { endpoint });
    }

    return {
      symbol,
      fundingRate,
      fundingTime: new Date(nextSettleTime),
    };
  }

  public async getCandles(
    symbol: string,
    interval: CandleInterval,
    start: Date,
    end: Date
  ): Promise<Candle[]> {
    const candles = await this.fetchKlines(symbol, klineIntervals[interval], start, end);

    if (interval === '10m') {
      return aggregateCandles(candles, INTERVAL_MS['10m']);
    }
    return candles;
  }

  private async fetchKlines(
    symbol: string,
    interval: MexcKlineInterval,
    start: Date,
    end: Date
  ): Promise<Candle[]> {
    const endpoint = mexcEndpoints.kline(symbol);

    try {
      const envelope = await this.makeRequest<MexcEnvelope<MexcKlineData>>(endpoint, {
        interval,
        start: Math.floor(start.getTime() / 1000),
        end: Math.floor(end.getTime() / 1000),
      });
      return this.parseKlines(this.unwrap(envelope, endpoint, symbol));
    } catch (error) {
      if (error instanceof SourceUnavailable && error.context?.status === 404) {
        throw new SymbolNotFound(symbol, { endpoint });
      }
      throw error;
    }
  }

  // Kline data is columnar with times in seconds
  private parseKlines(data: MexcKlineData): Candle[] {
    const length = Math.min(
      data.time?.length ?? 0,
      data.open?.length ?? 0,
      data.high?.length ?? 0,
      data.low?.length ?? 0,
      data.close?.length ?? 0,
      data.vol?.length ?? 0
    );

    const candles: Candle[] = [];
    for (let i = 0; i < length; i++) {
      candles.push({
        timestamp: new Date(data.time[i] * 1000),
        open: Number(data.open[i]),
        high: Number(data.high[i]),
        low: Number(data.low[i]),
        close: Number(data.close[i]),
        volume: Number(data.vol[i]),
      });
    }
    return candles;
  }

  private unwrap<T>(envelope: MexcEnvelope<T>, endpoint: string, symbol?: string): T {
    if (envelope.success === false) {
      const message = envelope.message || 'No error message provided';
      const notFound =
        mexcSymbolNotFoundCodes.has(envelope.code) || /not exist/i.test(message);

      if (symbol && notFound) {
        throw new SymbolNotFound(symbol, { code: envelope.code, message });
      }
      throw new SourceUnavailable(`MEXC error code=${envelope.code}: ${message}`, {
        code: envelope.code,
        endpoint,
      });
    }

    if (envelope.data === undefined || envelope.data === null) {
      throw new SourceUnavailable(`MEXC response from ${endpoint} has no data`, { endpoint });
    }
    return envelope.data;
  }
}
