import type { Candle, CandleInterval, FundingEvent } from '../../types/common';

export interface IFundingRateSource {
  /**
   * List the current funding rate and next funding time of every tracked symbol.
   * Throws SourceUnavailable on transport failure.
   */
  listFundingEvents(): Promise<FundingEvent[]>;
}

export interface ICandleSource {
  /**
   * Get OHLCV candles for a symbol between start and end (inclusive)
   * Throws SourceUnavailable or SymbolNotFound.
   */
  getCandles(symbol: string, interval: CandleInterval, start: Date, end: Date): Promise<Candle[]>;
}

export interface IExchange extends IFundingRateSource, ICandleSource {
  /**
   * Get the name of the exchange
   */
  getName(): string;

  /**
   * Verify connectivity before the first tick
   */
  initialize(): Promise<void>;

  /**
   * Release client resources
   */
  disconnect(): Promise<void>;
}
