import type { ICandleSource } from '../exchanges/interfaces/IExchange';
import type { IDataSink } from '../sinks/interfaces/IDataSink';
import type {
  CaptureFailure,
  CandleInterval,
  CandleRow,
  LookbackConfig,
  RankedSnapshot,
} from '../types/common';
import { CANDLE_INTERVALS } from '../types/common';
import { writeWithRetry } from '../sinks/retry';
import { captureWindows } from '../utils/candles';
import { isRetryable, toError } from '../utils/errors';
import { withTimeout } from '../utils/helpers';
import { logger } from '../utils/logger';

export interface CapturePair {
  symbol: string;
  interval: CandleInterval;
}

export interface CaptureResult {
  rows: number;
  completed: CapturePair[];
  failures: CaptureFailure[];
}

export interface CandleCaptureOptions {
  lookback: LookbackConfig;
  requestTimeoutMs: number;
}

export const pairKey = (pair: CapturePair): string => `${pair.symbol}|${pair.interval}`;

export const allPairs = (symbols: readonly string[]): CapturePair[] => {
  return symbols.flatMap(symbol => CANDLE_INTERVALS.map(interval => ({ symbol, interval })));
};

/**
 * Fetches the candle windows around a round for each (symbol, interval) pair and
 * writes one batch per pair. Pairs run concurrently and are all joined before
 * returning; one failing pair never affects the others.
 */
export class CandleCapture {
  private candleSource: ICandleSource;
  private sink: IDataSink;
  private options: CandleCaptureOptions;

  constructor(candleSource: ICandleSource, sink: IDataSink, options: CandleCaptureOptions) {
    this.candleSource = candleSource;
    this.sink = sink;
    this.options = options;
  }

  public async capture(snapshot: RankedSnapshot, pairs: readonly CapturePair[]): Promise<CaptureResult> {
    const windows = captureWindows(snapshot.fundingTime, this.options.lookback);
    const result: CaptureResult = { rows: 0, completed: [], failures: [] };

    const outcomes = await Promise.allSettled(
      pairs.map(pair => this.capturePair(snapshot, pair, windows[pair.interval].start, windows[pair.interval].end))
    );

    outcomes.forEach((outcome, index) => {
      const pair = pairs[index];
      if (outcome.status === 'fulfilled') {
        result.rows += outcome.value;
        result.completed.push(pair);
        return;
      }

      const error = toError(outcome.reason);
      result.failures.push({
        symbol: pair.symbol,
        interval: pair.interval,
        error: error.message,
        retryable: isRetryable(outcome.reason),
      });
      logger.warn(`Candle fetch failed for ${pair.symbol} ${pair.interval}: ${error.message}`, {
        eventKey: snapshot.eventKey,
        error: error.name,
      });
    });

    return result;
  }

  private async capturePair(
    snapshot: RankedSnapshot,
    pair: CapturePair,
    start: Date,
    end: Date
  ): Promise<number> {
    const { symbol, interval } = pair;

    const candles = await withTimeout(
      () => this.candleSource.getCandles(symbol, interval, start, end),
      this.options.requestTimeoutMs,
      `getCandles(${symbol}, ${interval})`
    );

    const rows: CandleRow[] = candles.map(candle => ({
      ...candle,
      symbol,
      fundingTime: snapshot.fundingTime,
      interval,
    }));

    logger.debug(`Fetched ${rows.length} ${interval} candles for ${symbol}`);

    // A dropped write still completes the pair; losing the batch is accepted
    const written = await writeWithRetry(() => this.sink.appendCandles(rows), {
      eventKey: snapshot.eventKey,
      symbol,
      interval,
      rows: rows.length,
    });
    return written ? rows.length : 0;
  }
}
