import type { Candle, CandleInterval, LookbackConfig, TimeRange } from '../types/common';
import { DAY_MS, HOUR_MS, MINUTE_MS } from './helpers';

export const INTERVAL_MS: Record<CandleInterval, number> = {
  '1m': MINUTE_MS,
  '10m': 10 * MINUTE_MS,
  '1h': HOUR_MS,
  '1d': DAY_MS,
};

/**
 * Candle window to capture for each interval around a funding time.
 * Only the 1m window extends past the funding time.
 */
export const captureWindows = (
  fundingTime: Date,
  lookback: LookbackConfig
): Record<CandleInterval, TimeRange> => {
  const t = fundingTime.getTime();

  return {
    '1d': { start: new Date(t - lookback.dailyDaysBack * DAY_MS), end: new Date(t) },
    '1h': { start: new Date(t - lookback.hourlyHoursBack * HOUR_MS), end: new Date(t) },
    '10m': { start: new Date(t - lookback.tenMinHoursBefore * HOUR_MS), end: new Date(t) },
    '1m': {
      start: new Date(t - lookback.oneMinMinutesBefore * MINUTE_MS),
      end: new Date(t + lookback.oneMinMinutesAfter * MINUTE_MS),
    },
  };
};

/**
 * Merges candles into buckets of `bucketMs`, aligned to the epoch.
 * Input may be unsorted; output is sorted by bucket start.
 */
export const aggregateCandles = (candles: readonly Candle[], bucketMs: number): Candle[] => {
  const sorted = [...candles].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const buckets = new Map<number, Candle>();

  for (const candle of sorted) {
    const start = Math.floor(candle.timestamp.getTime() / bucketMs) * bucketMs;
    const current = buckets.get(start);

    if (!current) {
      buckets.set(start, { ...candle, timestamp: new Date(start) });
      continue;
    }

    current.high = Math.max(current.high, candle.high);
    current.low = Math.min(current.low, candle.low);
    current.close = candle.close;
    current.volume += candle.volume;
  }

  return Array.from(buckets.values());
};
