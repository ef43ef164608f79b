import * as dotenv from 'dotenv';
import type { CollectorConfig, SinkType } from '../types/common';
import { ConfigurationError, toError } from '../utils/errors';
import { HOUR_MS, MINUTE_MS, validatePositiveNumber } from '../utils/helpers';

dotenv.config();

type Env = Record<string, string | undefined>;

const positive = (env: Env, key: string, fallback: string): number => {
  try {
    return validatePositiveNumber(env[key] || fallback, key);
  } catch (error) {
    throw new ConfigurationError(toError(error).message);
  }
};

const parseSinkType = (value: string | undefined): SinkType => {
  const sink = (value || 'csv').toLowerCase();
  if (sink !== 'csv' && sink !== 'supabase') {
    throw new ConfigurationError(`SINK_TYPE must be "csv" or "supabase": ${value}`);
  }
  return sink;
};

export const buildCollectorConfig = (env: Env = process.env): CollectorConfig => {
  const tickMinutes = positive(env, 'TICK_INTERVAL_MINUTES', '5');
  const rankLeadMinutes = positive(env, 'RANK_LEAD_MINUTES', '15');
  const captureLeadMinutes = positive(env, 'CAPTURE_LEAD_MINUTES', '10');
  const topN = positive(env, 'TOP_N_SYMBOLS', '3');

  // The tick is a node-cron "*/N" minute expression
  if (!Number.isInteger(tickMinutes) || 60 % tickMinutes !== 0) {
    throw new ConfigurationError(
      `TICK_INTERVAL_MINUTES must be a whole divisor of 60: ${tickMinutes}`
    );
  }

  if (captureLeadMinutes >= rankLeadMinutes) {
    throw new ConfigurationError(
      `CAPTURE_LEAD_MINUTES (${captureLeadMinutes}) must be less than RANK_LEAD_MINUTES (${rankLeadMinutes})`
    );
  }

  // A ranking must outlive the gap between ranking and capture
  const retentionHours = positive(env, 'CACHE_RETENTION_HOURS', '24');
  if (retentionHours * HOUR_MS <= rankLeadMinutes * MINUTE_MS) {
    throw new ConfigurationError(
      `CACHE_RETENTION_HOURS (${retentionHours}) must be longer than RANK_LEAD_MINUTES (${rankLeadMinutes})`
    );
  }

  if (!Number.isInteger(topN)) {
    throw new ConfigurationError(`TOP_N_SYMBOLS must be a whole number: ${topN}`);
  }

  return {
    tickIntervalMs: tickMinutes * MINUTE_MS,
    rankLeadTimeMs: rankLeadMinutes * MINUTE_MS,
    captureLeadTimeMs: captureLeadMinutes * MINUTE_MS,
    topNSymbols: topN,
    requestTimeoutMs: positive(env, 'REQUEST_TIMEOUT_MS', '10000'),
    retentionMs: retentionHours * HOUR_MS,
    logIntervalHours: positive(env, 'LOG_INTERVAL_HOURS', '1'),
    lookback: {
      dailyDaysBack: positive(env, 'DAILY_DAYS_BACK', '3'),
      hourlyHoursBack: positive(env, 'HOURLY_HOURS_BACK', '4'),
      tenMinHoursBefore: positive(env, 'TEN_MIN_HOURS_BEFORE', '1'),
      oneMinMinutesBefore: positive(env, 'ONE_MIN_MINUTES_BEFORE', '10'),
      oneMinMinutesAfter: positive(env, 'ONE_MIN_MINUTES_AFTER', '10'),
    },
    sinkType: parseSinkType(env.SINK_TYPE),
    outputDir: env.OUTPUT_DIR || 'data',
    cacheDir: env.CACHE_DIR || 'cache/funding_rates',
  };
};

export const tickCronExpression = (config: CollectorConfig): string => {
  return `*/${config.tickIntervalMs / MINUTE_MS} * * * *`;
};

export const reportCronExpression = (config: CollectorConfig): string => {
  const hours = Math.max(1, Math.round(config.logIntervalHours));
  return `0 */${hours} * * *`;
};
