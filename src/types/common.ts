// Common types for the funding capture pipeline

export type CandleInterval = '1m' | '10m' | '1h' | '1d';

export const CANDLE_INTERVALS: readonly CandleInterval[] = ['1d', '1h', '10m', '1m'];

export interface FundingEvent {
  symbol: string;
  fundingRate: number;
  fundingTime: Date;
}

export interface Candle {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface CandleRow extends Candle {
  symbol: string;
  fundingTime: Date;
  interval: CandleInterval;
}

export interface RankedRate {
  symbol: string;
  fundingRate: number;
}

export interface RankedSnapshot {
  eventKey: string;
  fundingTime: Date;
  topSymbols: string[];
  rates: RankedRate[];
  computedAt: Date;
}

export interface FundingRound {
  eventKey: string;
  fundingTime: Date;
  events: FundingEvent[];
}

export interface TimeRange {
  start: Date;
  end: Date;
}

export type MissReason =
  | 'capture_window_elapsed'
  | 'never_captured'
  | 'symbol_not_found';

export interface CaptureMiss {
  eventKey: string;
  symbol?: string;
  interval?: CandleInterval;
  reason: MissReason;
  recordedAt: Date;
}

export interface CaptureFailure {
  symbol: string;
  interval: CandleInterval;
  error: string;
  retryable: boolean;
}

export interface TickSummary {
  tickId: string;
  startedAt: Date;
  finishedAt: Date;
  skipped: boolean;
  roundsSeen: number;
  ranked: string[];
  captured: string[];
  failures: CaptureFailure[];
  misses: CaptureMiss[];
}

export interface ExchangeConfig {
  name: string;
  baseUrl: string;
  quoteCoin: string;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  fundingBatchSize: number;
  fundingBatchDelayMs: number;
  rateLimits: {
    requests: number;
    interval: number;
  };
}

export interface LookbackConfig {
  dailyDaysBack: number;
  hourlyHoursBack: number;
  tenMinHoursBefore: number;
  oneMinMinutesBefore: number;
  oneMinMinutesAfter: number;
}

export type SinkType = 'csv' | 'supabase';

export interface CollectorConfig {
  tickIntervalMs: number;
  rankLeadTimeMs: number;
  captureLeadTimeMs: number;
  topNSymbols: number;
  requestTimeoutMs: number;
  retentionMs: number;
  logIntervalHours: number;
  lookback: LookbackConfig;
  sinkType: SinkType;
  outputDir: string;
  cacheDir: string;
}
