import { describe, it, expect } from 'vitest';
import { buildCollectorConfig, reportCronExpression, tickCronExpression } from '../collector.config';
import { ConfigurationError } from '../../utils/errors';

describe('buildCollectorConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = buildCollectorConfig({});

    expect(config.tickIntervalMs).toBe(5 * 60_000);
    expect(config.rankLeadTimeMs).toBe(15 * 60_000);
    expect(config.captureLeadTimeMs).toBe(10 * 60_000);
    expect(config.topNSymbols).toBe(3);
    expect(config.requestTimeoutMs).toBe(10_000);
    expect(config.retentionMs).toBe(24 * 3_600_000);
    expect(config.lookback).toEqual({
      dailyDaysBack: 3,
      hourlyHoursBack: 4,
      tenMinHoursBefore: 1,
      oneMinMinutesBefore: 10,
      oneMinMinutesAfter: 10,
    });
    expect(config.sinkType).toBe('csv');
    expect(config.outputDir).toBe('data');
    expect(config.cacheDir).toBe('cache/funding_rates');
  });

  it('reads overrides from the environment', () => {
    const config = buildCollectorConfig({
      TICK_INTERVAL_MINUTES: '1',
      RANK_LEAD_MINUTES: '20',
      CAPTURE_LEAD_MINUTES: '5',
      TOP_N_SYMBOLS: '10',
      SINK_TYPE: 'Supabase',
      OUTPUT_DIR: '/tmp/out',
    });

    expect(config.tickIntervalMs).toBe(60_000);
    expect(config.rankLeadTimeMs).toBe(20 * 60_000);
    expect(config.captureLeadTimeMs).toBe(5 * 60_000);
    expect(config.topNSymbols).toBe(10);
    expect(config.sinkType).toBe('supabase');
    expect(config.outputDir).toBe('/tmp/out');
  });

  it('rejects a tick that does not divide the hour', () => {
    expect(() => buildCollectorConfig({ TICK_INTERVAL_MINUTES: '7' })).toThrow(ConfigurationError);
  });

  it('rejects a capture lead that is not before the rank lead', () => {
    expect(() =>
      buildCollectorConfig({ RANK_LEAD_MINUTES: '10', CAPTURE_LEAD_MINUTES: '10' })
    ).toThrow(ConfigurationError);
  });

  it('rejects a retention that does not outlast the rank lead', () => {
    expect(() => buildCollectorConfig({ CACHE_RETENTION_HOURS: '0.1' })).toThrow(ConfigurationError);
    expect(() => buildCollectorConfig({ CACHE_RETENTION_HOURS: '0.25' })).toThrow(ConfigurationError);
    expect(buildCollectorConfig({ CACHE_RETENTION_HOURS: '0.5' }).retentionMs).toBe(30 * 60_000);
  });

  it('rejects unknown sinks', () => {
    expect(() => buildCollectorConfig({ SINK_TYPE: 'parquet' })).toThrow(ConfigurationError);
  });

  it('rejects non-positive and non-numeric values', () => {
    expect(() => buildCollectorConfig({ TOP_N_SYMBOLS: '-1' })).toThrow(ConfigurationError);
    expect(() => buildCollectorConfig({ REQUEST_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => buildCollectorConfig({ TOP_N_SYMBOLS: '2.5' })).toThrow(ConfigurationError);
  });
});

describe('cron expressions', () => {
  it('derives the tick and report schedules', () => {
    const config = buildCollectorConfig({ TICK_INTERVAL_MINUTES: '5', LOG_INTERVAL_HOURS: '2' });

    expect(tickCronExpression(config)).toBe('*/5 * * * *');
    expect(reportCronExpression(config)).toBe('0 */2 * * *');
  });
});
