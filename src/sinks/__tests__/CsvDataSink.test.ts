import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CsvDataSink } from '../CsvDataSink';
import { writeWithRetry } from '../retry';
import { SinkWriteFailure } from '../../utils/errors';
import type { CandleRow, RankedSnapshot } from '../../types/common';

const T = new Date('2025-08-02T16:00:00.000Z');

const row = (timestamp: string, close: number, overrides: Partial<CandleRow> = {}): CandleRow => ({
  symbol: 'ETH_USDT',
  fundingTime: T,
  interval: '1m',
  timestamp: new Date(timestamp),
  open: 3500,
  high: 3510.5,
  low: 3490,
  close,
  volume: 12,
  ...overrides,
});

describe('CsvDataSink', () => {
  let dir: string;
  let sink: CsvDataSink;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'csv-sink-'));
    sink = new CsvDataSink(path.join(dir, 'data'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes one file per symbol, round and interval', async () => {
    await sink.appendCandles([row('2025-08-02T15:50:00.000Z', 3505), row('2025-08-02T15:51:00.000Z', 3501)]);

    const file = path.join(dir, 'data', 'funding_data_ETH_USDT_2025-08-02_16-00_1m.csv');
    expect(sink.candleFilePath('ETH_USDT', T, '1m')).toBe(file);
    expect(await fs.readFile(file, 'utf8')).toBe(
      'Symbol,FundingTime,Interval,Timestamp,Open,High,Low,Close,Volume\n' +
        'ETH_USDT,2025-08-02T16:00:00.000Z,1m,2025-08-02T15:50:00.000Z,3500,3510.5,3490,3505,12\n' +
        'ETH_USDT,2025-08-02T16:00:00.000Z,1m,2025-08-02T15:51:00.000Z,3500,3510.5,3490,3501,12\n'
    );
  });

  it('replaces the file when a batch is written again', async () => {
    await sink.appendCandles([row('2025-08-02T15:50:00.000Z', 3505), row('2025-08-02T15:51:00.000Z', 3501)]);
    await sink.appendCandles([row('2025-08-02T15:50:00.000Z', 3505), row('2025-08-02T15:51:00.000Z', 3501)]);

    const content = await fs.readFile(sink.candleFilePath('ETH_USDT', T, '1m'), 'utf8');
    expect(content.trim().split('\n')).toHaveLength(3);
  });

  it('writes nothing for an empty batch', async () => {
    await sink.appendCandles([]);

    await expect(fs.readdir(path.join(dir, 'data'))).rejects.toThrow();
  });

  it('rejects a batch that mixes intervals', async () => {
    const batch = [row('2025-08-02T15:50:00.000Z', 3505), row('2025-08-02T15:00:00.000Z', 3501, { interval: '1h' })];

    await expect(sink.appendCandles(batch)).rejects.toBeInstanceOf(SinkWriteFailure);
  });

  it('writes the ranking snapshot in rank order', async () => {
    const snapshot: RankedSnapshot = {
      eventKey: T.toISOString(),
      fundingTime: T,
      topSymbols: ['ETH_USDT', 'BTC_USDT'],
      rates: [
        { symbol: 'ETH_USDT', fundingRate: -0.05 },
        { symbol: 'BTC_USDT', fundingRate: 0.02 },
      ],
      computedAt: new Date('2025-08-02T15:45:00.000Z'),
    };

    await sink.appendFundingSnapshot(snapshot);

    expect(await fs.readFile(path.join(dir, 'data', 'funding_snapshot_2025-08-02_16-00.csv'), 'utf8')).toBe(
      'Rank,Symbol,FundingRate,FundingTime,ComputedAt\n' +
        '1,ETH_USDT,-0.05,2025-08-02T16:00:00.000Z,2025-08-02T15:45:00.000Z\n' +
        '2,BTC_USDT,0.02,2025-08-02T16:00:00.000Z,2025-08-02T15:45:00.000Z\n'
    );
  });
});

describe('writeWithRetry', () => {
  it('succeeds on the second attempt', async () => {
    const write = vi
      .fn<[], Promise<void>>()
      .mockRejectedValueOnce(new Error('disk busy'))
      .mockResolvedValueOnce(undefined);

    expect(await writeWithRetry(write, { symbol: 'ETH_USDT' })).toBe(true);
    expect(write).toHaveBeenCalledTimes(2);
  });

  it('drops the batch after two failures', async () => {
    const write = vi.fn<[], Promise<void>>().mockRejectedValue(new Error('disk full'));

    expect(await writeWithRetry(write, { symbol: 'ETH_USDT' })).toBe(false);
    expect(write).toHaveBeenCalledTimes(2);
  });
});
