import * as fs from 'fs/promises';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { IDataSink } from './interfaces/IDataSink';
import type { CandleRow, RankedSnapshot } from '../types/common';
import { SinkWriteFailure, toError } from '../utils/errors';
import { formatFileTimestamp } from '../utils/helpers';
import { logger } from '../utils/logger';

export const CANDLE_HEADER = ['Symbol', 'FundingTime', 'Interval', 'Timestamp', 'Open', 'High', 'Low', 'Close', 'Volume'];
export const SNAPSHOT_HEADER = ['Rank', 'Symbol', 'FundingRate', 'FundingTime', 'ComputedAt'];

/**
 * Writes one CSV file per (symbol, round, interval) batch and one per ranking.
 * File names encode the round, so a rewrite replaces the earlier file.
 */
export class CsvDataSink implements IDataSink {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  public candleFilePath(symbol: string, fundingTime: Date, interval: string): string {
    return path.join(
      this.outputDir,
      `funding_data_${symbol}_${formatFileTimestamp(fundingTime)}_${interval}.csv`
    );
  }

  public snapshotFilePath(fundingTime: Date): string {
    return path.join(this.outputDir, `funding_snapshot_${formatFileTimestamp(fundingTime)}.csv`);
  }

  public async appendCandles(rows: CandleRow[]): Promise<void> {
    if (rows.length === 0) return;

    const { symbol, fundingTime, interval } = rows[0];
    const mixed = rows.some(
      row =>
        row.symbol !== symbol ||
        row.interval !== interval ||
        row.fundingTime.getTime() !== fundingTime.getTime()
    );
    if (mixed) {
      throw new SinkWriteFailure('Candle batch mixes symbols, rounds or intervals', { symbol, interval });
    }

    const records = rows.map(row => [
      row.symbol,
      row.fundingTime.toISOString(),
      row.interval,
      row.timestamp.toISOString(),
      row.open,
      row.high,
      row.low,
      row.close,
      row.volume,
    ]);

    const filePath = this.candleFilePath(symbol, fundingTime, interval);
    await this.writeFile(filePath, [CANDLE_HEADER, ...records]);
    logger.debug(`Wrote ${rows.length} ${interval} candles for ${symbol} to ${filePath}`);
  }

  public async appendFundingSnapshot(snapshot: RankedSnapshot): Promise<void> {
    const records = snapshot.rates.map((rate, index) => [
      index + 1,
      rate.symbol,
      rate.fundingRate,
      snapshot.fundingTime.toISOString(),
      snapshot.computedAt.toISOString(),
    ]);

    const filePath = this.snapshotFilePath(snapshot.fundingTime);
    await this.writeFile(filePath, [SNAPSHOT_HEADER, ...records]);
    logger.debug(`Wrote funding snapshot for ${snapshot.eventKey} to ${filePath}`);
  }

  private async writeFile(filePath: string, records: (string | number)[][]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, stringify(records));
    } catch (error) {
      throw new SinkWriteFailure(`Failed to write ${filePath}: ${toError(error).message}`, { filePath });
    }
  }
}
