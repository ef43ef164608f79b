import type { SupabaseClient } from '@supabase/supabase-js';
import type { IDataSink } from './interfaces/IDataSink';
import type { CandleRow, RankedSnapshot } from '../types/common';
import type { FundingCandleModel, FundingSnapshotModel } from '../database/models';
import { tableNames } from '../config/database.config';
import { SinkWriteFailure } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Upserts on row identity, so replaying a batch leaves one row per candle.
 */
export class SupabaseDataSink implements IDataSink {
  private client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  public async appendCandles(rows: CandleRow[]): Promise<void> {
    if (rows.length === 0) return;

    const records: FundingCandleModel[] = rows.map(row => ({
      symbol: row.symbol,
      funding_time: row.fundingTime.toISOString(),
      interval: row.interval,
      timestamp: row.timestamp.toISOString(),
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    }));

    const { error } = await this.client
      .from(tableNames.fundingCandles)
      .upsert(records, { onConflict: 'symbol,funding_time,interval,timestamp' });

    if (error) {
      throw new SinkWriteFailure(`Error upserting candles: ${error.message}`, {
        table: tableNames.fundingCandles,
        rows: rows.length,
      });
    }

    logger.debug(`Upserted ${rows.length} candles into ${tableNames.fundingCandles}`);
  }

  public async appendFundingSnapshot(snapshot: RankedSnapshot): Promise<void> {
    const records: FundingSnapshotModel[] = snapshot.rates.map((rate, index) => ({
      event_key: snapshot.eventKey,
      funding_time: snapshot.fundingTime.toISOString(),
      rank: index + 1,
      symbol: rate.symbol,
      funding_rate: rate.fundingRate,
      computed_at: snapshot.computedAt.toISOString(),
    }));

    const { error } = await this.client
      .from(tableNames.fundingSnapshots)
      .upsert(records, { onConflict: 'event_key,symbol' });

    if (error) {
      throw new SinkWriteFailure(`Error upserting funding snapshot: ${error.message}`, {
        table: tableNames.fundingSnapshots,
        eventKey: snapshot.eventKey,
      });
    }
  }
}
