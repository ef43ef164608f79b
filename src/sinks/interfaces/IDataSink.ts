import type { CandleRow, RankedSnapshot } from '../../types/common';

export interface IDataSink {
  /**
   * Record one batch of candles. Rewriting the same batch must not duplicate rows.
   */
  appendCandles(rows: CandleRow[]): Promise<void>;

  /**
   * Record the funding-rate ranking computed for a round
   */
  appendFundingSnapshot(snapshot: RankedSnapshot): Promise<void>;
}
