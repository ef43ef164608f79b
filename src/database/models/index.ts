// Database model interfaces

export interface FundingCandleModel {
  symbol: string;
  funding_time: string;
  interval: string;
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface FundingSnapshotModel {
  event_key: string;
  funding_time: string;
  rank: number;
  symbol: string;
  funding_rate: number;
  computed_at: string;
}
