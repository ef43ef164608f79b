import type { FundingEvent, FundingRound, RankedRate, RankedSnapshot } from '../types/common';
import type { ISnapshotStore } from './SnapshotStore';
import { CacheConflict, toError } from '../utils/errors';
import { logError, logger } from '../utils/logger';

export interface RankingCacheOptions {
  captureLeadTimeMs: number;
  retentionMs: number;
  store?: ISnapshotStore;
}

const compareSymbols = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Top-N funding ranking per round. Holds at most one snapshot per eventKey;
 * a stored snapshot is never replaced, only evicted.
 */
export class SymbolRankingCache {
  private entries = new Map<string, RankedSnapshot>();
  private readonly captureLeadTimeMs: number;
  private readonly retentionMs: number;
  private readonly store?: ISnapshotStore;

  constructor(options: RankingCacheOptions) {
    this.captureLeadTimeMs = options.captureLeadTimeMs;
    this.retentionMs = options.retentionMs;
    this.store = options.store;
  }

  /**
   * Largest absolute funding rate first; equal magnitudes by symbol ascending.
   * Events without a finite rate are ignored. The input is left untouched.
   */
  public rank(events: readonly FundingEvent[], n: number): RankedRate[] {
    if (n <= 0) return [];

    return events
      .filter(event => Number.isFinite(event.fundingRate))
      .map(event => ({ symbol: event.symbol, fundingRate: event.fundingRate }))
      .sort(
        (a, b) =>
          Math.abs(b.fundingRate) - Math.abs(a.fundingRate) || compareSymbols(a.symbol, b.symbol)
      )
      .slice(0, n);
  }

  public buildSnapshot(round: FundingRound, n: number, computedAt: Date): RankedSnapshot {
    const rates = this.rank(round.events, n);
    return {
      eventKey: round.eventKey,
      fundingTime: round.fundingTime,
      topSymbols: rates.map(rate => rate.symbol),
      rates,
      computedAt,
    };
  }

  public async has(eventKey: string): Promise<boolean> {
    return (await this.get(eventKey)) !== undefined;
  }

  public async get(eventKey: string): Promise<RankedSnapshot | undefined> {
    const cached = this.entries.get(eventKey);
    if (cached || !this.store) return cached;

    const persisted = await this.store.loadRanking(eventKey);
    if (!persisted) return undefined;

    // A concurrent put may have claimed the key while the store was read
    const claimed = this.entries.get(eventKey);
    if (claimed) return claimed;

    logger.debug(`Restored ranking for ${eventKey} from snapshot store`);
    this.entries.set(eventKey, persisted);
    return persisted;
  }

  /**
   * Stores a snapshot unless one already exists for the key. Returns false on
   * conflict; the existing snapshot is kept.
   */
  public async put(eventKey: string, snapshot: RankedSnapshot): Promise<boolean> {
    if (this.entries.has(eventKey)) {
      this.warnConflict(eventKey);
      return false;
    }

    // Claim before any await so concurrent puts see the entry
    this.entries.set(eventKey, snapshot);
    if (!this.store) return true;

    const persisted = await this.store.loadRanking(eventKey);
    if (persisted) {
      this.entries.set(eventKey, persisted);
      this.warnConflict(eventKey);
      return false;
    }

    try {
      await this.store.saveRanking(snapshot);
    } catch (error) {
      // Kept in memory; only restart survivability is lost
      logError(toError(error), { context: 'SymbolRankingCache.put', eventKey });
    }
    return true;
  }

  /**
   * Drops snapshots whose capture window has closed (fundingTime + captureLeadTime
   * before `now`) or that are older than the retention horizon.
   */
  public async evict(now: Date): Promise<RankedSnapshot[]> {
    const expiryCutoff = now.getTime() - this.captureLeadTimeMs;
    const retentionCutoff = now.getTime() - this.retentionMs;
    const evicted: RankedSnapshot[] = [];

    for (const [eventKey, snapshot] of this.entries) {
      const expired = snapshot.fundingTime.getTime() < expiryCutoff;
      const stale = snapshot.computedAt.getTime() < retentionCutoff;
      if (!expired && !stale) continue;

      this.entries.delete(eventKey);
      evicted.push(snapshot);
      if (this.store) {
        await this.store.deleteRanking(eventKey);
      }
    }

    if (evicted.length > 0) {
      logger.debug(`Evicted ${evicted.length} rankings: ${evicted.map(s => s.eventKey).join(', ')}`);
    }
    return evicted;
  }

  public keys(): string[] {
    return Array.from(this.entries.keys());
  }

  public size(): number {
    return this.entries.size;
  }

  public clear(): void {
    this.entries.clear();
  }

  private warnConflict(eventKey: string): void {
    const conflict = new CacheConflict(eventKey);
    logger.warn(conflict.message, conflict.context);
  }
}
