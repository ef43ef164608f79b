import * as cron from 'node-cron';
import type { ICandleSource, IFundingRateSource } from '../exchanges/interfaces/IExchange';
import type { IDataSink } from '../sinks/interfaces/IDataSink';
import type {
  CaptureMiss,
  CollectorConfig,
  FundingEvent,
  FundingRound,
  MissReason,
  RankedSnapshot,
  TickSummary,
} from '../types/common';
import type { ISnapshotStore } from './SnapshotStore';
import { SymbolRankingCache } from './SymbolRankingCache';
import { allPairs, CandleCapture, type CapturePair, pairKey } from './CandleCapture';
import { tickCronExpression } from '../config/collector.config';
import { writeWithRetry } from '../sinks/retry';
import { toError } from '../utils/errors';
import { bucketTime, generateUUID, toEventKey } from '../utils/helpers';
import { logCapture, logError, logger, logMiss, logRanking, logTick } from '../utils/logger';

export interface CollectionSchedulerDeps {
  fundingSource: IFundingRateSource;
  candleSource: ICandleSource;
  sink: IDataSink;
  store: ISnapshotStore;
  config: CollectorConfig;
  clock?: () => Date;
}

interface PendingCapture {
  snapshot: RankedSnapshot;
  pairs: Map<string, CapturePair>;
}

const MAX_RECORDED_MISSES = 200;

/**
 * Ranks each funding round once at the rank lead time, then captures candles for
 * the ranked symbols once at the capture lead time. One tick at a time: a tick
 * that fires while another is running is skipped.
 *
 * Per round: Unseen -> Ranked -> Captured -> Expired.
 */
export class CollectionScheduler {
  private readonly cache: SymbolRankingCache;
  private readonly capture: CandleCapture;
  private readonly fundingSource: IFundingRateSource;
  private readonly sink: IDataSink;
  private readonly store: ISnapshotStore;
  private readonly config: CollectorConfig;
  private readonly clock: () => Date;

  private pending = new Map<string, PendingCapture>();
  private droppedRounds = new Set<string>();
  private misses: CaptureMiss[] = [];
  private task: cron.ScheduledTask | null = null;
  private isTicking = false;
  private tickCount = 0;
  private skippedTicks = 0;
  private lastTickAt: Date | null = null;

  constructor(deps: CollectionSchedulerDeps) {
    this.fundingSource = deps.fundingSource;
    this.sink = deps.sink;
    this.store = deps.store;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
    this.cache = new SymbolRankingCache({
      captureLeadTimeMs: deps.config.captureLeadTimeMs,
      retentionMs: deps.config.retentionMs,
      store: deps.store,
    });
    this.capture = new CandleCapture(deps.candleSource, deps.sink, {
      lookback: deps.config.lookback,
      requestTimeoutMs: deps.config.requestTimeoutMs,
    });
  }

  public start(): void {
    if (this.task) {
      logger.warn('CollectionScheduler is already running');
      return;
    }

    const expression = tickCronExpression(this.config);
    this.task = cron.schedule(
      expression,
      () => {
        this.tick().catch(error => {
          logError(toError(error), { context: 'CollectionScheduler.tick' });
        });
      },
      { timezone: 'Etc/UTC' }
    );
    logger.info(`CollectionScheduler started (${expression})`);
  }

  public stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
    this.cache.clear();
    this.pending.clear();
    this.droppedRounds.clear();
    logger.info('CollectionScheduler stopped');
  }

  public getCache(): SymbolRankingCache {
    return this.cache;
  }

  public async tick(now: Date = this.clock()): Promise<TickSummary> {
    const summary: TickSummary = {
      tickId: generateUUID(),
      startedAt: now,
      finishedAt: now,
      skipped: false,
      roundsSeen: 0,
      ranked: [],
      captured: [],
      failures: [],
      misses: [],
    };

    if (this.isTicking) {
      this.skippedTicks++;
      summary.skipped = true;
      logger.warn(`Previous tick still running, skipping tick ${summary.tickId}`);
      return summary;
    }

    this.isTicking = true;
    try {
      await this.runTick(now, summary);
    } catch (error) {
      logError(toError(error), { context: 'tick', tickId: summary.tickId });
    } finally {
      this.isTicking = false;
      this.tickCount++;
      this.lastTickAt = now;
      summary.finishedAt = this.clock();
      logTick(summary);
    }

    return summary;
  }

  private async runTick(now: Date, summary: TickSummary): Promise<void> {
    this.dropElapsedCaptures(now, summary);
    await this.expireRounds(now, summary);

    let events: FundingEvent[];
    try {
      events = await this.fundingSource.listFundingEvents();
    } catch (error) {
      logError(toError(error), { context: 'listFundingEvents', tickId: summary.tickId });
      await this.retryPendingCaptures(now, new Set(), summary);
      return;
    }

    const rounds = this.groupRounds(events);
    summary.roundsSeen = rounds.length;

    const processed = new Set<string>();
    for (const round of rounds) {
      processed.add(round.eventKey);
      try {
        await this.processRound(round, now, summary);
      } catch (error) {
        logError(toError(error), { context: 'processRound', eventKey: round.eventKey });
      }
    }

    await this.retryPendingCaptures(now, processed, summary);
  }

  public groupRounds(events: readonly FundingEvent[]): FundingRound[] {
    const rounds = new Map<string, FundingRound>();

    for (const event of events) {
      const eventKey = toEventKey(event.fundingTime, this.config.tickIntervalMs);
      let round = rounds.get(eventKey);
      if (!round) {
        round = {
          eventKey,
          fundingTime: bucketTime(event.fundingTime, this.config.tickIntervalMs),
          events: [],
        };
        rounds.set(eventKey, round);
      }
      round.events.push(event);
    }

    return Array.from(rounds.values()).sort(
      (a, b) => a.fundingTime.getTime() - b.fundingTime.getTime()
    );
  }

  /** `fundingTime - now` within [leadTime - tickInterval, leadTime]. */
  public isInWindow(fundingTime: Date, now: Date, leadTimeMs: number): boolean {
    const lead = fundingTime.getTime() - now.getTime();
    return lead >= leadTimeMs - this.config.tickIntervalMs && lead <= leadTimeMs;
  }

  private async processRound(round: FundingRound, now: Date, summary: TickSummary): Promise<void> {
    // Ranking first, so a tick inside both windows captures from a fresh ranking
    if (this.isInWindow(round.fundingTime, now, this.config.rankLeadTimeMs)) {
      if (!(await this.cache.has(round.eventKey))) {
        await this.rankRound(round, now, summary);
      }
    }

    if (this.isInWindow(round.fundingTime, now, this.config.captureLeadTimeMs)) {
      await this.captureRound(round, now, summary);
    }
  }

  private async rankRound(round: FundingRound, now: Date, summary: TickSummary): Promise<RankedSnapshot> {
    const snapshot = this.cache.buildSnapshot(round, this.config.topNSymbols, now);
    const stored = await this.cache.put(round.eventKey, snapshot);
    if (!stored) {
      return (await this.cache.get(round.eventKey)) ?? snapshot;
    }

    summary.ranked.push(round.eventKey);
    logRanking(snapshot);
    await writeWithRetry(() => this.sink.appendFundingSnapshot(snapshot), {
      eventKey: round.eventKey,
      kind: 'funding_snapshot',
    });
    return snapshot;
  }

  private async captureRound(round: FundingRound, now: Date, summary: TickSummary): Promise<void> {
    if (this.droppedRounds.has(round.eventKey) || (await this.store.isCaptured(round.eventKey))) {
      return;
    }

    let snapshot = this.pending.get(round.eventKey)?.snapshot ?? (await this.cache.get(round.eventKey));
    if (!snapshot) {
      logger.warn(`No ranking for round ${round.eventKey} at capture time, ranking from current data`);
      snapshot = await this.rankRound(round, now, summary);
    }

    await this.runCapture(snapshot, now, summary);
  }

  private async runCapture(snapshot: RankedSnapshot, now: Date, summary: TickSummary): Promise<void> {
    const { eventKey } = snapshot;
    let entry = this.pending.get(eventKey);
    if (!entry) {
      const pairs = allPairs(snapshot.topSymbols);
      entry = { snapshot, pairs: new Map(pairs.map(pair => [pairKey(pair), pair])) };
      this.pending.set(eventKey, entry);
    }

    const result = await this.capture.capture(snapshot, Array.from(entry.pairs.values()));

    for (const pair of result.completed) {
      entry.pairs.delete(pairKey(pair));
    }

    for (const failure of result.failures) {
      if (!failure.retryable) {
        entry.pairs.delete(pairKey(failure));
        this.recordMiss(summary, eventKey, 'symbol_not_found', now, failure.symbol, failure.interval);
      }
    }
    summary.failures.push(...result.failures);

    const complete = entry.pairs.size === 0;
    logCapture({
      eventKey,
      symbols: snapshot.topSymbols,
      rows: result.rows,
      failed: result.failures.length,
      complete,
    });

    if (complete) {
      this.pending.delete(eventKey);
      summary.captured.push(eventKey);
      try {
        await this.store.markCaptured(eventKey, now);
      } catch (error) {
        logError(toError(error), { context: 'markCaptured', eventKey });
      }
    }
  }

  // Pending captures whose round was not reported this tick but is still in window
  private async retryPendingCaptures(now: Date, processed: Set<string>, summary: TickSummary): Promise<void> {
    for (const [eventKey, entry] of Array.from(this.pending)) {
      if (processed.has(eventKey)) continue;
      if (!this.isInWindow(entry.snapshot.fundingTime, now, this.config.captureLeadTimeMs)) continue;

      try {
        await this.runCapture(entry.snapshot, now, summary);
      } catch (error) {
        logError(toError(error), { context: 'retryPendingCaptures', eventKey });
      }
    }
  }

  private dropElapsedCaptures(now: Date, summary: TickSummary): void {
    const windowStart = this.config.captureLeadTimeMs - this.config.tickIntervalMs;

    for (const [eventKey, entry] of Array.from(this.pending)) {
      const lead = entry.snapshot.fundingTime.getTime() - now.getTime();
      if (lead >= windowStart) continue;

      for (const pair of entry.pairs.values()) {
        this.recordMiss(summary, eventKey, 'capture_window_elapsed', now, pair.symbol, pair.interval);
      }
      this.pending.delete(eventKey);
      this.droppedRounds.add(eventKey);
    }
  }

  private async expireRounds(now: Date, summary: TickSummary): Promise<void> {
    const evicted = await this.cache.evict(now);

    for (const snapshot of evicted) {
      const dropped = this.droppedRounds.delete(snapshot.eventKey);
      if (!dropped && !(await this.store.isCaptured(snapshot.eventKey))) {
        this.recordMiss(summary, snapshot.eventKey, 'never_captured', now);
      }
    }

    // Dropped rounds whose ranking was never held in memory
    const expiryCutoff = now.getTime() - this.config.captureLeadTimeMs;
    for (const eventKey of Array.from(this.droppedRounds)) {
      if (new Date(eventKey).getTime() < expiryCutoff) {
        this.droppedRounds.delete(eventKey);
      }
    }

    await this.store.cleanup(new Date(expiryCutoff));
  }

  private recordMiss(
    summary: TickSummary,
    eventKey: string,
    reason: MissReason,
    now: Date,
    symbol?: string,
    interval?: CapturePair['interval']
  ): void {
    const miss: CaptureMiss = { eventKey, reason, recordedAt: now, symbol, interval };
    summary.misses.push(miss);
    this.misses.push(miss);
    if (this.misses.length > MAX_RECORDED_MISSES) {
      this.misses.splice(0, this.misses.length - MAX_RECORDED_MISSES);
    }
    logMiss(miss);
  }

  /** Next distinct funding rounds after `now`, for startup logging. */
  public async upcomingRounds(limit: number, now: Date = this.clock()): Promise<FundingRound[]> {
    const events = await this.fundingSource.listFundingEvents();
    return this.groupRounds(events)
      .filter(round => round.fundingTime > now)
      .slice(0, limit);
  }

  public getStatus(): {
    isRunning: boolean;
    isTicking: boolean;
    tickCount: number;
    skippedTicks: number;
    lastTickAt: Date | null;
    cachedRounds: string[];
    pendingCaptures: string[];
    misses: CaptureMiss[];
  } {
    return {
      isRunning: this.task !== null,
      isTicking: this.isTicking,
      tickCount: this.tickCount,
      skippedTicks: this.skippedTicks,
      lastTickAt: this.lastTickAt,
      cachedRounds: this.cache.keys(),
      pendingCaptures: Array.from(this.pending.keys()),
      misses: [...this.misses],
    };
  }
}
