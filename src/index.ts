import * as dotenv from 'dotenv';
import * as cron from 'node-cron';
import { logger, logError } from './utils/logger';
import { buildCollectorConfig, reportCronExpression } from './config/collector.config';
import { SupabaseClientManager } from './database/supabase.client';
import { MexcExchange } from './exchanges/mexc/MexcExchange';
import type { IExchange } from './exchanges/interfaces/IExchange';
import type { IDataSink } from './sinks/interfaces/IDataSink';
import { CsvDataSink } from './sinks/CsvDataSink';
import { SupabaseDataSink } from './sinks/SupabaseDataSink';
import { CollectionScheduler } from './services/CollectionScheduler';
import { FileSnapshotStore } from './services/SnapshotStore';
import type { CollectorConfig } from './types/common';
import { ConfigurationError, toError } from './utils/errors';
import { MINUTE_MS } from './utils/helpers';

// Load environment variables
dotenv.config();

export class FundingCaptureEngine {
  private config: CollectorConfig;
  private exchange: IExchange;
  private scheduler: CollectionScheduler | null = null;
  private reportTask: cron.ScheduledTask | null = null;
  private startTime: Date;

  constructor(config: CollectorConfig = buildCollectorConfig(), exchange: IExchange = new MexcExchange()) {
    this.config = config;
    this.exchange = exchange;
    this.startTime = new Date();
  }

  public async start(): Promise<void> {
    logger.info('Starting Funding Capture Engine', {
      tickIntervalMinutes: this.config.tickIntervalMs / MINUTE_MS,
      rankLeadMinutes: this.config.rankLeadTimeMs / MINUTE_MS,
      captureLeadMinutes: this.config.captureLeadTimeMs / MINUTE_MS,
      topNSymbols: this.config.topNSymbols,
      sink: this.config.sinkType,
    });

    await this.exchange.initialize();
    const sink = await this.createSink();

    this.scheduler = new CollectionScheduler({
      fundingSource: this.exchange,
      candleSource: this.exchange,
      sink,
      store: new FileSnapshotStore(this.config.cacheDir),
      config: this.config,
    });

    await this.logUpcomingRounds(this.scheduler);

    // Run immediately once, then on the cron cadence
    await this.scheduler.tick();
    this.scheduler.start();

    this.reportTask = cron.schedule(reportCronExpression(this.config), () => this.reportStatus(), {
      timezone: 'Etc/UTC',
    });

    logger.info('Funding Capture Engine started successfully');
  }

  public async stop(): Promise<void> {
    try {
      logger.info('Stopping Funding Capture Engine');

      if (this.reportTask) {
        this.reportTask.stop();
        this.reportTask = null;
      }

      if (this.scheduler) {
        this.scheduler.stop();
        this.scheduler = null;
      }

      await this.exchange.disconnect();
      logger.info('Funding Capture Engine stopped successfully');
    } catch (error) {
      logError(toError(error), { context: 'stop' });
    }
  }

  private async createSink(): Promise<IDataSink> {
    if (this.config.sinkType === 'supabase') {
      const manager = SupabaseClientManager.getInstance();
      const unreadable = await manager.findUnreadableTables();
      if (unreadable.length > 0) {
        throw new ConfigurationError(
          `Supabase tables unavailable: ${unreadable.join(', ')} (see supabase/schema.sql)`
        );
      }
      return new SupabaseDataSink(manager.getClient());
    }

    logger.info(`Writing capture files to ${this.config.outputDir}`);
    return new CsvDataSink(this.config.outputDir);
  }

  private async logUpcomingRounds(scheduler: CollectionScheduler): Promise<void> {
    try {
      const rounds = await scheduler.upcomingRounds(5);
      logger.info('Upcoming funding rounds (UTC):');
      for (const round of rounds) {
        logger.info(`  ${round.eventKey} (${round.events.length} symbols)`);
      }
    } catch (error) {
      // Startup continues; the first tick retries the listing
      logError(toError(error), { context: 'logUpcomingRounds' });
    }
  }

  public getStatus() {
    return {
      uptime: (Date.now() - this.startTime.getTime()) / 1000, // in seconds
      exchange: this.exchange.getName(),
      sink: this.config.sinkType,
      scheduler: this.scheduler ? this.scheduler.getStatus() : null,
    };
  }

  private reportStatus(): void {
    const status = this.getStatus();
    logger.info('Status report', {
      uptimeSeconds: Math.round(status.uptime),
      exchange: status.exchange,
      sink: status.sink,
      ticks: status.scheduler?.tickCount ?? 0,
      skippedTicks: status.scheduler?.skippedTicks ?? 0,
      lastTickAt: status.scheduler?.lastTickAt?.toISOString() ?? null,
      cachedRounds: status.scheduler?.cachedRounds ?? [],
      pendingCaptures: status.scheduler?.pendingCaptures ?? [],
      recentMisses: status.scheduler?.misses.length ?? 0,
    });
  }
}

// Start the engine if this file is run directly
if (require.main === module) {
  const engine = new FundingCaptureEngine();

  // Stop cron tasks before exiting
  process.on('SIGINT', async () => {
    logger.info('Received SIGINT, shutting down gracefully...');
    await engine.stop();
    process.exit(0);
  });

  process.on('SIGTERM', async () => {
    logger.info('Received SIGTERM, shutting down gracefully...');
    await engine.stop();
    process.exit(0);
  });

  // Handle uncaught exceptions
  process.on('uncaughtException', async (error) => {
    logger.error('Uncaught exception:', error);
    await engine.stop();
    process.exit(1);
  });

  process.on('unhandledRejection', async (reason) => {
    logger.error('Unhandled rejection:', { reason: String(reason) });
    await engine.stop();
    process.exit(1);
  });

  engine.start().catch(async (error) => {
    logger.error('Failed to start engine:', error);
    await engine.stop();
    process.exit(1);
  });
}
