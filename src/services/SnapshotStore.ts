import * as fs from 'fs/promises';
import * as path from 'path';
import type { RankedSnapshot } from '../types/common';
import { fromSafeKey, generateUUID, toSafeKey } from '../utils/helpers';
import { logger } from '../utils/logger';

/**
 * Persists rankings and capture-completion markers per round, so a restarted
 * process neither re-ranks nor re-captures a round it already finished.
 */
export interface ISnapshotStore {
  loadRanking(eventKey: string): Promise<RankedSnapshot | null>;
  saveRanking(snapshot: RankedSnapshot): Promise<void>;
  deleteRanking(eventKey: string): Promise<void>;
  isCaptured(eventKey: string): Promise<boolean>;
  markCaptured(eventKey: string, at: Date): Promise<void>;
  /** Remove every ranking and marker whose round is earlier than `olderThan`. Returns the count removed. */
  cleanup(olderThan: Date): Promise<number>;
}

interface StoredRanking {
  eventKey: string;
  fundingTime: string;
  topSymbols: string[];
  rates: { symbol: string; fundingRate: number }[];
  computedAt: string;
}

const RANKING_PREFIX = 'ranking_';
const CAPTURED_PREFIX = 'captured_';

const isStoredRanking = (value: unknown): value is StoredRanking => {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'eventKey' in value &&
    typeof value.eventKey === 'string' &&
    'fundingTime' in value &&
    typeof value.fundingTime === 'string' &&
    'computedAt' in value &&
    typeof value.computedAt === 'string' &&
    'topSymbols' in value &&
    Array.isArray(value.topSymbols) &&
    'rates' in value &&
    Array.isArray(value.rates)
  );
};

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

export class FileSnapshotStore implements ISnapshotStore {
  private readonly cacheDir: string;

  constructor(cacheDir: string) {
    this.cacheDir = cacheDir;
  }

  private rankingPath(eventKey: string): string {
    return path.join(this.cacheDir, `${RANKING_PREFIX}${toSafeKey(eventKey)}.json`);
  }

  private capturedPath(eventKey: string): string {
    return path.join(this.cacheDir, `${CAPTURED_PREFIX}${toSafeKey(eventKey)}.json`);
  }

  public async loadRanking(eventKey: string): Promise<RankedSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.rankingPath(eventKey), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      logger.warn(`Ignoring unreadable ranking file for ${eventKey}: ${error.message}`);
      return null;
    }

    if (!isStoredRanking(parsed)) {
      logger.warn(`Ignoring malformed ranking file for ${eventKey}`);
      return null;
    }

    return {
      eventKey: parsed.eventKey,
      fundingTime: new Date(parsed.fundingTime),
      topSymbols: [...parsed.topSymbols],
      rates: parsed.rates.map(rate => ({ symbol: rate.symbol, fundingRate: rate.fundingRate })),
      computedAt: new Date(parsed.computedAt),
    };
  }

  public async saveRanking(snapshot: RankedSnapshot): Promise<void> {
    const stored: StoredRanking = {
      eventKey: snapshot.eventKey,
      fundingTime: snapshot.fundingTime.toISOString(),
      topSymbols: snapshot.topSymbols,
      rates: snapshot.rates,
      computedAt: snapshot.computedAt.toISOString(),
    };

    await this.writeAtomic(this.rankingPath(snapshot.eventKey), JSON.stringify(stored, null, 2));
  }

  public async deleteRanking(eventKey: string): Promise<void> {
    await fs.rm(this.rankingPath(eventKey), { force: true });
  }

  public async isCaptured(eventKey: string): Promise<boolean> {
    try {
      await fs.access(this.capturedPath(eventKey));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  public async markCaptured(eventKey: string, at: Date): Promise<void> {
    await this.writeAtomic(
      this.capturedPath(eventKey),
      JSON.stringify({ eventKey, capturedAt: at.toISOString() })
    );
  }

  // Readers see the old file or the whole new one, never a partial write
  private async writeAtomic(filePath: string, content: string): Promise<void> {
    await fs.mkdir(this.cacheDir, { recursive: true });
    const tmpPath = `${filePath}.${generateUUID()}.tmp`;
    try {
      await fs.writeFile(tmpPath, content);
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }

  public async cleanup(olderThan: Date): Promise<number> {
    let files: string[];
    try {
      files = await fs.readdir(this.cacheDir);
    } catch (error) {
      if (isMissingFile(error)) return 0;
      throw error;
    }

    let removed = 0;
    for (const file of files) {
      const prefix = [RANKING_PREFIX, CAPTURED_PREFIX].find(p => file.startsWith(p));
      if (!prefix || !file.endsWith('.json')) continue;

      // Skip files whose names do not carry a round timestamp
      const roundTime = fromSafeKey(file.slice(prefix.length, -'.json'.length));
      if (!roundTime || roundTime >= olderThan) continue;

      await fs.rm(path.join(this.cacheDir, file), { force: true });
      removed++;
    }

    if (removed > 0) {
      logger.debug(`Removed ${removed} expired cache files from ${this.cacheDir}`);
    }
    return removed;
  }
}

export class InMemorySnapshotStore implements ISnapshotStore {
  private rankings = new Map<string, RankedSnapshot>();
  private captured = new Map<string, Date>();

  public async loadRanking(eventKey: string): Promise<RankedSnapshot | null> {
    return this.rankings.get(eventKey) ?? null;
  }

  public async saveRanking(snapshot: RankedSnapshot): Promise<void> {
    this.rankings.set(snapshot.eventKey, snapshot);
  }

  public async deleteRanking(eventKey: string): Promise<void> {
    this.rankings.delete(eventKey);
  }

  public async isCaptured(eventKey: string): Promise<boolean> {
    return this.captured.has(eventKey);
  }

  public async markCaptured(eventKey: string, at: Date): Promise<void> {
    this.captured.set(eventKey, at);
  }

  public async cleanup(olderThan: Date): Promise<number> {
    let removed = 0;
    for (const entries of [this.rankings, this.captured]) {
      for (const key of [...entries.keys()]) {
        if (new Date(key) < olderThan) {
          entries.delete(key);
          removed++;
        }
      }
    }
    return removed;
  }
}
