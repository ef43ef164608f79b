import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileSnapshotStore, InMemorySnapshotStore } from '../SnapshotStore';
import type { RankedSnapshot } from '../../types/common';

const T = new Date('2025-08-02T16:00:00.000Z');
const LATER = new Date('2025-08-03T00:00:00.000Z');

const snapshotAt = (fundingTime: Date): RankedSnapshot => ({
  eventKey: fundingTime.toISOString(),
  fundingTime,
  topSymbols: ['ETH_USDT', 'BTC_USDT'],
  rates: [
    { symbol: 'ETH_USDT', fundingRate: -0.05 },
    { symbol: 'BTC_USDT', fundingRate: 0.02 },
  ],
  computedAt: new Date(fundingTime.getTime() - 15 * 60_000),
});

describe('FileSnapshotStore', () => {
  let dir: string;
  let store: FileSnapshotStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'snapshot-store-'));
    store = new FileSnapshotStore(path.join(dir, 'cache'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns null for a round it has never seen', async () => {
    expect(await store.loadRanking(T.toISOString())).toBeNull();
    expect(await store.isCaptured(T.toISOString())).toBe(false);
  });

  it('round-trips a ranking with its dates', async () => {
    const snapshot = snapshotAt(T);
    await store.saveRanking(snapshot);

    expect(await store.loadRanking(T.toISOString())).toEqual(snapshot);
    const files = await fs.readdir(path.join(dir, 'cache'));
    expect(files).toEqual(['ranking_2025-08-02T16-00-00.000Z.json']);
  });

  it('treats a truncated ranking file as missing', async () => {
    await fs.mkdir(path.join(dir, 'cache'), { recursive: true });
    await fs.writeFile(
      path.join(dir, 'cache', 'ranking_2025-08-02T16-00-00.000Z.json'),
      '{"eventKey": "2025-08-02T16:00'
    );

    expect(await store.loadRanking(T.toISOString())).toBeNull();
  });

  it('replaces a ranking file without leaving temporary files', async () => {
    await store.saveRanking(snapshotAt(T));
    await store.saveRanking({ ...snapshotAt(T), topSymbols: ['BTC_USDT'] });
    await store.markCaptured(T.toISOString(), T);

    const files = (await fs.readdir(path.join(dir, 'cache'))).sort();
    expect(files).toEqual([
      'captured_2025-08-02T16-00-00.000Z.json',
      'ranking_2025-08-02T16-00-00.000Z.json',
    ]);
    expect((await store.loadRanking(T.toISOString()))?.topSymbols).toEqual(['BTC_USDT']);
  });

  it('reports marker read errors other than a missing file', async () => {
    const notADirectory = path.join(dir, 'plain-file');
    await fs.writeFile(notADirectory, 'x');
    const broken = new FileSnapshotStore(notADirectory);

    await expect(broken.isCaptured(T.toISOString())).rejects.toHaveProperty('code', 'ENOTDIR');
  });

  it('deletes a ranking', async () => {
    await store.saveRanking(snapshotAt(T));
    await store.deleteRanking(T.toISOString());

    expect(await store.loadRanking(T.toISOString())).toBeNull();
  });

  it('records capture markers', async () => {
    await store.markCaptured(T.toISOString(), new Date(T.getTime() - 10 * 60_000));

    expect(await store.isCaptured(T.toISOString())).toBe(true);
    expect(await store.isCaptured(LATER.toISOString())).toBe(false);
  });

  it('cleans up rounds before the cutoff and ignores foreign files', async () => {
    await store.saveRanking(snapshotAt(T));
    await store.markCaptured(T.toISOString(), T);
    await store.saveRanking(snapshotAt(LATER));
    await fs.writeFile(path.join(dir, 'cache', 'ranking_latest.json'), '{}');
    await fs.writeFile(path.join(dir, 'cache', 'notes.txt'), 'keep');

    const removed = await store.cleanup(new Date('2025-08-02T20:00:00.000Z'));

    expect(removed).toBe(2);
    const files = (await fs.readdir(path.join(dir, 'cache'))).sort();
    expect(files).toEqual(['notes.txt', 'ranking_2025-08-03T00-00-00.000Z.json', 'ranking_latest.json']);
  });

  it('cleans up nothing when the directory does not exist', async () => {
    expect(await store.cleanup(LATER)).toBe(0);
  });
});

describe('InMemorySnapshotStore', () => {
  it('cleans up rankings and markers before the cutoff', async () => {
    const store = new InMemorySnapshotStore();
    await store.saveRanking(snapshotAt(T));
    await store.markCaptured(T.toISOString(), T);
    await store.saveRanking(snapshotAt(LATER));

    expect(await store.cleanup(new Date('2025-08-02T20:00:00.000Z'))).toBe(2);
    expect(await store.loadRanking(T.toISOString())).toBeNull();
    expect(await store.isCaptured(T.toISOString())).toBe(false);
    expect(await store.loadRanking(LATER.toISOString())).not.toBeNull();
  });
});
