import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { InMemorySnapshotStore, JsonFileSnapshotStore } from '../storage/snapshot-store.js';
import { hoursAfter, makeMarket } from './fixtures.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const T0 = new Date('2024-05-01T00:00:00.000Z');

describe('InMemorySnapshotStore', () => {
    it('should report whether an upserted market is new', async () => {
        const store = new InMemorySnapshotStore();

        expect(await store.upsertMarket(makeMarket())).toBe(true);
        expect(await store.upsertMarket(makeMarket({ volume: 300000 }))).toBe(false);
        expect((await store.getMarket('mkt-1'))?.volume).toBe(300000);
        expect(await store.getMarket('missing')).toBeNull();
    });

    it('should keep snapshots ordered even when appended out of order', async () => {
        const store = new InMemorySnapshotStore();
        for (const hours of [2, 0, 1]) {
            await store.appendSnapshot({ marketId: 'm', timestamp: hoursAfter(T0, hours), probability: hours / 10, source: 'snapshot' });
        }

        const snapshots = await store.snapshotsFor('m');

        expect(snapshots.map(s => s.probability)).toEqual([0, 0.1, 0.2]);
    });

    it('should hand out copies of the snapshot list', async () => {
        const store = new InMemorySnapshotStore();
        await store.appendSnapshot({ marketId: 'm', timestamp: T0, probability: 0.5, source: 'snapshot' });

        (await store.snapshotsFor('m')).pop();

        expect(await store.snapshotsFor('m')).toHaveLength(1);
    });
});

describe('JsonFileSnapshotStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'snapshot-store-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('should start empty when the file does not exist', async () => {
        const store = new JsonFileSnapshotStore(path.join(dir, 'missing.json'));
        await store.load();

        expect(await store.listMarkets()).toEqual([]);
    });

    it('should round-trip markets and snapshots through the file', async () => {
        const filePath = path.join(dir, 'nested', 'store.json');
        const store = new JsonFileSnapshotStore(filePath);
        await store.load();
        await store.upsertMarket(makeMarket({ outcome: null }));
        await store.appendSnapshot({ marketId: 'mkt-1', timestamp: T0, probability: 0.61, source: 'snapshot' });
        await store.flush();

        const reloaded = new JsonFileSnapshotStore(filePath);
        await reloaded.load();

        expect(await reloaded.getMarket('mkt-1')).toEqual(makeMarket({ outcome: null }));
        expect(await reloaded.snapshotsFor('mkt-1')).toEqual([
            { marketId: 'mkt-1', timestamp: T0, probability: 0.61, source: 'snapshot' },
        ]);
    });

    it('should let overlapping flushes all complete with the latest state', async () => {
        const filePath = path.join(dir, 'store.json');
        const store = new JsonFileSnapshotStore(filePath);
        await store.load();
        await store.upsertMarket(makeMarket({ outcome: null }));

        const first = store.flush();
        await store.appendSnapshot({ marketId: 'mkt-1', timestamp: T0, probability: 0.42, source: 'snapshot' });
        await Promise.all([first, store.flush(), store.flush()]);

        const reloaded = new JsonFileSnapshotStore(filePath);
        await reloaded.load();

        expect((await reloaded.snapshotsFor('mkt-1')).map(s => s.probability)).toEqual([0.42]);
        await expect(fs.readdir(dir)).resolves.toEqual(['store.json']);
    });
});
