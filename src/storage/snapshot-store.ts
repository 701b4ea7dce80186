/**
 * Snapshot Store
 * Locally collected markets and their point-in-time probability readings.
 * Feeds the large-move detector and the local data source.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../logger.js';
import type { Market, ProbabilitySample, Side } from '../detection/types.js';

export interface SnapshotStore {
    listMarkets(): Promise<Market[]>;
    getMarket(marketId: string): Promise<Market | null>;
    /** Returns true when the market was not tracked before */
    upsertMarket(market: Market): Promise<boolean>;
    appendSnapshot(sample: ProbabilitySample): Promise<void>;
    /** Ordered by timestamp, oldest first */
    snapshotsFor(marketId: string): Promise<ProbabilitySample[]>;
    flush(): Promise<void>;
}

export class InMemorySnapshotStore implements SnapshotStore {
    protected markets: Map<string, Market> = new Map();
    protected snapshots: Map<string, ProbabilitySample[]> = new Map();

    async listMarkets(): Promise<Market[]> {
        return Array.from(this.markets.values());
    }

    async getMarket(marketId: string): Promise<Market | null> {
        return this.markets.get(marketId) ?? null;
    }

    async upsertMarket(market: Market): Promise<boolean> {
        const isNew = !this.markets.has(market.id);
        this.markets.set(market.id, { ...market });
        return isNew;
    }

    async appendSnapshot(sample: ProbabilitySample): Promise<void> {
        const history = this.snapshots.get(sample.marketId) ?? [];
        history.push(sample);
        // Keep ordered; appends are almost always the newest reading
        if (history.length > 1 && history[history.length - 2].timestamp > sample.timestamp) {
            history.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
        }
        this.snapshots.set(sample.marketId, history);
    }

    async snapshotsFor(marketId: string): Promise<ProbabilitySample[]> {
        return [...(this.snapshots.get(marketId) ?? [])];
    }

    async flush(): Promise<void> {
        // Nothing to persist
    }
}

interface StoredMarket {
    id: string;
    question: string;
    resolvedAt: string;
    outcome: Side | null;
    volume: number;
    yesTokenId: string | null;
    slug?: string;
    category?: string | null;
    liquidity?: number;
}

interface StoredSnapshot {
    t: string;
    p: number;
}

interface StoreFile {
    version: 1;
    markets: StoredMarket[];
    snapshots: Record<string, StoredSnapshot[]>;
}

/**
 * JSON file backed store; the whole file is rewritten on flush
 */
export class JsonFileSnapshotStore extends InMemorySnapshotStore {
    private readonly filePath: string;
    private loaded: boolean = false;
    // Flushes share one tmp path, so they run one after another
    private flushing: Promise<void> = Promise.resolve();

    constructor(filePath: string) {
        super();
        this.filePath = path.resolve(process.cwd(), filePath);
    }

    async load(): Promise<void> {
        if (this.loaded) return;

        let text: string;
        try {
            text = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                logger.info(`[SnapshotStore] No store at ${this.filePath}, starting empty`);
                this.loaded = true;
                return;
            }
            throw error;
        }

        const data: StoreFile = JSON.parse(text);
        for (const stored of data.markets ?? []) {
            this.markets.set(stored.id, {
                ...stored,
                resolvedAt: new Date(stored.resolvedAt),
            });
        }
        for (const [marketId, points] of Object.entries(data.snapshots ?? {})) {
            this.snapshots.set(marketId, points
                .map((point): ProbabilitySample => ({
                    marketId,
                    timestamp: new Date(point.t),
                    probability: point.p,
                    source: 'snapshot',
                }))
                .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime()));
        }

        this.loaded = true;
        logger.info(`[SnapshotStore] Loaded ${this.markets.size} markets from ${this.filePath}`);
    }

    flush(): Promise<void> {
        const write = (): Promise<void> => this.writeFile();
        const next = this.flushing.then(write, write);
        this.flushing = next;
        return next;
    }

    private async writeFile(): Promise<void> {
        const data: StoreFile = {
            version: 1,
            markets: Array.from(this.markets.values()).map(market => ({
                ...market,
                resolvedAt: market.resolvedAt.toISOString(),
            })),
            snapshots: {},
        };
        for (const [marketId, history] of this.snapshots.entries()) {
            data.snapshots[marketId] = history.map(s => ({ t: s.timestamp.toISOString(), p: s.probability }));
        }

        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        const tmpPath = `${this.filePath}.tmp`;
        await fs.writeFile(tmpPath, JSON.stringify(data));
        await fs.rename(tmpPath, this.filePath);
    }
}
