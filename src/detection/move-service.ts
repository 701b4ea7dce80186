/**
 * Recent movers over the local snapshot store
 */

import type { SnapshotStore } from '../storage/snapshot-store.js';
import { detectLargeMoves, summarizeMovers, type LargeMoveOptions } from './large-move-detector.js';
import type { Market, MoveEvent, SnapshotSeries } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface RecentMover {
    marketId: string;
    question: string;
    largest: MoveEvent;
    eventCount: number;
}

export class MoveService {
    private readonly store: SnapshotStore;
    private readonly options: LargeMoveOptions;

    constructor(store: SnapshotStore, options: LargeMoveOptions) {
        this.store = store;
        this.options = options;
    }

    /**
     * Largest move per market within the last window, biggest first
     */
    async recentMovers(now: Date, limit: number): Promise<RecentMover[]> {
        const markets = await this.store.listMarkets();
        const questions = new Map(markets.map(m => [m.id, m.question]));
        const events = await this.recentEvents(markets, now);

        return summarizeMovers(events)
            .slice(0, limit)
            .map(mover => ({
                ...mover,
                question: questions.get(mover.marketId) ?? 'Unknown',
            }));
    }

    /**
     * Every large move within the last window, across all markets
     */
    async recentMoveCount(now: Date): Promise<number> {
        const events = await this.recentEvents(await this.store.listMarkets(), now);
        return events.length;
    }

    private async recentEvents(markets: readonly Market[], now: Date): Promise<MoveEvent[]> {
        const since = now.getTime() - this.options.windowHours * HOUR_MS;

        const series: SnapshotSeries[] = [];
        for (const market of markets) {
            const snapshots = await this.store.snapshotsFor(market.id);
            series.push({
                marketId: market.id,
                snapshots: snapshots
                    .filter(s => s.timestamp.getTime() >= since && s.timestamp.getTime() <= now.getTime())
                    .map(s => ({ timestamp: s.timestamp, probability: s.probability })),
            });
        }

        return detectLargeMoves(series, this.options);
    }
}
