/**
 * Analytics Service
 * Calibration of tracked markets by their final probability, the overview
 * counters and the active-market listing.
 */

import type { SnapshotStore } from '../storage/snapshot-store.js';
import type { BlackSwanService } from './black-swan-service.js';
import { ConfigurationError } from './errors.js';
import type { MoveService } from './move-service.js';
import type { Market, ProbabilitySample } from './types.js';

export const DEFAULT_MARKET_LIST_LIMIT = 100;

export type MarketSort = 'volume' | 'liquidity' | 'probability' | 'endDate';

const MARKET_SORTS: readonly string[] = ['volume', 'liquidity', 'probability', 'endDate'];

export function isMarketSort(value: unknown): value is MarketSort {
    return typeof value === 'string' && MARKET_SORTS.includes(value);
}

export interface BucketStats {
    bucket: string;               // e.g. "80-90%"
    totalResolved: number;
    correctPredictions: number;
    incorrectPredictions: number;
    accuracyRate: number;         // percent, 2 dp
    blackSwanCount: number;
}

export interface OverviewStats {
    trackedMarkets: number;
    activeMarkets: number;
    resolvedMarkets: number;
    totalSnapshots: number;
    blackSwanCount: number;
    recentLargeMoves: number;
    buckets: BucketStats[];
}

export interface ActiveMarket {
    id: string;
    question: string;
    category: string | null;
    endDate: string;
    probability: number | null;   // latest snapshot, null before the first one
    volume: number;
    liquidity: number | null;
    lastSnapshotAt: string | null;
}

export interface AnalyticsOptions {
    bucketBoundaries: number[];
    now?: () => Date;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function bucketBoundaryProblems(boundaries: readonly number[]): string[] {
    if (boundaries.length < 2) {
        return ['needs at least two boundaries'];
    }
    const problems: string[] = [];
    if (boundaries[0] !== 0 || boundaries[boundaries.length - 1] !== 100) {
        problems.push('must start at 0 and end at 100');
    }
    for (let i = 1; i < boundaries.length; i++) {
        if (!(boundaries[i] > boundaries[i - 1])) {
            problems.push('must be strictly increasing');
            break;
        }
    }
    return problems;
}

/**
 * Label of the bucket holding `probability` (0-1). Lower bounds are
 * inclusive; 100% lands in the last bucket.
 */
export function bucketLabel(probability: number, boundaries: readonly number[]): string {
    const points = round2(probability * 100);
    for (let i = 0; i < boundaries.length - 1; i++) {
        if (points >= boundaries[i] && points < boundaries[i + 1]) {
            return `${boundaries[i]}-${boundaries[i + 1]}%`;
        }
    }
    const last = boundaries.length - 1;
    return `${boundaries[last - 1]}-${boundaries[last]}%`;
}

/**
 * Latest snapshot taken at or before resolution
 */
export function finalSnapshot(snapshots: readonly ProbabilitySample[], resolvedAt: Date): ProbabilitySample | null {
    let latest: ProbabilitySample | null = null;
    for (const snapshot of snapshots) {
        if (snapshot.timestamp.getTime() > resolvedAt.getTime()) break;
        latest = snapshot;
    }
    return latest;
}

export class AnalyticsService {
    private readonly store: SnapshotStore;
    private readonly blackSwans: BlackSwanService;
    private readonly movers: MoveService;
    private readonly boundaries: number[];
    private readonly now: () => Date;

    constructor(store: SnapshotStore, blackSwans: BlackSwanService, movers: MoveService, options: AnalyticsOptions) {
        const problems = bucketBoundaryProblems(options.bucketBoundaries);
        if (problems.length > 0) {
            throw new ConfigurationError('Invalid probability buckets', problems);
        }
        this.store = store;
        this.blackSwans = blackSwans;
        this.movers = movers;
        this.boundaries = [...options.bucketBoundaries];
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Counters plus calibration of resolved markets. A market counts as
     * predicted Yes when its final snapshot was above 50%.
     */
    async getOverview(signal?: AbortSignal): Promise<OverviewStats> {
        const markets = await this.store.listMarkets();
        const resolved = markets.filter(m => m.outcome !== null);

        let totalSnapshots = 0;
        const finals = new Map<string, number>();
        for (const market of markets) {
            const snapshots = await this.store.snapshotsFor(market.id);
            totalSnapshots += snapshots.length;
            if (market.outcome === null) continue;

            const closing = finalSnapshot(snapshots, market.resolvedAt);
            if (closing) finals.set(market.id, closing.probability);
        }

        const report = await this.blackSwans.scanMarkets(resolved, 'local', undefined, signal);
        const swans = new Set(report.results.filter(r => r.isBlackSwan).map(r => r.marketId));

        return {
            trackedMarkets: markets.length,
            activeMarkets: markets.length - resolved.length,
            resolvedMarkets: resolved.length,
            totalSnapshots,
            blackSwanCount: swans.size,
            recentLargeMoves: await this.movers.recentMoveCount(this.now()),
            buckets: this.calibrate(resolved, finals, swans),
        };
    }

    async listActiveMarkets(sort: MarketSort = 'volume', limit: number = DEFAULT_MARKET_LIST_LIMIT): Promise<ActiveMarket[]> {
        const markets = await this.store.listMarkets();

        const rows: ActiveMarket[] = [];
        for (const market of markets) {
            if (market.outcome !== null) continue;
            const snapshots = await this.store.snapshotsFor(market.id);
            const latest = snapshots.length > 0 ? snapshots[snapshots.length - 1] : null;
            rows.push({
                id: market.id,
                question: market.question,
                category: market.category ?? null,
                endDate: market.resolvedAt.toISOString(),
                probability: latest?.probability ?? null,
                volume: market.volume,
                liquidity: market.liquidity ?? null,
                lastSnapshotAt: latest?.timestamp.toISOString() ?? null,
            });
        }

        return rows
            .sort((a, b) => compareRows(a, b, sort) || a.id.localeCompare(b.id))
            .slice(0, limit);
    }

    private calibrate(resolved: readonly Market[], finals: ReadonlyMap<string, number>, swans: ReadonlySet<string>): BucketStats[] {
        const buckets = new Map<string, BucketStats>();
        for (let i = 0; i < this.boundaries.length - 1; i++) {
            const bucket = `${this.boundaries[i]}-${this.boundaries[i + 1]}%`;
            buckets.set(bucket, {
                bucket,
                totalResolved: 0,
                correctPredictions: 0,
                incorrectPredictions: 0,
                accuracyRate: 0,
                blackSwanCount: 0,
            });
        }

        for (const market of resolved) {
            const closing = finals.get(market.id);
            if (closing === undefined) continue;

            const stats = buckets.get(bucketLabel(closing, this.boundaries));
            if (!stats) continue;

            stats.totalResolved++;
            if ((closing > 0.5) === (market.outcome === 'YES')) {
                stats.correctPredictions++;
            } else {
                stats.incorrectPredictions++;
            }
            if (swans.has(market.id)) stats.blackSwanCount++;
        }

        return Array.from(buckets.values()).map(stats => ({
            ...stats,
            accuracyRate: stats.totalResolved > 0 ? round2(stats.correctPredictions / stats.totalResolved * 100) : 0,
        }));
    }
}

// Largest first, except end date which is soonest first; missing values sort last
function compareRows(a: ActiveMarket, b: ActiveMarket, sort: MarketSort): number {
    switch (sort) {
        case 'volume':
            return b.volume - a.volume;
        case 'liquidity':
            return (b.liquidity ?? -1) - (a.liquidity ?? -1);
        case 'probability':
            return (b.probability ?? -1) - (a.probability ?? -1);
        case 'endDate':
            return a.endDate.localeCompare(b.endDate);
    }
}
