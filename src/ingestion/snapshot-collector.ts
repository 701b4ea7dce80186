/**
 * Snapshot Collector
 * Periodically records the Yes probability of active high-volume markets
 * into the snapshot store, and picks up the resolution of tracked markets
 * once their end date has passed.
 */

import { logger } from '../logger.js';
import { describeError, throwIfAborted } from '../detection/errors.js';
import { toMarket } from '../detection/market-catalog.js';
import type { Market } from '../detection/types.js';
import { DAY_MS } from '../detection/window-spec.js';
import { GammaClient, GAMMA_PAGE_SIZE } from '../polymarket/gamma-client.js';
import type { PolymarketMarket } from '../polymarket/types.js';
import type { SnapshotStore } from '../storage/snapshot-store.js';

export interface CollectorOptions {
    minVolume: number;
    maxDaysToResolution: number;
    marketLimit: number;
    now?: () => Date;
}

export interface CollectionStats {
    marketsFetched: number;
    marketsNew: number;
    marketsUpdated: number;
    snapshotsCreated: number;
    resolutionsDetected: number;
    errors: string[];
    durationMs: number;
}

/**
 * Probability of "Yes" from the market's current outcome prices
 */
export function yesProbability(market: PolymarketMarket): number | null {
    const yesIndex = market.outcomes.findIndex(o => o.toLowerCase() === 'yes');
    if (yesIndex === -1) return null;
    const price = market.outcomePrices[yesIndex];
    if (price === undefined || !Number.isFinite(price) || price < 0 || price > 1) return null;
    return price;
}

export class SnapshotCollector {
    private readonly gamma: GammaClient;
    private readonly store: SnapshotStore;
    private readonly options: CollectorOptions;
    private readonly now: () => Date;
    private running: Promise<CollectionStats> | null = null;

    constructor(gamma: GammaClient, store: SnapshotStore, options: CollectorOptions) {
        this.gamma = gamma;
        this.store = store;
        this.options = options;
        this.now = options.now ?? (() => new Date());
    }

    isRunning(): boolean {
        return this.running !== null;
    }

    /**
     * Run one collection cycle. Overlapping calls share the cycle in progress.
     */
    runCollection(signal?: AbortSignal): Promise<CollectionStats> {
        if (this.running) {
            logger.debug('[SnapshotCollector] Collection already in progress, joining it');
            return this.running;
        }
        const cycle = this.collect(signal).finally(() => {
            this.running = null;
        });
        this.running = cycle;
        return cycle;
    }

    private async collect(signal?: AbortSignal): Promise<CollectionStats> {
        const startedAt = Date.now();
        const now = this.now();
        const stats: CollectionStats = {
            marketsFetched: 0,
            marketsNew: 0,
            marketsUpdated: 0,
            snapshotsCreated: 0,
            resolutionsDetected: 0,
            errors: [],
            durationMs: 0,
        };

        let active: PolymarketMarket[];
        try {
            active = await this.fetchActiveMarkets(now, signal);
            stats.marketsFetched = active.length;
        } catch (error) {
            stats.errors.push(`Failed to fetch markets: ${describeError(error)}`);
            stats.durationMs = Date.now() - startedAt;
            logger.error('[SnapshotCollector] Collection aborted', { error: describeError(error) });
            return stats;
        }

        for (const raw of active) {
            const market = toMarket(raw);
            const probability = yesProbability(raw);
            if (!market || probability === null) continue;

            const isNew = await this.store.upsertMarket(market);
            if (isNew) {
                stats.marketsNew++;
            } else {
                stats.marketsUpdated++;
            }

            await this.store.appendSnapshot({
                marketId: market.id,
                timestamp: now,
                probability,
                source: 'snapshot',
            });
            stats.snapshotsCreated++;
        }

        stats.resolutionsDetected = await this.refreshResolutions(now, stats.errors, signal);

        await this.store.flush();
        stats.durationMs = Date.now() - startedAt;

        logger.info('[SnapshotCollector] Collection complete', {
            fetched: stats.marketsFetched,
            new: stats.marketsNew,
            snapshots: stats.snapshotsCreated,
            resolutions: stats.resolutionsDetected,
            errors: stats.errors.length,
        });
        return stats;
    }

    /**
     * Active binary markets above the volume floor that end within the horizon
     */
    private async fetchActiveMarkets(now: Date, signal?: AbortSignal): Promise<PolymarketMarket[]> {
        const horizon = now.getTime() + this.options.maxDaysToResolution * DAY_MS;
        const selected: PolymarketMarket[] = [];

        for (let offset = 0; selected.length < this.options.marketLimit; offset += GAMMA_PAGE_SIZE) {
            throwIfAborted(signal);
            const page = await this.gamma.getMarketsPage({ closed: false, offset, signal });

            for (const market of page) {
                if (market.volume < this.options.minVolume) continue;
                if (!market.endDate) continue;
                const end = market.endDate.getTime();
                if (end < now.getTime() || end > horizon) continue;
                selected.push(market);
                if (selected.length >= this.options.marketLimit) break;
            }

            // Ordered by volume: once a page dips below the floor nothing further qualifies
            const last = page[page.length - 1];
            if (page.length < GAMMA_PAGE_SIZE || (last && last.volume < this.options.minVolume)) break;
        }

        return selected;
    }

    /**
     * Tracked markets past their end date with no recorded outcome yet
     */
    private async refreshResolutions(now: Date, errors: string[], signal?: AbortSignal): Promise<number> {
        const tracked = await this.store.listMarkets();
        const pending = tracked.filter(m => m.outcome === null && m.resolvedAt.getTime() <= now.getTime());
        let resolved = 0;

        for (const market of pending) {
            throwIfAborted(signal);
            try {
                const latest = await this.gamma.getMarketById(market.id);
                if (!latest || !latest.closed) continue;

                const updated: Market | null = toMarket(latest);
                if (!updated || updated.outcome === null) continue;

                await this.store.upsertMarket(updated);
                resolved++;
                logger.info(`[SnapshotCollector] ${market.id} resolved ${updated.outcome}`, {
                    question: market.question,
                });
            } catch (error) {
                errors.push(`Error refreshing ${market.id}: ${describeError(error)}`);
            }
        }

        return resolved;
    }
}
