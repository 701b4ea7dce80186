/**
 * Market catalogs: where scan candidates come from
 */

import { GammaClient, GAMMA_PAGE_SIZE } from '../polymarket/gamma-client.js';
import type { PolymarketMarket } from '../polymarket/types.js';
import type { SnapshotStore } from '../storage/snapshot-store.js';
import { logger } from '../logger.js';
import { throwIfAborted } from './errors.js';
import type { Market, Side } from './types.js';

export interface MarketCatalog {
    /** Resolved markets with resolution at or after `since` and volume >= floor */
    listResolvedMarkets(since: Date, volumeFloor: number, signal?: AbortSignal): Promise<Market[]>;
}

function toSide(outcome: string | null): Side | null {
    if (outcome === null) return null;
    const lower = outcome.toLowerCase();
    if (lower === 'yes') return 'YES';
    if (lower === 'no') return 'NO';
    return null;
}

/**
 * Binary Yes/No markets only; returns null for anything else
 */
export function toMarket(market: PolymarketMarket): Market | null {
    if (!market.endDate) return null;

    const yesIndex = market.outcomes.findIndex(o => o.toLowerCase() === 'yes');
    const noIndex = market.outcomes.findIndex(o => o.toLowerCase() === 'no');
    if (yesIndex === -1 || noIndex === -1) return null;

    return {
        id: market.id,
        question: market.question,
        resolvedAt: market.endDate,
        outcome: toSide(market.winningOutcome),
        volume: market.volume,
        yesTokenId: market.clobTokenIds[yesIndex] ?? null,
        slug: market.slug,
        category: market.category,
        liquidity: market.liquidity,
    };
}

export class GammaMarketCatalog implements MarketCatalog {
    private readonly gamma: GammaClient;
    private readonly maxPages: number;

    constructor(gamma: GammaClient, maxPages: number = 20) {
        this.gamma = gamma;
        this.maxPages = maxPages;
    }

    async listResolvedMarkets(since: Date, volumeFloor: number, signal?: AbortSignal): Promise<Market[]> {
        const markets: Market[] = [];

        for (let page = 0; page < this.maxPages; page++) {
            throwIfAborted(signal);
            const data = await this.gamma.getMarketsPage({
                closed: true,
                offset: page * GAMMA_PAGE_SIZE,
                signal,
            });

            for (const raw of data) {
                const market = toMarket(raw);
                if (!market || market.outcome === null) continue;
                if (market.resolvedAt < since) continue;
                if (market.volume < volumeFloor) continue;
                markets.push(market);
            }

            // Pages are ordered by volume, so nothing further clears the floor
            const last = data[data.length - 1];
            if (data.length < GAMMA_PAGE_SIZE || (last && last.volume < volumeFloor)) {
                break;
            }
        }

        logger.info(`[GammaMarketCatalog] ${markets.length} resolved candidates since ${since.toISOString()}`);
        return markets;
    }
}

export class LocalMarketCatalog implements MarketCatalog {
    private readonly store: SnapshotStore;

    constructor(store: SnapshotStore) {
        this.store = store;
    }

    async listResolvedMarkets(since: Date, volumeFloor: number): Promise<Market[]> {
        const markets = await this.store.listMarkets();
        return markets.filter(m =>
            m.outcome !== null &&
            m.resolvedAt >= since &&
            m.volume >= volumeFloor
        );
    }
}
