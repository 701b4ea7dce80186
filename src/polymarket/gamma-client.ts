/**
 * Polymarket Gamma API Client
 * Used for market discovery, resolution lookup and metadata
 */

import axios, { AxiosInstance } from 'axios';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { describeError } from '../detection/errors.js';
import { GammaMarketRaw, PolymarketMarket } from './types.js';

export const GAMMA_PAGE_SIZE = 100;

export interface MarketPageQuery {
    closed: boolean;
    offset: number;
    limit?: number;
    signal?: AbortSignal;
}

function parseJsonArray(value: unknown): unknown[] {
    if (Array.isArray(value)) return value;
    if (typeof value === 'string' && value.trim().length > 0) {
        try {
            const parsed: unknown = JSON.parse(value.replace(/'/g, '"'));
            return Array.isArray(parsed) ? parsed : [];
        } catch {
            // Sometimes it's a comma-separated string
            return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
        }
    }
    return [];
}

function toNumber(value: unknown): number {
    if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = parseFloat(value);
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
}

function parseDate(value: string | undefined): Date | null {
    if (!value) return null;
    const date = new Date(value);
    return isNaN(date.getTime()) ? null : date;
}

/**
 * Winner from final prices (winner ~1.0, or the other side ~0),
 * falling back to explicit resolution fields
 */
export function determineWinningOutcome(outcomes: string[], prices: number[], raw: GammaMarketRaw): string | null {
    for (let i = 0; i < prices.length && i < outcomes.length; i++) {
        if (prices[i] > 0.95) return outcomes[i];
    }

    for (let i = 0; i < prices.length && i < outcomes.length; i++) {
        if (prices[i] < 0.05) {
            for (let j = 0; j < prices.length && j < outcomes.length; j++) {
                if (j !== i && prices[j] > 0.5) return outcomes[j];
            }
        }
    }

    // resolutionSource is a URL, so explicit fields that look like one are skipped
    for (const field of [raw.winning_outcome, raw.outcome, raw.resolution, raw.winner]) {
        if (!field || field.startsWith('http')) continue;
        const lower = field.toLowerCase();
        if (['yes', 'true', '1'].includes(lower)) return 'Yes';
        if (['no', 'false', '0'].includes(lower)) return 'No';
        const match = outcomes.find(o => o.toLowerCase() === lower);
        if (match) return match;
    }

    return null;
}

export class GammaClient {
    private client: AxiosInstance;

    constructor(client?: AxiosInstance) {
        this.client = client ?? axios.create({
            baseURL: config.gammaHost,
            timeout: config.httpTimeoutMs,
            headers: {
                'Accept': 'application/json',
            },
        });
    }

    /**
     * One page of markets ordered by total volume, highest first
     */
    async getMarketsPage(query: MarketPageQuery): Promise<PolymarketMarket[]> {
        try {
            const response = await this.client.get<GammaMarketRaw[]>('/markets', {
                params: {
                    closed: query.closed,
                    limit: query.limit ?? GAMMA_PAGE_SIZE,
                    offset: query.offset,
                    order: 'volumeNum',
                    ascending: false,
                },
                signal: query.signal,
            });

            const data = Array.isArray(response.data) ? response.data : [];
            return data
                .map(raw => this.parseMarket(raw))
                .filter((market): market is PolymarketMarket => market !== null);
        } catch (error) {
            logger.error('Failed to fetch markets page', {
                closed: query.closed,
                offset: query.offset,
                error: describeError(error),
            });
            throw error;
        }
    }

    /**
     * Get a specific market by its Gamma id
     */
    async getMarketById(marketId: string): Promise<PolymarketMarket | null> {
        try {
            const response = await this.client.get<GammaMarketRaw>(`/markets/${encodeURIComponent(marketId)}`);
            return this.parseMarket(response.data);
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                return null;
            }
            logger.error('Failed to fetch market by id', { marketId, error: describeError(error) });
            throw error;
        }
    }

    /**
     * Parse raw market data from API
     */
    parseMarket(raw: GammaMarketRaw): PolymarketMarket | null {
        const id = raw.id ? String(raw.id) : raw.conditionId;
        if (!id) return null;

        const outcomesRaw = parseJsonArray(raw.outcomes).map(o => String(o));
        const outcomes = outcomesRaw.length > 0 ? outcomesRaw : ['Yes', 'No'];
        const outcomePrices = parseJsonArray(raw.outcomePrices).map(p => toNumber(p));
        const clobTokenIds = parseJsonArray(raw.clobTokenIds).map(t => String(t));

        return {
            id,
            slug: raw.slug ?? '',
            question: raw.question ?? 'Unknown',
            category: raw.category ?? raw.groupSlug ?? null,
            outcomes,
            outcomePrices,
            clobTokenIds,
            closed: raw.closed ?? false,
            endDate: parseDate(raw.endDate ?? raw.endDateIso),
            volume: raw.volumeNum !== undefined ? toNumber(raw.volumeNum) : toNumber(raw.volume),
            liquidity: raw.liquidityNum !== undefined ? toNumber(raw.liquidityNum) : toNumber(raw.liquidity),
            winningOutcome: raw.closed ? determineWinningOutcome(outcomes, outcomePrices, raw) : null,
        };
    }
}
