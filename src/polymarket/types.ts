/**
 * Polymarket API types
 */

/**
 * Raw market as returned by the Gamma /markets endpoint.
 * outcomes, outcomePrices and clobTokenIds arrive as JSON-encoded strings.
 */
export interface GammaMarketRaw {
    id: string;
    conditionId?: string;
    slug?: string;
    question?: string;
    category?: string;
    groupSlug?: string;
    outcomes?: string | string[];
    outcomePrices?: string | Array<string | number>;
    clobTokenIds?: string | string[];
    closed?: boolean;
    endDate?: string;
    endDateIso?: string;
    volume?: string | number;
    volumeNum?: number;
    liquidity?: string | number;
    liquidityNum?: number;
    // Explicit resolution fields, present on some payloads
    winning_outcome?: string;
    outcome?: string;
    resolution?: string;
    winner?: string;
}

/**
 * Parsed Gamma market
 */
export interface PolymarketMarket {
    id: string;
    slug: string;
    question: string;
    category: string | null;
    outcomes: string[];
    outcomePrices: number[];
    clobTokenIds: string[];
    closed: boolean;
    endDate: Date | null;
    volume: number;
    liquidity: number;
    winningOutcome: string | null;
}

export interface PriceHistoryPoint {
    t: number; // unix seconds
    p: number; // price 0-1
}

export interface PriceHistoryQuery {
    tokenId: string;
    startTs: number; // unix seconds
    endTs: number;   // unix seconds
    fidelity: number; // minutes between points
}
