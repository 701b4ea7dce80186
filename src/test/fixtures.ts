/**
 * Shared builders for the detection tests
 */

import { TransientUpstreamError } from '../detection/errors.js';
import type { PriceSampler } from '../detection/price-sampler.js';
import type { Market, ProbabilitySample, ReversalWindowSpec, SampleOutcome, SampleSource } from '../detection/types.js';

export const RESOLVED_AT = new Date('2024-06-30T12:00:00.000Z');

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export function makeSpec(overrides: Partial<ReversalWindowSpec> = {}): ReversalWindowSpec {
    return {
        offsetsDays: [14, 7, 3],
        earlyCertaintyThreshold: 0.70,
        finalCertaintyThreshold: 0.40,
        minVolume: 100000,
        maxLookbackDays: 60,
        ...overrides,
    };
}

export function makeMarket(overrides: Partial<Market> = {}): Market {
    return {
        id: 'mkt-1',
        question: 'Will the bill pass before July?',
        resolvedAt: RESOLVED_AT,
        outcome: 'NO',
        volume: 250000,
        yesTokenId: 'token-yes-1',
        ...overrides,
    };
}

export function daysBefore(resolvedAt: Date, days: number): Date {
    return new Date(resolvedAt.getTime() - days * DAY_MS);
}

export function hoursAfter(start: Date, hours: number): Date {
    return new Date(start.getTime() + hours * HOUR_MS);
}

export function makeSample(
    market: Market,
    days: number,
    probability: number,
    source: SampleSource = 'live-query'
): ProbabilitySample {
    return {
        marketId: market.id,
        timestamp: daysBefore(market.resolvedAt, days),
        probability,
        source,
    };
}

export type Script = Record<string, Record<number, number>>;  // marketId -> days before resolution -> p(yes)

/**
 * Answers from a fixed table and records how many requests overlap
 */
export class ScriptedSampler implements PriceSampler {
    readonly source = 'live-query' as const;
    calls = 0;
    inFlight = 0;
    maxInFlight = 0;
    onCall: () => void = () => undefined;

    constructor(private readonly script: Script, private readonly failing: Set<string> = new Set()) {}

    async sample(market: Market, target: Date): Promise<SampleOutcome> {
        this.calls++;
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        this.onCall();
        try {
            await new Promise(resolve => setTimeout(resolve, 1));
            if (this.failing.has(market.id)) {
                throw new TransientUpstreamError('rate limited', 429);
            }
            const days = Math.round((market.resolvedAt.getTime() - target.getTime()) / DAY_MS);
            const probability = this.script[market.id]?.[days];
            if (probability === undefined) {
                return { status: 'unavailable', reason: 'no price history in window' };
            }
            return {
                status: 'available',
                sample: { marketId: market.id, timestamp: target, probability, source: this.source },
            };
        } finally {
            this.inFlight--;
        }
    }
}

// p(yes) by days before resolution
export const collapse = { 14: 0.85, 7: 0.80, 3: 0.30 };
export const steady = { 14: 0.85, 7: 0.80, 3: 0.45 };
