/**
 * Price Sampler
 * Best-known probability of "Yes" at or near a target timestamp.
 * Missing data is an `unavailable` outcome, never an error; upstream
 * network and rate-limit failures raise TransientUpstreamError.
 */

import { ClobClient } from '../polymarket/clob-client.js';
import type { SnapshotStore } from '../storage/snapshot-store.js';
import { isTransientUpstreamError } from './errors.js';
import { retryWithBackoff, type RetryOptions, type RetryPolicy } from './retry.js';
import type { Market, ProbabilitySample, SampleOutcome, SampleSource } from './types.js';
import { DAY_MS } from './window-spec.js';

const HOUR_MS = 60 * 60 * 1000;

export interface PriceSampler {
    readonly source: SampleSource;

    sample(market: Market, target: Date, signal?: AbortSignal): Promise<SampleOutcome>;
}

export interface SamplerWindow {
    halfWindowHours: number;  // query [target - h, min(target + h, resolvedAt)]
    maxLookbackDays: number;
}

export function unavailable(reason: string): SampleOutcome {
    return { status: 'unavailable', reason };
}

/**
 * Closest point to the target; the earlier point wins a tie
 */
export function closestTo<T extends { timestamp: Date }>(points: readonly T[], target: Date): T | null {
    let closest: T | null = null;
    let minDiff = Infinity;
    for (const point of points) {
        const diff = Math.abs(point.timestamp.getTime() - target.getTime());
        if (diff < minDiff || (diff === minDiff && closest !== null && point.timestamp < closest.timestamp)) {
            minDiff = diff;
            closest = point;
        }
    }
    return closest;
}

/**
 * Enforces the sampling constraints shared by every source
 */
export abstract class BasePriceSampler implements PriceSampler {
    abstract readonly source: SampleSource;
    protected readonly window: SamplerWindow;

    constructor(window: SamplerWindow) {
        this.window = window;
    }

    async sample(market: Market, target: Date, signal?: AbortSignal): Promise<SampleOutcome> {
        if (target.getTime() > market.resolvedAt.getTime()) {
            return unavailable('target is after resolution');
        }
        const horizonStart = market.resolvedAt.getTime() - this.window.maxLookbackDays * DAY_MS;
        if (target.getTime() < horizonStart) {
            return unavailable('target is beyond the lookback horizon');
        }
        return this.fetchSample(market, target, signal);
    }

    /**
     * [target - h, target + h], never reaching past resolution
     */
    protected queryRange(market: Market, target: Date): { start: Date; end: Date } {
        const halfWindowMs = this.window.halfWindowHours * HOUR_MS;
        return {
            start: new Date(target.getTime() - halfWindowMs),
            end: new Date(Math.min(target.getTime() + halfWindowMs, market.resolvedAt.getTime())),
        };
    }

    protected abstract fetchSample(market: Market, target: Date, signal?: AbortSignal): Promise<SampleOutcome>;
}

/**
 * Live price history from the CLOB, one narrow window per target
 */
export class ApiPriceSampler extends BasePriceSampler {
    readonly source = 'live-query' as const;
    private readonly clob: ClobClient;
    private readonly fidelityMinutes: number;

    constructor(clob: ClobClient, window: SamplerWindow, fidelityMinutes: number = 60) {
        super(window);
        this.clob = clob;
        this.fidelityMinutes = fidelityMinutes;
    }

    protected async fetchSample(market: Market, target: Date, signal?: AbortSignal): Promise<SampleOutcome> {
        if (!market.yesTokenId) {
            return unavailable('market has no Yes token');
        }

        const { start, end } = this.queryRange(market, target);
        const history = await this.clob.getPriceHistory({
            tokenId: market.yesTokenId,
            startTs: Math.floor(start.getTime() / 1000),
            endTs: Math.floor(end.getTime() / 1000),
            fidelity: this.fidelityMinutes,
        }, signal);

        const points: ProbabilitySample[] = history.map(point => ({
            marketId: market.id,
            timestamp: new Date(point.t * 1000),
            probability: point.p,
            source: this.source,
        }));

        const closest = closestTo(points, target);
        if (!closest) {
            return unavailable('no price history in window');
        }
        return { status: 'available', sample: closest };
    }
}

/**
 * Locally collected snapshots, same window rules as the live source
 */
export class SnapshotPriceSampler extends BasePriceSampler {
    readonly source = 'snapshot' as const;
    private readonly store: SnapshotStore;

    constructor(store: SnapshotStore, window: SamplerWindow) {
        super(window);
        this.store = store;
    }

    protected async fetchSample(market: Market, target: Date): Promise<SampleOutcome> {
        const { start, end } = this.queryRange(market, target);
        const snapshots = await this.store.snapshotsFor(market.id);
        const inWindow = snapshots.filter(s => s.timestamp >= start && s.timestamp <= end);

        const closest = closestTo(inWindow, target);
        if (!closest) {
            return unavailable('no snapshot in window');
        }
        return { status: 'available', sample: closest };
    }
}

/**
 * Retries transient upstream failures of the wrapped sampler with backoff
 */
export class RetryingPriceSampler implements PriceSampler {
    private readonly inner: PriceSampler;
    private readonly policy: RetryPolicy;
    private readonly onRetry?: RetryOptions['onRetry'];

    constructor(inner: PriceSampler, policy: RetryPolicy, onRetry?: RetryOptions['onRetry']) {
        this.inner = inner;
        this.policy = policy;
        this.onRetry = onRetry;
    }

    get source(): SampleSource {
        return this.inner.source;
    }

    sample(market: Market, target: Date, signal?: AbortSignal): Promise<SampleOutcome> {
        return retryWithBackoff(
            () => this.inner.sample(market, target, signal),
            this.policy,
            { isRetryable: isTransientUpstreamError, signal, onRetry: this.onRetry }
        );
    }
}
