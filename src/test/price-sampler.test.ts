/**
 * Tests for the price samplers and the CLOB price history client
 */

import { describe, it, expect, jest } from '@jest/globals';
import { ClobClient, parsePriceHistory } from '../polymarket/clob-client.js';
import {
    ApiPriceSampler,
    RetryingPriceSampler,
    SnapshotPriceSampler,
    closestTo,
} from '../detection/price-sampler.js';
import { CancellationError, TransientUpstreamError } from '../detection/errors.js';
import { InMemorySnapshotStore } from '../storage/snapshot-store.js';
import { daysBefore, hoursAfter, makeMarket } from './fixtures.js';
import { networkError, stubAxios } from './axios-stub.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const samplerWindow = { halfWindowHours: 24, maxLookbackDays: 60 };

function seconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
}

describe('parsePriceHistory', () => {
    it('should accept the history envelope and sort by time', () => {
        expect(parsePriceHistory({ history: [{ t: 200, p: 0.4 }, { t: 100, p: 0.5 }] }))
            .toEqual([{ t: 100, p: 0.5 }, { t: 200, p: 0.4 }]);
    });

    it('should accept bare arrays of objects or tuples', () => {
        expect(parsePriceHistory([{ timestamp: 100, price: '0.61' }])).toEqual([{ t: 100, p: 0.61 }]);
        expect(parsePriceHistory([[100, 0.3]])).toEqual([{ t: 100, p: 0.3 }]);
    });

    it('should skip malformed points and unknown payloads', () => {
        expect(parsePriceHistory([{ t: 'soon', p: 0.5 }, null, { t: 100 }])).toEqual([]);
        expect(parsePriceHistory('not json')).toEqual([]);
    });
});

describe('closestTo', () => {
    const target = new Date('2024-06-16T12:00:00.000Z');

    it('should prefer the earlier point on a tie', () => {
        const before = { timestamp: hoursAfter(target, -1) };
        const after = { timestamp: hoursAfter(target, 1) };

        expect(closestTo([after, before], target)).toBe(before);
    });

    it('should return null for no points', () => {
        expect(closestTo([], target)).toBeNull();
    });
});

describe('ApiPriceSampler', () => {
    const market = makeMarket();
    const target = daysBefore(market.resolvedAt, 14);

    it('should query a narrow window and keep the point closest to the target', async () => {
        const { client, requests } = stubAxios(() => ({
            status: 200,
            data: {
                history: [
                    { t: seconds(hoursAfter(target, -3)), p: 0.8 },
                    { t: seconds(hoursAfter(target, -1)), p: 0.75 },
                    { t: seconds(hoursAfter(target, 1)), p: 0.7 },
                ],
            },
        }));
        const sampler = new ApiPriceSampler(new ClobClient(client), samplerWindow, 60);

        const outcome = await sampler.sample(market, target);

        expect(outcome).toEqual({
            status: 'available',
            sample: {
                marketId: 'mkt-1',
                timestamp: hoursAfter(target, -1),
                probability: 0.75,
                source: 'live-query',
            },
        });
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe('/prices-history');
        expect(requests[0].params).toEqual({
            market: 'token-yes-1',
            startTs: seconds(hoursAfter(target, -24)),
            endTs: seconds(hoursAfter(target, 24)),
            fidelity: 60,
        });
    });

    it('should end the query window at resolution for targets close to it', async () => {
        const { client, requests } = stubAxios(() => ({ status: 200, data: { history: [] } }));
        const nearTarget = hoursAfter(market.resolvedAt, -6);

        await new ApiPriceSampler(new ClobClient(client), samplerWindow).sample(market, nearTarget);

        expect(requests[0].params).toMatchObject({
            startTs: seconds(hoursAfter(nearTarget, -24)),
            endTs: seconds(market.resolvedAt),
        });
    });

    it('should report an empty window as unavailable', async () => {
        const { client } = stubAxios(() => ({ status: 200, data: { history: [] } }));

        await expect(new ApiPriceSampler(new ClobClient(client), samplerWindow).sample(market, target))
            .resolves.toEqual({ status: 'unavailable', reason: 'no price history in window' });
    });

    it('should not query targets after resolution or beyond the lookback', async () => {
        const { client, requests } = stubAxios(() => ({ status: 200, data: [] }));
        const sampler = new ApiPriceSampler(new ClobClient(client), samplerWindow);

        await expect(sampler.sample(market, hoursAfter(market.resolvedAt, 1)))
            .resolves.toEqual({ status: 'unavailable', reason: 'target is after resolution' });
        await expect(sampler.sample(market, daysBefore(market.resolvedAt, 61)))
            .resolves.toEqual({ status: 'unavailable', reason: 'target is beyond the lookback horizon' });
        expect(requests).toHaveLength(0);
    });

    it('should report a market without a Yes token as unavailable', async () => {
        const { client, requests } = stubAxios(() => ({ status: 200, data: [] }));

        await expect(new ApiPriceSampler(new ClobClient(client), samplerWindow).sample(makeMarket({ yesTokenId: null }), target))
            .resolves.toEqual({ status: 'unavailable', reason: 'market has no Yes token' });
        expect(requests).toHaveLength(0);
    });

    it('should treat a rejected interval as missing data', async () => {
        const { client } = stubAxios(() => ({ status: 400, data: { error: 'interval too long' } }));

        await expect(new ApiPriceSampler(new ClobClient(client), samplerWindow).sample(market, target))
            .resolves.toEqual({ status: 'unavailable', reason: 'no price history in window' });
    });

    it('should raise TransientUpstreamError on rate limits, server errors and network failures', async () => {
        const limited = stubAxios(() => ({ status: 429, data: {} }));
        const failing = stubAxios(() => ({ status: 503, data: {} }));
        const offline = stubAxios(config => {
            throw networkError(config);
        });

        await expect(new ClobClient(limited.client).getPriceHistory({ tokenId: 't', startTs: 0, endTs: 1, fidelity: 60 }))
            .rejects.toMatchObject({ name: 'TransientUpstreamError', status: 429 });
        await expect(new ClobClient(failing.client).getPriceHistory({ tokenId: 't', startTs: 0, endTs: 1, fidelity: 60 }))
            .rejects.toMatchObject({ name: 'TransientUpstreamError', status: 503 });
        await expect(new ClobClient(offline.client).getPriceHistory({ tokenId: 't', startTs: 0, endTs: 1, fidelity: 60 }))
            .rejects.toBeInstanceOf(TransientUpstreamError);
    });

    it('should raise CancellationError for an aborted request', async () => {
        const { client } = stubAxios(() => ({ status: 200, data: [] }));
        const controller = new AbortController();
        controller.abort();

        await expect(new ClobClient(client).getPriceHistory({ tokenId: 't', startTs: 0, endTs: 1, fidelity: 60 }, controller.signal))
            .rejects.toBeInstanceOf(CancellationError);
    });
});

describe('RetryingPriceSampler', () => {
    const market = makeMarket();
    const target = daysBefore(market.resolvedAt, 7);
    const policy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

    it('should retry transient failures until a sample arrives', async () => {
        let calls = 0;
        const { client } = stubAxios(() => {
            calls++;
            if (calls < 3) return { status: 503, data: {} };
            return { status: 200, data: [{ t: seconds(target), p: 0.42 }] };
        });
        const onRetry = jest.fn();
        const sampler = new RetryingPriceSampler(new ApiPriceSampler(new ClobClient(client), samplerWindow), policy, onRetry);

        const outcome = await sampler.sample(market, target);

        expect(outcome.status).toBe('available');
        expect(calls).toBe(3);
        expect(onRetry).toHaveBeenCalledTimes(2);
        expect(sampler.source).toBe('live-query');
    });

    it('should give up after the last attempt', async () => {
        let calls = 0;
        const { client } = stubAxios(() => {
            calls++;
            return { status: 429, data: {} };
        });
        const sampler = new RetryingPriceSampler(new ApiPriceSampler(new ClobClient(client), samplerWindow), policy);

        await expect(sampler.sample(market, target)).rejects.toBeInstanceOf(TransientUpstreamError);
        expect(calls).toBe(3);
    });
});

describe('SnapshotPriceSampler', () => {
    const market = makeMarket();
    const target = daysBefore(market.resolvedAt, 3);

    it('should pick the closest snapshot within the window', async () => {
        const store = new InMemorySnapshotStore();
        for (const [hours, probability] of [[-30, 0.9], [-5, 0.6], [2, 0.55], [26, 0.2]]) {
            await store.appendSnapshot({
                marketId: market.id,
                timestamp: hoursAfter(target, hours),
                probability,
                source: 'snapshot',
            });
        }

        const outcome = await new SnapshotPriceSampler(store, samplerWindow).sample(market, target);

        expect(outcome).toEqual({
            status: 'available',
            sample: { marketId: 'mkt-1', timestamp: hoursAfter(target, 2), probability: 0.55, source: 'snapshot' },
        });
    });

    it('should ignore snapshots outside the window', async () => {
        const store = new InMemorySnapshotStore();
        await store.appendSnapshot({
            marketId: market.id,
            timestamp: hoursAfter(target, -30),
            probability: 0.9,
            source: 'snapshot',
        });

        await expect(new SnapshotPriceSampler(store, samplerWindow).sample(market, target))
            .resolves.toEqual({ status: 'unavailable', reason: 'no snapshot in window' });
    });

    it('should never pick a snapshot taken after resolution', async () => {
        const store = new InMemorySnapshotStore();
        const nearTarget = hoursAfter(market.resolvedAt, -6);
        for (const [hours, probability] of [[-10, 0.35], [7, 1]]) {
            await store.appendSnapshot({
                marketId: market.id,
                timestamp: hoursAfter(nearTarget, hours),
                probability,
                source: 'snapshot',
            });
        }

        const outcome = await new SnapshotPriceSampler(store, samplerWindow).sample(market, nearTarget);

        expect(outcome).toEqual({
            status: 'available',
            sample: { marketId: 'mkt-1', timestamp: hoursAfter(nearTarget, -10), probability: 0.35, source: 'snapshot' },
        });
    });
});
