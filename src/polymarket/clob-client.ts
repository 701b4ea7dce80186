/**
 * Polymarket CLOB Client
 * Read-only access to token price history
 */

import axios, { AxiosInstance } from 'axios';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { CancellationError, describeError, TransientUpstreamError } from '../detection/errors.js';
import { PriceHistoryPoint, PriceHistoryQuery } from './types.js';

function toFiniteNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Accepts {history: [{t, p}]}, a bare array of {t, p} / {timestamp, price},
 * or [t, p] tuples
 */
export function parsePriceHistory(data: unknown): PriceHistoryPoint[] {
    let points: unknown = data;
    if (points !== null && typeof points === 'object' && !Array.isArray(points) && 'history' in points) {
        points = points.history;
    }
    if (!Array.isArray(points)) return [];

    const parsed: PriceHistoryPoint[] = [];
    for (const point of points) {
        let t: number | null = null;
        let p: number | null = null;
        if (Array.isArray(point) && point.length >= 2) {
            t = toFiniteNumber(point[0]);
            p = toFiniteNumber(point[1]);
        } else if (point !== null && typeof point === 'object') {
            const record: Record<string, unknown> = { ...point };
            t = toFiniteNumber(record.t ?? record.timestamp ?? record.time);
            p = toFiniteNumber(record.p ?? record.price);
        }
        if (t === null || p === null) continue;
        parsed.push({ t, p });
    }
    return parsed.sort((a, b) => a.t - b.t);
}

export class ClobClient {
    private httpClient: AxiosInstance;

    constructor(httpClient?: AxiosInstance) {
        this.httpClient = httpClient ?? axios.create({
            baseURL: config.clobHost,
            timeout: config.httpTimeoutMs,
            headers: {
                'Accept': 'application/json',
            },
        });
    }

    /**
     * Price history for a token over [startTs, endTs].
     * Network failures, timeouts, 429 and 5xx raise TransientUpstreamError;
     * other client errors (e.g. a rejected interval) yield an empty history.
     */
    async getPriceHistory(query: PriceHistoryQuery, signal?: AbortSignal): Promise<PriceHistoryPoint[]> {
        try {
            const response = await this.httpClient.get<unknown>('/prices-history', {
                params: {
                    market: query.tokenId,
                    startTs: query.startTs,
                    endTs: query.endTs,
                    fidelity: query.fidelity,
                },
                signal,
            });
            return parsePriceHistory(response.data);
        } catch (error) {
            if (axios.isCancel(error) || signal?.aborted) {
                throw new CancellationError('Price history request aborted');
            }
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                if (status === undefined || status === 429 || status >= 500) {
                    throw new TransientUpstreamError(
                        `Price history request failed${status ? ` with status ${status}` : ''}: ${error.message}`,
                        status
                    );
                }
                logger.warn('Price history request rejected', {
                    tokenId: query.tokenId,
                    status,
                    startTs: query.startTs,
                    endTs: query.endTs,
                });
                return [];
            }
            logger.error('Failed to get price history', { tokenId: query.tokenId, error: describeError(error) });
            throw error;
        }
    }
}
