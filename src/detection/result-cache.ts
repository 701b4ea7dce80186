/**
 * Result Cache
 * TTL-bounded memo of scan results with single-flight: concurrent requests
 * for a key share one computation. Expired entries are never served.
 *
 * A shared computation runs under its own AbortSignal, aborted only once
 * every caller waiting on it has been cancelled.
 */

import { logger } from '../logger.js';
import { CancellationError, throwIfAborted } from './errors.js';

export const DEFAULT_RESULT_TTL_MS = 30 * 60 * 1000;

interface CacheEntry<T> {
    value: T;
    createdAt: number;
}

interface PendingComputation<T> {
    promise: Promise<CacheEntry<T>>;
    controller: AbortController;
    waiters: number;
}

export type Compute<T> = (signal: AbortSignal) => Promise<T>;

export interface CacheLookup<T> {
    value: T;
    cached: boolean;
    createdAt: number;
}

export interface ResultCacheStats {
    entries: number;
    inFlight: number;
    hits: number;
    misses: number;
    computations: number;
    failures: number;
}

export class ResultCache<T> {
    private readonly entries: Map<string, CacheEntry<T>> = new Map();
    // Registered synchronously, so a second caller in the same tick sees it
    private readonly inFlight: Map<string, PendingComputation<T>> = new Map();
    private readonly ttlMs: number;
    private readonly now: () => number;

    private hits: number = 0;
    private misses: number = 0;
    private computations: number = 0;
    private failures: number = 0;

    constructor(ttlMs: number = DEFAULT_RESULT_TTL_MS, now: () => number = Date.now) {
        this.ttlMs = ttlMs;
        this.now = now;
    }

    async getOrCompute(key: string, compute: Compute<T>, signal?: AbortSignal): Promise<T> {
        const lookup = await this.lookup(key, compute, signal);
        return lookup.value;
    }

    /**
     * Like getOrCompute, also reporting whether the value came from the cache.
     * Aborting `signal` rejects this caller with CancellationError; the
     * computation itself goes on while another caller still waits for it.
     */
    async lookup(key: string, compute: Compute<T>, signal?: AbortSignal): Promise<CacheLookup<T>> {
        throwIfAborted(signal);

        const entry = this.getFresh(key);
        if (entry) {
            this.hits++;
            return { value: entry.value, cached: true, createdAt: entry.createdAt };
        }

        const pending = this.inFlight.get(key);
        if (pending && !pending.controller.signal.aborted) {
            this.hits++;
            const shared = await this.join(pending, signal);
            return { value: shared.value, cached: true, createdAt: shared.createdAt };
        }

        this.misses++;
        const created = await this.join(this.start(key, compute), signal);
        return { value: created.value, cached: false, createdAt: created.createdAt };
    }

    invalidate(key: string): void {
        this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
    }

    getStats(): ResultCacheStats {
        return {
            entries: this.entries.size,
            inFlight: this.inFlight.size,
            hits: this.hits,
            misses: this.misses,
            computations: this.computations,
            failures: this.failures,
        };
    }

    private getFresh(key: string): CacheEntry<T> | null {
        const entry = this.entries.get(key);
        if (!entry) return null;
        if (this.now() - entry.createdAt > this.ttlMs) {
            this.entries.delete(key);
            logger.debug('[ResultCache] Entry expired', { key });
            return null;
        }
        return entry;
    }

    private start(key: string, compute: Compute<T>): PendingComputation<T> {
        const controller = new AbortController();
        // compute runs on a later tick, so even a synchronous throw becomes a rejection
        const promise: Promise<CacheEntry<T>> = Promise.resolve()
            .then(() => {
                this.computations++;
                return compute(controller.signal);
            })
            .then(value => {
                const entry: CacheEntry<T> = { value, createdAt: this.now() };
                this.entries.set(key, entry);
                return entry;
            })
            .catch((error: unknown) => {
                this.failures++;
                throw error;
            })
            .finally(() => {
                // A newer computation may already own the key
                if (this.inFlight.get(key)?.promise === promise) {
                    this.inFlight.delete(key);
                }
            });

        const pending: PendingComputation<T> = { promise, controller, waiters: 0 };
        this.inFlight.set(key, pending);
        return pending;
    }

    private join(pending: PendingComputation<T>, signal?: AbortSignal): Promise<CacheEntry<T>> {
        pending.waiters++;
        return new Promise<CacheEntry<T>>((resolve, reject) => {
            const onAbort = (): void => {
                pending.waiters--;
                if (pending.waiters === 0) {
                    pending.controller.abort();
                }
                reject(new CancellationError());
            };
            signal?.addEventListener('abort', onAbort, { once: true });

            pending.promise.then(
                entry => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(entry);
                },
                (error: unknown) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }
}
