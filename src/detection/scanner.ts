/**
 * Bounded Concurrent Scanner
 * Samples every candidate at each reversal offset in fixed-size batches and
 * classifies the markets. A batch must fully settle before the next one
 * starts, so at most batchSize x offsets requests are in flight.
 */

import { logger, rateLimitedLogger } from '../logger.js';
import { CancellationError, ConfigurationError, describeError, throwIfAborted } from './errors.js';
import type { PriceSampler } from './price-sampler.js';
import { classifyReversal } from './reversal-classifier.js';
import type {
    ClassificationResult,
    Market,
    ProbabilitySample,
    ReversalWindowSpec,
    ScanReport,
    ScanStats,
} from './types.js';
import { sampleTargets, validateWindowSpec } from './window-spec.js';

export const DEFAULT_BATCH_SIZE = 20;

export interface ScanOptions {
    signal?: AbortSignal;
}

type MarketScanOutcome =
    | { kind: 'classified'; result: ClassificationResult }
    | { kind: 'excluded' }
    | { kind: 'failed'; reason: string };

export function partition<T>(items: readonly T[], size: number): T[][] {
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}

export class BoundedConcurrentScanner {
    private readonly sampler: PriceSampler;
    private readonly batchSize: number;

    constructor(sampler: PriceSampler, batchSize: number = DEFAULT_BATCH_SIZE) {
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            throw new ConfigurationError('Invalid scanner options', ['batchSize must be a positive integer']);
        }
        this.sampler = sampler;
        this.batchSize = batchSize;
    }

    async scan(candidates: readonly Market[], spec: ReversalWindowSpec, options: ScanOptions = {}): Promise<ScanReport> {
        validateWindowSpec(spec);
        const { signal } = options;
        throwIfAborted(signal);

        const startedAt = Date.now();
        const unique = new Map<string, Market>();
        for (const market of candidates) {
            if (!unique.has(market.id)) unique.set(market.id, market);
        }

        const stats: ScanStats = {
            candidates: unique.size,
            sampled: 0,
            classified: 0,
            excluded: 0,
            failed: 0,
            blackSwans: 0,
            batches: 0,
            durationMs: 0,
        };

        // Below the floor or unresolved: excluded whatever the samples say
        const eligible: Market[] = [];
        for (const market of unique.values()) {
            if (market.volume < spec.minVolume || market.outcome === null) {
                stats.excluded++;
            } else {
                eligible.push(market);
            }
        }

        const results = new Map<string, ClassificationResult>();
        const errors: Record<string, string> = {};

        for (const batch of partition(eligible, this.batchSize)) {
            throwIfAborted(signal);

            const outcomes = await Promise.all(batch.map(market => this.scanMarket(market, spec, signal)));
            stats.batches++;

            // Partial results are discarded on cancellation
            throwIfAborted(signal);

            outcomes.forEach((outcome, i) => {
                const market = batch[i];
                switch (outcome.kind) {
                    case 'classified':
                        stats.sampled++;
                        stats.classified++;
                        if (outcome.result.isBlackSwan) stats.blackSwans++;
                        results.set(market.id, outcome.result);
                        break;
                    case 'excluded':
                        stats.sampled++;
                        stats.excluded++;
                        break;
                    case 'failed':
                        stats.failed++;
                        errors[market.id] = outcome.reason;
                        break;
                }
            });

            logger.debug(`[Scanner] Batch ${stats.batches} done`, {
                markets: batch.length,
                classified: stats.classified,
                failed: stats.failed,
            });
        }

        stats.durationMs = Date.now() - startedAt;
        logger.info('[Scanner] Scan complete', { ...stats });

        return { results: Array.from(results.values()), errors, stats };
    }

    /**
     * Gathers all of one market's samples, then classifies it.
     * Never rejects except on cancellation.
     */
    private async scanMarket(market: Market, spec: ReversalWindowSpec, signal?: AbortSignal): Promise<MarketScanOutcome> {
        try {
            // allSettled so no request of this market outlives its batch
            const settled = await Promise.allSettled(
                sampleTargets(market, spec).map(target => this.sampler.sample(market, target, signal))
            );

            const samples: ProbabilitySample[] = [];
            for (const outcome of settled) {
                if (outcome.status === 'rejected') throw outcome.reason;
                if (outcome.value.status === 'available') samples.push(outcome.value.sample);
            }

            const result = classifyReversal(market, samples, spec);
            return result ? { kind: 'classified', result } : { kind: 'excluded' };
        } catch (error) {
            if (error instanceof CancellationError || signal?.aborted) {
                throw error instanceof CancellationError ? error : new CancellationError();
            }
            const reason = describeError(error);
            rateLimitedLogger.warn(`scan:${this.sampler.source}`, '[Scanner] Market could not be sampled', {
                marketId: market.id,
                reason,
            });
            return { kind: 'failed', reason };
        }
    }
}
