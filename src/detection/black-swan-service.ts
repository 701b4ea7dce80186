/**
 * Black Swan Service
 * Lists candidates from a data source, scans them and memoises the report
 * per (window spec, candidate set).
 */

import { logger } from '../logger.js';
import type { DataSource } from './data-source.js';
import { ConfigurationError } from './errors.js';
import type { ResultCache } from './result-cache.js';
import { BoundedConcurrentScanner } from './scanner.js';
import type {
    ClassificationResult,
    DataSourceKind,
    Market,
    ReversalWindowSpec,
    ScanReport,
    ScanStats,
} from './types.js';
import {
    buildScanKey,
    DAY_MS,
    fingerprintCandidates,
    fingerprintCatalogQuery,
    validateWindowSpec,
} from './window-spec.js';

export interface BlackSwanQuery {
    source: DataSourceKind;
    daysBack: number;
    limit: number;
    spec?: ReversalWindowSpec;
    signal?: AbortSignal;
}

export interface BlackSwanResponse {
    source: DataSourceKind;
    daysBack: number;
    blackSwans: ClassificationResult[];
    stats: ScanStats;
    errorCount: number;
    cached: boolean;
    computedAt: Date;
}

export interface BlackSwanServiceOptions {
    defaultSpec: ReversalWindowSpec;
    batchSize: number;
    maxCandidatePages: number;
    now?: () => Date;
}

export function rankBlackSwans(results: readonly ClassificationResult[], limit: number): ClassificationResult[] {
    return results
        .filter(r => r.isBlackSwan)
        .sort((a, b) => b.magnitude - a.magnitude || a.marketId.localeCompare(b.marketId))
        .slice(0, limit);
}

export class BlackSwanService {
    private readonly resolveSource: (kind: DataSourceKind) => DataSource;
    private readonly cache: ResultCache<ScanReport>;
    private readonly options: BlackSwanServiceOptions;
    private readonly now: () => Date;

    constructor(
        resolveSource: (kind: DataSourceKind) => DataSource,
        cache: ResultCache<ScanReport>,
        options: BlackSwanServiceOptions
    ) {
        this.resolveSource = resolveSource;
        this.cache = cache;
        this.options = options;
        this.now = options.now ?? (() => new Date());
    }

    async findBlackSwans(query: BlackSwanQuery): Promise<BlackSwanResponse> {
        const problems: string[] = [];
        if (!Number.isFinite(query.daysBack) || query.daysBack <= 0) {
            problems.push('daysBack must be a positive number');
        }
        if (!Number.isInteger(query.limit) || query.limit < 1) {
            problems.push('limit must be a positive integer');
        }
        if (problems.length > 0) {
            throw new ConfigurationError('Invalid black swan query', problems);
        }

        const spec = query.spec ?? this.options.defaultSpec;
        validateWindowSpec(spec);

        const source = this.resolveSource(query.source);
        const key = buildScanKey(
            spec,
            fingerprintCatalogQuery(source.kind, query.daysBack, this.options.maxCandidatePages)
        );

        // The scan may be shared, so it runs under the cache's signal rather than the caller's
        const lookup = await this.cache.lookup(key, async signal => {
            const since = new Date(this.now().getTime() - query.daysBack * DAY_MS);
            const candidates = await source.catalog.listResolvedMarkets(since, spec.minVolume, signal);
            logger.info(`[BlackSwanService] Scanning ${candidates.length} ${source.kind} candidates`, {
                daysBack: query.daysBack,
            });
            return this.createScanner(source).scan(candidates, spec, { signal });
        }, query.signal);

        return {
            source: source.kind,
            daysBack: query.daysBack,
            blackSwans: rankBlackSwans(lookup.value.results, query.limit),
            stats: lookup.value.stats,
            errorCount: Object.keys(lookup.value.errors).length,
            cached: lookup.cached,
            computedAt: new Date(lookup.createdAt),
        };
    }

    /**
     * Scan an explicit candidate set, bypassing the catalog
     */
    async scanMarkets(
        candidates: readonly Market[],
        source: DataSourceKind,
        spec: ReversalWindowSpec = this.options.defaultSpec,
        signal?: AbortSignal
    ): Promise<ScanReport> {
        validateWindowSpec(spec);
        const dataSource = this.resolveSource(source);
        const key = buildScanKey(spec, `${dataSource.kind}:${fingerprintCandidates(candidates)}`);
        return this.cache.getOrCompute(
            key,
            shared => this.createScanner(dataSource).scan(candidates, spec, { signal: shared }),
            signal
        );
    }

    private createScanner(source: DataSource): BoundedConcurrentScanner {
        return new BoundedConcurrentScanner(source.sampler, this.options.batchSize);
    }
}
