/**
 * Data source selection: the catalog and sampler a scan runs against,
 * chosen once instead of branching per call
 */

import { rateLimitedLogger } from '../logger.js';
import { ClobClient } from '../polymarket/clob-client.js';
import { GammaClient } from '../polymarket/gamma-client.js';
import type { SnapshotStore } from '../storage/snapshot-store.js';
import { ConfigurationError, describeError } from './errors.js';
import { GammaMarketCatalog, LocalMarketCatalog, type MarketCatalog } from './market-catalog.js';
import {
    ApiPriceSampler,
    RetryingPriceSampler,
    SnapshotPriceSampler,
    type PriceSampler,
    type SamplerWindow,
} from './price-sampler.js';
import type { RetryPolicy } from './retry.js';
import type { DataSourceKind } from './types.js';

export interface DataSource {
    kind: DataSourceKind;
    catalog: MarketCatalog;
    sampler: PriceSampler;
}

export interface DataSourceDeps {
    gamma: GammaClient;
    clob: ClobClient;
    store: SnapshotStore;
    window: SamplerWindow;
    retryPolicy: RetryPolicy;
    fidelityMinutes: number;
    maxCandidatePages: number;
}

export function isDataSourceKind(value: unknown): value is DataSourceKind {
    return value === 'api' || value === 'local';
}

export function createDataSource(kind: DataSourceKind, deps: DataSourceDeps): DataSource {
    switch (kind) {
        case 'api':
            return {
                kind,
                catalog: new GammaMarketCatalog(deps.gamma, deps.maxCandidatePages),
                sampler: new RetryingPriceSampler(
                    new ApiPriceSampler(deps.clob, deps.window, deps.fidelityMinutes),
                    deps.retryPolicy,
                    (error, attempt, delayMs) => {
                        rateLimitedLogger.warn('sampler:retry', `[DataSource] Retrying price history (attempt ${attempt})`, {
                            delayMs,
                            error: describeError(error),
                        });
                    }
                ),
            };
        case 'local':
            return {
                kind,
                catalog: new LocalMarketCatalog(deps.store),
                sampler: new SnapshotPriceSampler(deps.store, deps.window),
            };
        default:
            throw new ConfigurationError('Unknown data source', [`source must be 'api' or 'local'`]);
    }
}
