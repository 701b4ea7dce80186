/**
 * Builds the long-lived objects shared by the server and the CLI:
 * one store, one result cache and the services over them
 */

import { config, defaultWindowSpec } from './config.js';
import { AnalyticsService } from './detection/analytics-service.js';
import { BlackSwanService } from './detection/black-swan-service.js';
import { createDataSource, type DataSource } from './detection/data-source.js';
import { MoveService } from './detection/move-service.js';
import { ResultCache } from './detection/result-cache.js';
import type { DataSourceKind, ScanReport } from './detection/types.js';
import { SnapshotCollector } from './ingestion/snapshot-collector.js';
import { ClobClient } from './polymarket/clob-client.js';
import { GammaClient } from './polymarket/gamma-client.js';
import { JsonFileSnapshotStore } from './storage/snapshot-store.js';

export interface AppContext {
    store: JsonFileSnapshotStore;
    gamma: GammaClient;
    cache: ResultCache<ScanReport>;
    blackSwans: BlackSwanService;
    movers: MoveService;
    analytics: AnalyticsService;
    collector: SnapshotCollector;
}

export async function createContext(): Promise<AppContext> {
    const store = new JsonFileSnapshotStore(config.snapshotStorePath);
    await store.load();

    const gamma = new GammaClient();
    const clob = new ClobClient();
    const cache = new ResultCache<ScanReport>(config.resultCacheTtlMinutes * 60 * 1000);

    const sources = new Map<DataSourceKind, DataSource>();
    const resolveSource = (kind: DataSourceKind): DataSource => {
        let source = sources.get(kind);
        if (!source) {
            source = createDataSource(kind, {
                gamma,
                clob,
                store,
                window: {
                    halfWindowHours: config.sampleHalfWindowHours,
                    maxLookbackDays: config.maxLookbackDays,
                },
                retryPolicy: {
                    maxAttempts: config.retryMaxAttempts,
                    baseDelayMs: config.retryBaseDelayMs,
                    maxDelayMs: config.retryMaxDelayMs,
                },
                fidelityMinutes: config.sampleFidelityMinutes,
                maxCandidatePages: config.scanMaxCandidatePages,
            });
            sources.set(kind, source);
        }
        return source;
    };

    const blackSwans = new BlackSwanService(resolveSource, cache, {
        defaultSpec: defaultWindowSpec(),
        batchSize: config.scanBatchSize,
        maxCandidatePages: config.scanMaxCandidatePages,
    });

    const movers = new MoveService(store, {
        windowHours: config.largeMoveWindowHours,
        thresholdPoints: config.largeMoveThresholdPoints,
    });

    const analytics = new AnalyticsService(store, blackSwans, movers, {
        bucketBoundaries: config.probabilityBuckets,
    });

    const collector = new SnapshotCollector(gamma, store, {
        minVolume: config.collectorMinVolumeUsd,
        maxDaysToResolution: config.collectorMaxDaysToResolution,
        marketLimit: config.collectorMarketLimit,
    });

    return { store, gamma, cache, blackSwans, movers, analytics, collector };
}
