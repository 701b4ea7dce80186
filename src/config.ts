import dotenv from 'dotenv';
import type { ReversalWindowSpec } from './detection/types.js';
import { validateWindowSpec } from './detection/window-spec.js';
import { ConfigurationError } from './detection/errors.js';
import { bucketBoundaryProblems } from './detection/analytics-service.js';

dotenv.config();

export interface Config {
    // Polymarket
    gammaHost: string;
    clobHost: string;
    httpTimeoutMs: number;

    // Logging
    logLevel: string;
    logDir: string;

    // Reversal window defaults
    reversalOffsetsDays: number[];
    earlyCertaintyThreshold: number;
    finalCertaintyThreshold: number;
    minVolumeUsd: number;
    maxLookbackDays: number;

    // Scan settings
    scanDaysBack: number;
    scanBatchSize: number;
    scanMaxCandidatePages: number;
    scanResultLimit: number;         // black swans returned per query by default
    sampleHalfWindowHours: number;   // ±window around each target timestamp
    sampleFidelityMinutes: number;

    // Retry policy for upstream price history
    retryMaxAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;

    resultCacheTtlMinutes: number;

    // Large moves over local snapshots
    largeMoveWindowHours: number;
    largeMoveThresholdPoints: number;

    // Calibration buckets, percent boundaries from 0 to 100
    probabilityBuckets: number[];

    // Snapshot collection
    snapshotStorePath: string;
    collectorMinVolumeUsd: number;
    collectorMaxDaysToResolution: number;
    collectorMarketLimit: number;
    collectionIntervalMinutes: number;   // 0 disables the in-process collector

    dashboardPort: number;
}

function getEnvVarOptional(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

export function getEnvVarNumber(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

export function getEnvVarNumberList(name: string, defaultValue: number[]): number[] {
    const value = process.env[name];
    if (!value) return defaultValue;
    const parsed = value
        .split(',')
        .map(part => part.trim())
        .filter(part => part.length > 0)
        .map(part => parseFloat(part));
    if (parsed.length === 0 || parsed.some(n => isNaN(n))) return defaultValue;
    return parsed;
}

export const config: Config = {
    gammaHost: getEnvVarOptional('GAMMA_HOST', 'https://gamma-api.polymarket.com'),
    clobHost: getEnvVarOptional('CLOB_HOST', 'https://clob.polymarket.com'),
    httpTimeoutMs: getEnvVarNumber('HTTP_TIMEOUT_MS', 15000),

    logLevel: getEnvVarOptional('LOG_LEVEL', 'info'),
    logDir: getEnvVarOptional('LOG_DIR', 'logs'),

    reversalOffsetsDays: getEnvVarNumberList('REVERSAL_OFFSETS_DAYS', [14, 7, 3]),
    earlyCertaintyThreshold: getEnvVarNumber('EARLY_CERTAINTY_THRESHOLD', 0.70),
    finalCertaintyThreshold: getEnvVarNumber('FINAL_CERTAINTY_THRESHOLD', 0.40),
    minVolumeUsd: getEnvVarNumber('MIN_VOLUME_USD', 100000),
    maxLookbackDays: getEnvVarNumber('MAX_LOOKBACK_DAYS', 60),

    scanDaysBack: getEnvVarNumber('SCAN_DAYS_BACK', 60),
    scanBatchSize: getEnvVarNumber('SCAN_BATCH_SIZE', 20),
    scanMaxCandidatePages: getEnvVarNumber('SCAN_MAX_CANDIDATE_PAGES', 20), // 100 markets per page
    scanResultLimit: getEnvVarNumber('SCAN_RESULT_LIMIT', 50),
    sampleHalfWindowHours: getEnvVarNumber('SAMPLE_HALF_WINDOW_HOURS', 24),
    sampleFidelityMinutes: getEnvVarNumber('SAMPLE_FIDELITY_MINUTES', 60),

    retryMaxAttempts: getEnvVarNumber('RETRY_MAX_ATTEMPTS', 3),
    retryBaseDelayMs: getEnvVarNumber('RETRY_BASE_DELAY_MS', 500),
    retryMaxDelayMs: getEnvVarNumber('RETRY_MAX_DELAY_MS', 5000),

    resultCacheTtlMinutes: getEnvVarNumber('RESULT_CACHE_TTL_MINUTES', 30),

    largeMoveWindowHours: getEnvVarNumber('LARGE_MOVE_WINDOW_HOURS', 24),
    largeMoveThresholdPoints: getEnvVarNumber('LARGE_MOVE_THRESHOLD_POINTS', 15),

    probabilityBuckets: getEnvVarNumberList('PROBABILITY_BUCKETS', [0, 50, 60, 70, 80, 90, 95, 100]),

    snapshotStorePath: getEnvVarOptional('SNAPSHOT_STORE_PATH', 'data/snapshots.json'),
    collectorMinVolumeUsd: getEnvVarNumber('COLLECTOR_MIN_VOLUME_USD', 100000),
    collectorMaxDaysToResolution: getEnvVarNumber('COLLECTOR_MAX_DAYS_TO_RESOLUTION', 30),
    collectorMarketLimit: getEnvVarNumber('COLLECTOR_MARKET_LIMIT', 500),
    collectionIntervalMinutes: getEnvVarNumber('COLLECTION_INTERVAL_MINUTES', 60),

    dashboardPort: getEnvVarNumber('DASHBOARD_PORT', 8034),
};

/**
 * Reversal window built from the configured defaults
 */
export function defaultWindowSpec(): ReversalWindowSpec {
    return {
        offsetsDays: [...config.reversalOffsetsDays],
        earlyCertaintyThreshold: config.earlyCertaintyThreshold,
        finalCertaintyThreshold: config.finalCertaintyThreshold,
        minVolume: config.minVolumeUsd,
        maxLookbackDays: config.maxLookbackDays,
    };
}

export function validateConfig(): void {
    validateWindowSpec(defaultWindowSpec());

    const problems: string[] = [];
    if (!Number.isInteger(config.scanBatchSize) || config.scanBatchSize < 1) {
        problems.push('SCAN_BATCH_SIZE must be a positive integer');
    }
    if (!Number.isInteger(config.scanResultLimit) || config.scanResultLimit < 1) {
        problems.push('SCAN_RESULT_LIMIT must be a positive integer');
    }
    if (config.resultCacheTtlMinutes <= 0) {
        problems.push('RESULT_CACHE_TTL_MINUTES must be positive');
    }
    if (config.sampleHalfWindowHours <= 0) {
        problems.push('SAMPLE_HALF_WINDOW_HOURS must be positive');
    }
    if (config.retryMaxAttempts < 1) {
        problems.push('RETRY_MAX_ATTEMPTS must be at least 1');
    }
    problems.push(...bucketBoundaryProblems(config.probabilityBuckets).map(p => `PROBABILITY_BUCKETS ${p}`));
    if (problems.length > 0) {
        throw new ConfigurationError('Invalid configuration', problems);
    }
}
