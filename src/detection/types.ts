/**
 * Detection engine types
 */

export type Side = 'YES' | 'NO';

export type SampleSource = 'snapshot' | 'live-query';

export type DataSourceKind = 'api' | 'local';

/**
 * Market as supplied by a catalog. Read-only to the engine.
 */
export interface Market {
    id: string;
    question: string;
    resolvedAt: Date;
    outcome: Side | null;       // null while unresolved
    volume: number;             // total traded volume, USD
    yesTokenId: string | null;  // CLOB token for price history lookups
    slug?: string;
    category?: string | null;
    liquidity?: number;         // USD, as last seen by the collector
}

export interface ProbabilitySample {
    marketId: string;
    timestamp: Date;
    probability: number; // probability of "Yes", 0-1
    source: SampleSource;
}

export type SampleOutcome =
    | { status: 'available'; sample: ProbabilitySample }
    | { status: 'unavailable'; reason: string };

/**
 * Offsets (days before resolution) and thresholds that define a reversal
 */
export interface ReversalWindowSpec {
    offsetsDays: number[];              // strictly decreasing toward resolution, e.g. [14, 7, 3]
    earlyCertaintyThreshold: number;    // >= this is a Yes favorite, <= 1 - this a No favorite
    finalCertaintyThreshold: number;    // favorite must end below this
    minVolume: number;
    maxLookbackDays: number;
}

export interface ClassificationResult {
    marketId: string;
    question: string;
    isBlackSwan: boolean;
    favorite: Side | null;
    winningSide: Side;
    // Favorite's probabilities when a favorite exists, otherwise probability of "Yes"
    earlyProbability: number;
    earlyTimestamp: Date;
    finalProbability: number;
    finalTimestamp: Date;
    magnitude: number;
    volume: number;
}

export interface ScanStats {
    candidates: number;
    sampled: number;
    classified: number;
    excluded: number;
    failed: number;
    blackSwans: number;
    batches: number;
    durationMs: number;
}

export interface ScanReport {
    results: ClassificationResult[];
    errors: Record<string, string>;  // marketId -> reason
    stats: ScanStats;
}

export interface MoveEvent {
    marketId: string;
    startTimestamp: Date;
    endTimestamp: Date;
    probabilityStart: number;
    probabilityEnd: number;
    deltaPoints: number;
    direction: 'up' | 'down';
}

export interface SnapshotSeries {
    marketId: string;
    snapshots: Array<{ timestamp: Date; probability: number }>;
}
