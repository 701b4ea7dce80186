import { createHash } from 'crypto';
import { ConfigurationError } from './errors.js';
import type { Market, ReversalWindowSpec } from './types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Round to 4 decimal places; probabilities are compared after this step
 */
export function roundProbability(value: number): number {
    return Math.round(value * 10000) / 10000;
}

export function noSideThreshold(spec: ReversalWindowSpec): number {
    return roundProbability(1 - spec.earlyCertaintyThreshold);
}

function isProbability(value: number): boolean {
    return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Throws ConfigurationError listing every problem with the window spec
 */
export function validateWindowSpec(spec: ReversalWindowSpec): void {
    const problems: string[] = [];

    if (!Number.isFinite(spec.maxLookbackDays) || spec.maxLookbackDays <= 0) {
        problems.push('maxLookbackDays must be a positive number');
    }

    if (spec.offsetsDays.length === 0) {
        problems.push('offsetsDays must not be empty');
    }
    spec.offsetsDays.forEach((offset, i) => {
        if (!Number.isFinite(offset) || offset <= 0) {
            problems.push(`offsetsDays[${i}] must be a positive number`);
        } else if (offset > spec.maxLookbackDays) {
            problems.push(`offsetsDays[${i}]=${offset} exceeds maxLookbackDays=${spec.maxLookbackDays}`);
        }
        if (i > 0 && !(offset < spec.offsetsDays[i - 1])) {
            problems.push('offsetsDays must be strictly decreasing toward resolution');
        }
    });

    if (!isProbability(spec.earlyCertaintyThreshold)) {
        problems.push('earlyCertaintyThreshold must be a probability in [0, 1]');
    } else if (spec.earlyCertaintyThreshold <= 0.5) {
        // Yes and No favorites would overlap
        problems.push('earlyCertaintyThreshold must be above 0.5');
    }

    if (!isProbability(spec.finalCertaintyThreshold)) {
        problems.push('finalCertaintyThreshold must be a probability in [0, 1]');
    } else if (spec.finalCertaintyThreshold >= spec.earlyCertaintyThreshold) {
        problems.push('finalCertaintyThreshold must be below earlyCertaintyThreshold');
    }

    if (!Number.isFinite(spec.minVolume) || spec.minVolume < 0) {
        problems.push('minVolume must be a non-negative number');
    }

    if (problems.length > 0) {
        throw new ConfigurationError('Invalid reversal window spec', problems);
    }
}

/**
 * Sample target for each offset, furthest from resolution first
 */
export function sampleTargets(market: Market, spec: ReversalWindowSpec): Date[] {
    return spec.offsetsDays.map(offset => new Date(market.resolvedAt.getTime() - offset * DAY_MS));
}

function sha256(payload: unknown): string {
    return createHash('sha256').update(JSON.stringify(payload)).digest('hex');
}

export function fingerprintCandidates(markets: readonly Market[]): string {
    const ids = Array.from(new Set(markets.map(m => m.id))).sort();
    return sha256({ ids });
}

/**
 * Identifies a candidate set by the catalog query that produces it
 */
export function fingerprintCatalogQuery(source: string, daysBack: number, maxPages: number): string {
    return sha256({ source, daysBack, maxPages });
}

/**
 * Cache key for a scan: the window spec plus whatever identifies the candidate set
 */
export function buildScanKey(spec: ReversalWindowSpec, candidateFingerprint: string): string {
    return sha256({
        offsetsDays: spec.offsetsDays,
        earlyCertaintyThreshold: spec.earlyCertaintyThreshold,
        finalCertaintyThreshold: spec.finalCertaintyThreshold,
        minVolume: spec.minVolume,
        maxLookbackDays: spec.maxLookbackDays,
        candidates: candidateFingerprint,
    });
}
