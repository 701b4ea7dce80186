import { describe, it, expect } from '@jest/globals';
import { ConfigurationError } from '../detection/errors.js';
import {
    buildScanKey,
    fingerprintCandidates,
    fingerprintCatalogQuery,
    noSideThreshold,
    roundProbability,
    sampleTargets,
    validateWindowSpec,
} from '../detection/window-spec.js';
import { makeMarket, makeSpec, RESOLVED_AT } from './fixtures.js';

function problemsOf(run: () => void): string[] {
    try {
        run();
    } catch (error) {
        if (error instanceof ConfigurationError) return error.problems;
        throw error;
    }
    return [];
}

describe('validateWindowSpec', () => {
    it('should accept the default spec', () => {
        expect(() => validateWindowSpec(makeSpec())).not.toThrow();
    });

    it('should reject offsets that are not strictly decreasing', () => {
        expect(problemsOf(() => validateWindowSpec(makeSpec({ offsetsDays: [7, 14, 3] }))))
            .toEqual(['offsetsDays must be strictly decreasing toward resolution']);
    });

    it('should reject an empty offset list', () => {
        expect(problemsOf(() => validateWindowSpec(makeSpec({ offsetsDays: [] }))))
            .toEqual(['offsetsDays must not be empty']);
    });

    it('should reject offsets beyond the lookback', () => {
        expect(problemsOf(() => validateWindowSpec(makeSpec({ offsetsDays: [90, 7], maxLookbackDays: 60 }))))
            .toEqual(['offsetsDays[0]=90 exceeds maxLookbackDays=60']);
    });

    it('should reject an early threshold at or below one half', () => {
        expect(problemsOf(() => validateWindowSpec(makeSpec({ earlyCertaintyThreshold: 0.5, finalCertaintyThreshold: 0.3 }))))
            .toEqual(['earlyCertaintyThreshold must be above 0.5']);
    });

    it('should reject a final threshold not below the early threshold', () => {
        expect(problemsOf(() => validateWindowSpec(makeSpec({ finalCertaintyThreshold: 0.8 }))))
            .toEqual(['finalCertaintyThreshold must be below earlyCertaintyThreshold']);
    });

    it('should list every problem at once', () => {
        const problems = problemsOf(() => validateWindowSpec(makeSpec({ minVolume: -1, maxLookbackDays: 0, offsetsDays: [3] })));

        expect(problems).toEqual([
            'maxLookbackDays must be a positive number',
            'offsetsDays[0]=3 exceeds maxLookbackDays=0',
            'minVolume must be a non-negative number',
        ]);
    });
});

describe('window helpers', () => {
    it('should round probabilities to 4 decimals', () => {
        expect(roundProbability(0.123456)).toBe(0.1235);
        expect(roundProbability(0.85 - 0.3)).toBe(0.55);
    });

    it('should derive the NO threshold from the early threshold', () => {
        expect(noSideThreshold(makeSpec({ earlyCertaintyThreshold: 0.7 }))).toBe(0.3);
        expect(noSideThreshold(makeSpec({ earlyCertaintyThreshold: 0.85 }))).toBe(0.15);
    });

    it('should place sample targets before resolution, furthest first', () => {
        const targets = sampleTargets(makeMarket(), makeSpec());

        expect(targets.map(t => t.toISOString())).toEqual([
            '2024-06-16T12:00:00.000Z',
            '2024-06-23T12:00:00.000Z',
            '2024-06-27T12:00:00.000Z',
        ]);
        expect(targets.every(t => t < RESOLVED_AT)).toBe(true);
    });
});

describe('scan keys', () => {
    it('should fingerprint candidates independently of order and duplicates', () => {
        const a = makeMarket({ id: 'a' });
        const b = makeMarket({ id: 'b' });

        expect(fingerprintCandidates([a, b])).toBe(fingerprintCandidates([b, a, b]));
        expect(fingerprintCandidates([a])).not.toBe(fingerprintCandidates([a, b]));
    });

    it('should change the key when any threshold changes', () => {
        const fingerprint = fingerprintCatalogQuery('api', 60, 20);

        expect(buildScanKey(makeSpec(), fingerprint)).toBe(buildScanKey(makeSpec(), fingerprint));
        expect(buildScanKey(makeSpec(), fingerprint))
            .not.toBe(buildScanKey(makeSpec({ finalCertaintyThreshold: 0.35 }), fingerprint));
        expect(buildScanKey(makeSpec(), fingerprint))
            .not.toBe(buildScanKey(makeSpec(), fingerprintCatalogQuery('local', 60, 20)));
    });
});
