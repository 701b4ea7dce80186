import { describe, it, expect, afterEach } from '@jest/globals';
import { defaultWindowSpec, getEnvVarNumber, getEnvVarNumberList } from '../config.js';

describe('config helpers', () => {
    afterEach(() => {
        delete process.env.TEST_NUMBER;
        delete process.env.TEST_LIST;
    });

    it('should parse numbers and fall back on garbage', () => {
        process.env.TEST_NUMBER = '0.85';
        expect(getEnvVarNumber('TEST_NUMBER', 1)).toBe(0.85);

        process.env.TEST_NUMBER = 'lots';
        expect(getEnvVarNumber('TEST_NUMBER', 1)).toBe(1);
        expect(getEnvVarNumber('TEST_UNSET_NUMBER', 7)).toBe(7);
    });

    it('should parse comma separated number lists', () => {
        process.env.TEST_LIST = '30, 14,7';
        expect(getEnvVarNumberList('TEST_LIST', [1])).toEqual([30, 14, 7]);

        process.env.TEST_LIST = '30,x';
        expect(getEnvVarNumberList('TEST_LIST', [1])).toEqual([1]);
    });

    it('should build a window spec from the configured defaults', () => {
        const spec = defaultWindowSpec();

        expect(spec.offsetsDays.length).toBeGreaterThan(0);
        expect(spec.earlyCertaintyThreshold).toBeGreaterThan(spec.finalCertaintyThreshold);
    });
});
