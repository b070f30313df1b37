import { describe, expect, it } from 'vitest';
import { InsufficientDataError, InvalidParameterError } from './errors';
import { GAP_A_VALUES, makeRecord, makeSeries } from './testing';
import { invNorm, specVerdict, suggestTolerance, zForYield } from './tolerance';

const OPTIONS = { minSamples: 30, minTargetYield: 0.8, maxTargetYield: 0.9973 };

// mean 10, population σ exactly 1
const unitSpread = (n: number) => makeSeries(
    Array.from({ length: n }, (_, i) => makeRecord(i % 2 === 0 ? 9 : 11, { designValue: 10, upperTolerance: 2, lowerTolerance: -2 }))
);

describe('invNorm', () => {
    it('matches standard normal quantiles', () => {
        expect(invNorm(0.5)).toBeCloseTo(0, 12);
        expect(invNorm(0.975)).toBeCloseTo(1.959964, 5);
        expect(invNorm(0.01)).toBeCloseTo(-2.326348, 5);
        expect(invNorm(0.99)).toBeCloseTo(2.326348, 5);
    });

    it('gives the two-sided z for a yield', () => {
        expect(zForYield(0.8)).toBeCloseTo(1.281552, 5);
        expect(zForYield(0.9)).toBeCloseTo(1.644854, 5);
        expect(zForYield(0.9973)).toBeCloseTo(3, 3);
    });
});

describe('suggestTolerance', () => {
    it.each([
        [0.8, 1.281552],
        [0.9, 1.644854],
        [0.9973, 3.0],
    ])('solves ±z·σ for yield %f', (targetYield, z) => {
        const s = suggestTolerance(unitSpread(40), targetYield, OPTIONS);
        expect(Math.abs(s.suggestedTolerance - z)).toBeLessThan(1e-3);
        expect(s.zScore * s.stdDev).toBeCloseTo(s.suggestedTolerance, 12);
        expect(s.lowerBound).toBeCloseTo(10 - s.suggestedTolerance, 12);
        expect(s.upperBound).toBeCloseTo(10 + s.suggestedTolerance, 12);
        expect(s.confidenceFlag).toBe(false);
        expect(s.reliability).toBe('reliable');
    });

    it('reports the design-relative view', () => {
        const series = makeSeries(
            Array.from({ length: 20 }, (_, i) => makeRecord(i % 2 === 0 ? 10.5 : 11.5, { designValue: 10, upperTolerance: 2, lowerTolerance: -2 }))
        );
        const s = suggestTolerance(series, 0.9, OPTIONS);
        const half = zForYield(0.9) * 0.5;
        expect(s.mean).toBe(11);
        expect(s.stdDev).toBe(0.5);
        expect(s.offset).toBe(1);
        expect(s.suggestedTolerance).toBeCloseTo(half, 12);
        expect(s.designUpperTolerance).toBeCloseTo(half + 1, 12);
        expect(s.designLowerTolerance).toBeCloseTo(1 - half, 12);
        expect(s.designSymmetricTolerance).toBeCloseTo(half + 1, 12);
        expect(s.specVerdict).toBe('ample');
        expect(s.confidenceFlag).toBe(true);
        expect(s.reliability).toBe('smallSample');
    });

    it('solves the Gap-A example', () => {
        const s = suggestTolerance(makeSeries(GAP_A_VALUES.map(v => makeRecord(v))), 0.9, OPTIONS);
        expect(s.sampleCount).toBe(10);
        expect(s.suggestedTolerance).toBeCloseTo(3.38696, 4);
    });

    it('flags a series without spread', () => {
        const s = suggestTolerance(makeSeries([makeRecord(100), makeRecord(100)]), 0.9, OPTIONS);
        expect(s.suggestedTolerance).toBe(0);
        expect(s.reliability).toBe('zeroSpread');
    });

    it('rejects yields outside the domain', () => {
        expect(() => suggestTolerance(unitSpread(40), 0.5, OPTIONS)).toThrow(InvalidParameterError);
        expect(() => suggestTolerance(unitSpread(40), 0.998, OPTIONS)).toThrow(InvalidParameterError);
        expect(() => suggestTolerance(unitSpread(40), Number.NaN, OPTIONS)).toThrow(InvalidParameterError);
        expect(() => suggestTolerance(makeSeries([]), 0.5, OPTIONS)).toThrow(InvalidParameterError);
    });

    it('needs two evaluated samples', () => {
        expect(() => suggestTolerance(makeSeries([makeRecord(100)]), 0.9, OPTIONS)).toThrow(InsufficientDataError);
        const notEvaluated = makeSeries([
            makeRecord(1, { designValue: 0, upperTolerance: 0, lowerTolerance: 0 }),
            makeRecord(2, { designValue: 0, upperTolerance: 0, lowerTolerance: 0 }),
        ]);
        expect(() => suggestTolerance(notEvaluated, 0.9, OPTIONS)).toThrow(InsufficientDataError);
    });
});

describe('specVerdict', () => {
    it('compares against the widest side of the spec with a ±20% band', () => {
        expect(specVerdict(2.5, 2, -2)).toBe('tooTight');
        expect(specVerdict(2.4, 2, -1)).toBe('adequate');
        expect(specVerdict(1.6, 1, -2)).toBe('adequate');
        expect(specVerdict(1.5, 2, -2)).toBe('ample');
        expect(specVerdict(1, 0, 0)).toBe('unknown');
    });
});
