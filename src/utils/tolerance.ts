import { SPEC_AMPLE_RATIO, SPEC_TIGHT_RATIO, EPSILON } from '@/constants';
import type { ItemSeries, SpecVerdict, ToleranceSuggestion } from '@/types/measurement';
import { InsufficientDataError, InvalidParameterError } from './errors';
import { isEvaluated, moments, representativeTolerance } from './statistics';

export interface ToleranceOptions {
    minSamples: number;
    minTargetYield: number;
    maxTargetYield: number;
}

/** Acklam's rational approximation of the inverse standard normal CDF. */
export function invNorm(p: number): number {
    const a = [
        -39.69683028665376,
        220.9460984245205,
        -275.9285104469687,
        138.357751867269,
        -30.66479806614716,
        2.506628277459239,
    ];
    const b = [
        -54.47609879822406,
        161.5858368580409,
        -155.6989798598866,
        66.80131188771972,
        -13.28068155288572,
    ];
    const c = [
        -0.007784894002430293,
        -0.3223964580411365,
        -2.400758277161838,
        -2.549732539343734,
        4.374664141464968,
        2.938163982698783,
    ];
    const d = [
        0.007784695709041462,
        0.3224671290700398,
        2.445134137142996,
        3.754408661907416,
    ];

    const plow = 0.02425;
    const phigh = 1 - plow;

    if (p < plow) {
        const q = Math.sqrt(-2 * Math.log(p));
        return (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
            ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1);
    }
    if (p > phigh) {
        const q = Math.sqrt(-2 * Math.log(1 - p));
        return -(((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
            ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1);
    }
    const q = p - 0.5;
    const r = q * q;
    return (((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q /
        (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1);
}

/** Two-sided z for a centred yield: Φ⁻¹(0.5 + y/2). */
export const zForYield = (targetYield: number) => invNorm(0.5 + targetYield / 2);

export function validateTargetYield(targetYield: number, options: Pick<ToleranceOptions, 'minTargetYield' | 'maxTargetYield'>) {
    if (!Number.isFinite(targetYield)
        || targetYield < options.minTargetYield
        || targetYield > options.maxTargetYield) {
        throw new InvalidParameterError(
            'targetYield',
            `target yield ${targetYield} outside [${options.minTargetYield}, ${options.maxTargetYield}]`
        );
    }
}

/** Compare a ± suggestion with the widest side of the current spec. */
export function specVerdict(suggested: number, upper: number, lower: number): SpecVerdict {
    const current = Math.max(Math.abs(upper), Math.abs(lower));
    if (current < EPSILON) return 'unknown';
    if (suggested > current * SPEC_TIGHT_RATIO) return 'tooTight';
    if (suggested < current * SPEC_AMPLE_RATIO) return 'ample';
    return 'adequate';
}

/**
 * Symmetric tolerance around the mean that would give `targetYield`
 * under a normal assumption, plus its design-relative view.
 * @throws InvalidParameterError, InsufficientDataError
 */
export function suggestTolerance(series: ItemSeries, targetYield: number, options: ToleranceOptions): ToleranceSuggestion {
    validateTargetYield(targetYield, options);

    const evaluated = series.records.filter(isEvaluated);
    const m = moments(evaluated.map(r => r.measuredValue));
    const spec = representativeTolerance(evaluated);
    if (!m || !spec || m.n < 2) throw new InsufficientDataError(series.itemName, evaluated.length);

    const zScore = zForYield(targetYield);
    const half = zScore * m.stdDev;
    const offset = m.mean - spec.design;
    const smallSample = m.n < options.minSamples;

    return {
        itemName: series.itemName,
        targetYield,
        zScore,
        sampleCount: m.n,
        mean: m.mean,
        stdDev: m.stdDev,

        suggestedTolerance: half,
        lowerBound: m.mean - half,
        upperBound: m.mean + half,

        confidenceFlag: smallSample,
        reliability: m.stdDev < EPSILON ? 'zeroSpread' : smallSample ? 'smallSample' : 'reliable',

        offset,
        designUpperTolerance: half + offset,
        designLowerTolerance: -(half - offset),
        designSymmetricTolerance: half + Math.abs(offset),
        specVerdict: specVerdict(half, spec.upper, spec.lower),
    };
}
