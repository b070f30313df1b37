import { CPK_GOOD, CPK_MARGINAL, EPSILON } from '@/constants';
import { MeasurementResult } from '@/types/measurement';
import type { ItemSeries, ItemStatistics, MeasurementRecord } from '@/types/measurement';

export interface StatisticsOptions {
    minSamples: number;
}

export type CpkBand = 'good' | 'marginal' | 'poor' | 'na';

interface Moments {
    n: number;
    mean: number;
    stdDev: number;     // population
    min: number;
    max: number;
}

export const isEvaluated = (r: MeasurementRecord) => r.result !== MeasurementResult.NotEvaluated;

/** Mean and population standard deviation (÷N); null for an empty sample. */
export function moments(values: readonly number[]): Moments | null {
    const n = values.length;
    if (n === 0) return null;
    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
        sum += v;
        if (v < min) min = v;
        if (v > max) max = v;
    }
    const mean = sum / n;
    let sq = 0;
    for (const v of values) sq += (v - mean) ** 2;
    return { n, mean, stdDev: Math.sqrt(sq / n), min, max };
}

/**
 * Most frequent (design, upper, lower) triple among the records;
 * a tie goes to the triple seen most recently.
 */
export function representativeTolerance(records: readonly MeasurementRecord[]) {
    const seen = new Map<string, { design: number; upper: number; lower: number; count: number; last: number }>();
    records.forEach((r, i) => {
        const key = `${r.designValue}|${r.upperTolerance}|${r.lowerTolerance}`;
        const entry = seen.get(key);
        if (entry) {
            entry.count++;
            entry.last = i;
        } else {
            seen.set(key, { design: r.designValue, upper: r.upperTolerance, lower: r.lowerTolerance, count: 1, last: i });
        }
    });

    let best: { design: number; upper: number; lower: number; count: number; last: number } | null = null;
    for (const entry of seen.values()) {
        if (!best || entry.count > best.count || (entry.count === best.count && entry.last > best.last)) {
            best = entry;
        }
    }
    return best && { design: best.design, upper: best.upper, lower: best.lower, divergent: seen.size > 1 };
}

/** Per-item statistics; depends only on the records of this series. */
export function computeStatistics(series: ItemSeries, options: StatisticsOptions): ItemStatistics {
    const evaluated = series.records.filter(isEvaluated);
    const sampleCount = evaluated.length;
    const ngCount = evaluated.filter(r => r.result === MeasurementResult.Fail).length;
    const m = moments(evaluated.map(r => r.measuredValue));
    const spec = representativeTolerance(evaluated);

    const usl = spec ? spec.design + spec.upper : null;
    const lsl = spec ? spec.design + spec.lower : null;

    let cpu: number | null = null;
    let cpl: number | null = null;
    let cpk: number | null = null;
    if (m && usl !== null && lsl !== null
        && sampleCount >= 2 && m.stdDev >= EPSILON && Math.abs(usl - lsl) >= EPSILON) {
        cpu = (usl - m.mean) / (3 * m.stdDev);
        cpl = (m.mean - lsl) / (3 * m.stdDev);
        cpk = Math.min(cpu, cpl);
    }

    const smallSample = sampleCount < options.minSamples;

    return {
        itemName: series.itemName,
        sampleCount,
        ngCount,
        notEvaluatedCount: series.records.length - sampleCount,
        failRate: sampleCount > 0 ? ngCount / sampleCount : null,
        mean: m?.mean ?? null,
        stdDev: m?.stdDev ?? null,
        min: m?.min ?? null,
        max: m?.max ?? null,
        designValue: spec?.design ?? null,
        upperTolerance: spec?.upper ?? null,
        lowerTolerance: spec?.lower ?? null,
        usl,
        lsl,
        toleranceDivergent: spec?.divergent ?? false,
        cpu,
        cpl,
        cpk,
        cpkReliability: cpk === null ? 'invalid' : smallSample ? 'smallSample' : 'reliable',
        lowConfidence: smallSample,
    };
}

/** ≥1.33 good, 1.0–1.33 marginal, below poor. */
export function cpkBand(cpk: number | null): CpkBand {
    if (cpk === null) return 'na';
    if (cpk >= CPK_GOOD) return 'good';
    if (cpk >= CPK_MARGINAL) return 'marginal';
    return 'poor';
}
