import type { ItemSeries, MeasurementRecord } from '@/types/measurement';
import { classify } from './normalize';

/** Record factory for tests; tolerance defaults are design 100, ±5. */
export function makeRecord(
    measuredValue: number,
    overrides: Partial<Omit<MeasurementRecord, 'measuredValue' | 'result'>> = {}
): MeasurementRecord {
    const base = {
        itemName: 'Gap-A',
        chipIndex: 1,
        designValue: 100,
        upperTolerance: 5,
        lowerTolerance: -5,
        unit: 'mm',
        instrumentJudgement: null,
        timestamp: null,
        sourcePath: '/data/run.csv',
        sourceBatchId: 1,
        lineNumber: 1,
        ...overrides,
    };
    return {
        ...base,
        measuredValue,
        result: classify(measuredValue, base.designValue, base.upperTolerance, base.lowerTolerance),
    };
}

export const makeSeries = (records: MeasurementRecord[], itemName = records[0]?.itemName ?? 'Gap-A'): ItemSeries => ({
    itemName,
    records,
});

export const GAP_A_VALUES = [98, 99, 100, 101, 102, 103, 97, 100, 100, 104];
