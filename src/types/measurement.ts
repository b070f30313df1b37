// Runtime shapes shared by the parser, the session store and the statistics layer

////////////////////////////////////////////////////////////////////////////////
// NOTE: Records
////////////////////////////////////////////////////////////////////////////////

export enum MeasurementResult {
    Pass = 'Pass',
    Fail = 'Fail',
    NotEvaluated = 'NotEvaluated',      // design value is 0 → not under tolerance
}

/**
 * One measured characteristic of one inspected unit.
 * Created by the normalizer and frozen once it enters the store.
 */
export interface MeasurementRecord {
    itemName: string;                   // inspected characteristic, e.g. "Gap-A"
    chipIndex: number;                  // "No" column of the report
    measuredValue: number;
    designValue: number;
    upperTolerance: number;             // offset from design value
    lowerTolerance: number;             // offset from design value (usually ≤ 0)
    unit: string | null;
    instrumentJudgement: string | null; // raw OK/NG column, audit only
    timestamp: number | null;           // epoch ms, null → arrival order
    sourcePath: string;
    sourceBatchId: number;
    lineNumber: number;                 // 1-based line in the source report
    result: MeasurementResult;
}

////////////////////////////////////////////////////////////////////////////////
// NOTE: Session
////////////////////////////////////////////////////////////////////////////////

export interface ImportBatch {
    batchId: number;                    // monotonic within a session
    sourcePath: string | null;          // folder, or null for an explicit file list
    fileCount: number;
    importedAt: number;                 // epoch ms
}

export interface ItemSeries {
    itemName: string;
    records: MeasurementRecord[];       // arrival order across batches
}

export type CpkReliability = 'reliable' | 'smallSample' | 'invalid';

export interface ItemStatistics {
    itemName: string;
    sampleCount: number;                // evaluated records only
    ngCount: number;
    notEvaluatedCount: number;
    failRate: number | null;            // null → N/A

    mean: number | null;
    stdDev: number | null;              // population (÷N)
    min: number | null;
    max: number | null;

    // representative spec (most frequent tolerance triple)
    designValue: number | null;
    upperTolerance: number | null;
    lowerTolerance: number | null;
    usl: number | null;
    lsl: number | null;
    toleranceDivergent: boolean;

    cpu: number | null;
    cpl: number | null;
    cpk: number | null;                 // null → N/A
    cpkReliability: CpkReliability;
    lowConfidence: boolean;
}

////////////////////////////////////////////////////////////////////////////////
// NOTE: Tolerance suggestion
////////////////////////////////////////////////////////////////////////////////

export type SuggestionReliability = 'reliable' | 'smallSample' | 'zeroSpread';

export type SpecVerdict = 'tooTight' | 'adequate' | 'ample' | 'unknown';

export interface ToleranceSuggestion {
    itemName: string;
    targetYield: number;
    zScore: number;
    sampleCount: number;
    mean: number;
    stdDev: number;

    suggestedTolerance: number;         // ± around the mean
    lowerBound: number;
    upperBound: number;

    confidenceFlag: boolean;
    reliability: SuggestionReliability;

    // relative to the current design value
    offset: number;
    designUpperTolerance: number;
    designLowerTolerance: number;
    designSymmetricTolerance: number;
    specVerdict: SpecVerdict;
}

export interface SessionSummary {
    fileCount: number;
    itemCount: number;
    itemsWithNg: number;
    averageYield: number | null;
    batchCount: number;
    recordCount: number;
}
