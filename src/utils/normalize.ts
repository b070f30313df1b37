import { DESIGN_ZERO_EPSILON, LIMIT_ULPS } from '@/constants';
import { MeasurementResult } from '@/types/measurement';
import type { MeasurementRecord } from '@/types/measurement';
import type { RawRow, ReportField, RowContext } from '@/types/report';
import { parseReportDate } from './date';
import { RecordParseError } from './errors';

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Strict decimal grammar; thousands separators and units are rejected. */
export function parseStrictNumber(text: string): number | null {
    const str = text.trim();
    if (!NUMBER_RE.test(str)) return null;
    const v = Number(str);
    return Number.isFinite(v) ? v : null;
}

export const isDesignZero = (design: number) => Math.abs(design) < DESIGN_ZERO_EPSILON;

/**
 * Pass iff design+lower ≤ measured ≤ design+upper; design 0 is not evaluated.
 * The limits get a slack of a few ulps at their own magnitude, enough for a
 * sum like 1.1 + -0.2 to still equal 0.9 and nothing more.
 */
export function classify(measured: number, design: number, upper: number, lower: number): MeasurementResult {
    if (isDesignZero(design)) return MeasurementResult.NotEvaluated;
    const lo = design + lower;
    const hi = design + upper;
    const slack = LIMIT_ULPS * Number.EPSILON * Math.max(1, Math.abs(lo), Math.abs(hi));
    return measured >= lo - slack && measured <= hi + slack
        ? MeasurementResult.Pass
        : MeasurementResult.Fail;
}

/**
 * Turn one raw row into a record.
 * @throws RecordParseError for this row only
 */
export function normalizeRow(row: RawRow, ctx: RowContext): MeasurementRecord {
    const fail = (reason: string) => new RecordParseError(reason, ctx.sourcePath, row.lineNumber);
    if (row.defect) throw fail(row.defect);

    const cell = (field: ReportField): string | null => {
        const idx = ctx.columns[field];
        if (idx === undefined) return null;
        return (row.cells[idx]?.[1] ?? '').trim();
    };

    const number = (field: ReportField, label: string): number => {
        const raw = cell(field) ?? '';
        if (raw === '') throw fail(`missing ${label}`);
        const v = parseStrictNumber(raw);
        if (v === null) throw fail(`${label} "${raw}" is not a number`);
        return v;
    };

    const chipIndex = number('index', 'index');
    if (!Number.isInteger(chipIndex)) throw fail(`index "${cell('index')}" is not an integer`);

    const measuredValue = number('measured', 'measured value');
    const designValue = number('design', 'design value');

    // Empty offsets/limits are only allowed where nothing is evaluated
    const optional = (field: ReportField, label: string): number | null => {
        if ((cell(field) ?? '') === '') {
            if (isDesignZero(designValue)) return null;
            throw fail(`missing ${label}`);
        }
        return number(field, label);
    };

    let upperTolerance: number;
    let lowerTolerance: number;
    if (ctx.columns.upperTolerance !== undefined && ctx.columns.lowerTolerance !== undefined) {
        upperTolerance = optional('upperTolerance', 'upper tolerance') ?? 0;
        lowerTolerance = optional('lowerTolerance', 'lower tolerance') ?? 0;
    } else {
        const usl = optional('usl', 'USL');
        const lsl = optional('lsl', 'LSL');
        upperTolerance = usl === null ? 0 : usl - designValue;
        lowerTolerance = lsl === null ? 0 : lsl - designValue;
    }

    const itemName = cell('itemName') || `No.${chipIndex}`;

    // an empty time cell falls back to the file's timestamp; an unreadable one fails the row
    const rawTime = cell('timestamp') ?? '';
    const rowTime = parseReportDate(rawTime);
    if (rawTime !== '' && rowTime === null) throw fail(`timestamp "${rawTime}" is not a date`);

    return {
        itemName,
        chipIndex,
        measuredValue,
        designValue,
        upperTolerance,
        lowerTolerance,
        unit: cell('unit') || null,
        instrumentJudgement: cell('judgement') || null,
        timestamp: rowTime ?? ctx.fileTimestamp,
        sourcePath: ctx.sourcePath,
        sourceBatchId: ctx.batchId,
        lineNumber: row.lineNumber,
        result: classify(measuredValue, designValue, upperTolerance, lowerTolerance),
    };
}
