import { describe, expect, it } from 'vitest';
import { isCompleteHeader, normalizeLabel, resolveColumns } from './labels';

describe('normalizeLabel', () => {
    it('drops case, separators and a trailing unit', () => {
        expect(normalizeLabel('Measured Value (mm)')).toBe('measuredvalue');
        expect(normalizeLabel(' No. ')).toBe('no');
        expect(normalizeLabel('Upper_Tol:')).toBe('uppertol');
    });

    it('folds full-width forms before matching', () => {
        expect(normalizeLabel('實測值（mm）')).toBe('實測值');
        expect(normalizeLabel('ＵＳＬ')).toBe('usl');
    });

    it('keeps sign prefixes', () => {
        expect(normalizeLabel('+Tol')).toBe('+tol');
        expect(normalizeLabel('-Tol')).toBe('-tol');
    });
});

describe('resolveColumns', () => {
    it('maps a Traditional Chinese instrument header', () => {
        const columns = resolveColumns(['No', '測量專案', '實測值', '單位', '設計值', '上限公差', '下限公差', '判斷']);
        expect(columns).toEqual({
            index: 0,
            itemName: 1,
            measured: 2,
            unit: 3,
            design: 4,
            upperTolerance: 5,
            lowerTolerance: 6,
            judgement: 7,
        });
        expect(isCompleteHeader(columns)).toBe(true);
    });

    it('maps an English header with USL/LSL limits', () => {
        const columns = resolveColumns(['Index', 'Item', 'Measured', 'Nominal', 'USL', 'LSL']);
        expect(columns).toEqual({ index: 0, itemName: 1, measured: 2, design: 3, usl: 4, lsl: 5 });
        expect(isCompleteHeader(columns)).toBe(true);
    });

    it('accepts short "No…" labels for the index column', () => {
        const columns = resolveColumns(['NoID', 'Actual', 'Design', '+Tol', '-Tol']);
        expect(columns).toEqual({ index: 0, measured: 1, design: 2, upperTolerance: 3, lowerTolerance: 4 });
    });

    it('uses a pluggable matcher', () => {
        const columns = resolveColumns(
            ['No', 'MeasuredAvg', 'DesignNom', 'UpperTol', 'LowerTol'],
            { matcher: (label, synonym) => label.startsWith(synonym) }
        );
        expect(columns).toEqual({ index: 0, measured: 1, design: 2, upperTolerance: 3, lowerTolerance: 4 });
    });

    it('rejects a metadata line as a header', () => {
        const columns = resolveColumns(['Instrument', 'IM-8000']);
        expect(columns).toEqual({});
        expect(isCompleteHeader(columns)).toBe(false);
    });

    it('needs both sides of a limit pair', () => {
        expect(isCompleteHeader({ index: 0, measured: 1, design: 2, usl: 3 })).toBe(false);
        expect(isCompleteHeader({ index: 0, measured: 1, design: 2, usl: 3, lsl: 4 })).toBe(true);
    });
});
