import { HEADER_VOCABULARY } from '@/constants/vocabulary';
import type { ColumnMap, ReportField } from '@/types/report';

/** Decides whether a normalized header cell names a normalized vocabulary entry. */
export type LabelMatcher = (label: string, synonym: string) => boolean;

export const exactMatcher: LabelMatcher = (label, synonym) => label === synonym;

export interface ResolverOptions {
    vocabulary?: Record<ReportField, readonly string[]>;
    matcher?: LabelMatcher;
}

// Fields tried in this order; the first field to claim a column keeps it
const FIELD_ORDER: ReportField[] = [
    'index', 'itemName', 'measured', 'design',
    'upperTolerance', 'lowerTolerance', 'usl', 'lsl',
    'unit', 'judgement', 'timestamp',
];

/**
 * Canonical form of a header label: NFKC, case-folded, with whitespace,
 * separators and a trailing bracketed unit removed.
 *   "Measured Value (mm)" → "measuredvalue", " No. " → "no", "實測值" → "實測值"
 */
export function normalizeLabel(label: string): string {
    return label
        .normalize('NFKC')
        .trim()
        .replace(/[([][^)\]]*[)\]]\s*$/, '')
        .toLowerCase()
        .replace(/[\s._:：]/g, '');
}

/**
 * Pure mapping from header tokens to field → column index. Format agnostic:
 * the delimited and PDF row sources both go through here.
 */
export function resolveColumns(header: string[], options: ResolverOptions = {}): ColumnMap {
    const vocabulary = options.vocabulary ?? HEADER_VOCABULARY;
    const matcher = options.matcher ?? exactMatcher;
    const labels = header.map(normalizeLabel);
    const columns: ColumnMap = {};
    const taken = new Set<number>();

    for (const field of FIELD_ORDER) {
        const synonyms = vocabulary[field].map(normalizeLabel);
        const idx = labels.findIndex((label, i) =>
            !taken.has(i) && label !== '' && synonyms.some(s => matcher(label, s)));
        if (idx >= 0) {
            columns[field] = idx;
            taken.add(idx);
        }
    }

    // Some firmware writes "No." with extra text ("NoID", "No(#)"); keep short ones
    if (columns.index === undefined) {
        const idx = labels.findIndex((label, i) => !taken.has(i) && label.startsWith('no') && label.length < 10);
        if (idx >= 0) columns.index = idx;
    }

    return columns;
}

/** A header must name the index, measured and design columns plus one complete limit pair. */
export function isCompleteHeader(columns: ColumnMap): boolean {
    const has = (f: ReportField) => columns[f] !== undefined;
    return has('index') && has('measured') && has('design')
        && ((has('upperTolerance') && has('lowerTolerance')) || (has('usl') && has('lsl')));
}
