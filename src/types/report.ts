// Shapes produced by the report parser, before normalization

export enum ReportFormat {
    Delimited = 'delimited',
    Pdf = 'pdf',
}

/** Canonical fields the label resolver can recognise in a header row. */
export type ReportField =
    | 'index'
    | 'itemName'
    | 'measured'
    | 'design'
    | 'upperTolerance'
    | 'lowerTolerance'
    | 'usl'
    | 'lsl'
    | 'unit'
    | 'judgement'
    | 'timestamp';

/** Resolved header: field → column index within the header row. */
export type ColumnMap = Partial<Record<ReportField, number>>;

/** Ordered mapping of header label → raw cell text, plus its position in the file. */
export interface RawRow {
    lineNumber: number;
    cells: Array<[label: string, value: string]>;
    defect?: string;                    // the row source could not read this line
}

export interface ParsedReport {
    sourcePath: string;
    format: ReportFormat;
    header: string[];
    columns: ColumnMap;
    measuredAt: number | null;          // file-level timestamp (preamble or file name)
    encoding: string | null;            // null for PDF
    rows: Iterable<RawRow>;             // lazy
}

/** Context the normalizer needs besides the row itself. */
export interface RowContext {
    sourcePath: string;
    batchId: number;
    columns: ColumnMap;
    fileTimestamp: number | null;
}
