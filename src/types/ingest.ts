import type { ImportBatch, MeasurementRecord } from './measurement';

export type FailureKind = 'MalformedReport' | 'RecordParse' | 'IO';

export interface ImportFailure {
    kind: FailureKind;
    level: 'file' | 'row';
    sourcePath: string;
    lineNumber?: number;
    message: string;
}

export type FileImportStatus = 'ok' | 'failed';

export interface FileImportSummary {
    sourcePath: string;
    status: FileImportStatus;
    records: number;
    rowErrors: number;
}

export interface ImportResult {
    batch: ImportBatch;
    filesTotal: number;
    filesSucceeded: number;
    filesFailed: number;
    recordsImported: number;
    rowsFailed: number;
    failures: ImportFailure[];          // bounded
    failuresTruncated: number;          // dropped beyond the bound
    cancelled: boolean;
    files: FileImportSummary[];
}

/** Everything one file contributed, before it is merged. */
export interface FileOutcome {
    sourcePath: string;
    sizeBytes: number | null;
    records: MeasurementRecord[];
    failures: ImportFailure[];
}

export interface ImportProgress {
    jobId: string;
    processed: number;
    total: number;
    currentFile: string;
    sizeBytes: number | null;
}

export type DuplicatePolicy = 'preferCsv' | 'preferPdf' | 'all';
