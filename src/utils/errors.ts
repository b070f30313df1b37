import type { FailureKind } from '@/types/ingest';

export type AnalyzerErrorCode =
    | 'MALFORMED_REPORT'
    | 'RECORD_PARSE'
    | 'INSUFFICIENT_DATA'
    | 'INVALID_PARAMETER'
    | 'IO_FAILURE'
    | 'IMPORT_FAILED';

export class AnalyzerError extends Error {
    readonly code: AnalyzerErrorCode;

    constructor(code: AnalyzerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** File-level: no usable header, unsupported format, unreadable document structure. */
export class MalformedReportError extends AnalyzerError {
    readonly sourcePath: string;

    constructor(reason: string, sourcePath: string, options?: { cause?: unknown }) {
        super('MALFORMED_REPORT', reason, options);
        this.sourcePath = sourcePath;
    }
}

/** Row-level: one bad row; the rest of the file continues. */
export class RecordParseError extends AnalyzerError {
    readonly sourcePath: string;
    readonly lineNumber: number;

    constructor(reason: string, sourcePath: string, lineNumber: number) {
        super('RECORD_PARSE', reason);
        this.sourcePath = sourcePath;
        this.lineNumber = lineNumber;
    }
}

export class InsufficientDataError extends AnalyzerError {
    readonly sampleCount: number;

    constructor(itemName: string, sampleCount: number, required = 2) {
        super('INSUFFICIENT_DATA', `${itemName}: ${sampleCount} evaluated sample(s), at least ${required} required`);
        this.sampleCount = sampleCount;
    }
}

export class InvalidParameterError extends AnalyzerError {
    readonly parameter: string;

    constructor(parameter: string, message: string) {
        super('INVALID_PARAMETER', message);
        this.parameter = parameter;
    }
}

export class IOFailure extends AnalyzerError {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        super('IO_FAILURE', `${path}: ${toErrorMessage(cause)}`, { cause });
        this.path = path;
    }
}

export function toErrorMessage(err: unknown): string {
    return typeof err === 'object' && err !== null
        ? err instanceof Error ? err.message : String(err)
        : typeof err === 'string' ? err : 'unknown error';
}

/** Map an error caught while importing a file onto the ImportResult taxonomy. */
export function failureKindOf(err: unknown): FailureKind | null {
    if (err instanceof MalformedReportError) return 'MalformedReport';
    if (err instanceof RecordParseError) return 'RecordParse';
    if (err instanceof IOFailure) return 'IO';
    return null;
}
