import type { ImportBatch, MeasurementRecord } from '@/types/measurement';
import type { FileImportSummary, FileOutcome, ImportFailure, ImportResult } from '@/types/ingest';

/**
 * Folds per-file outcomes into an ImportResult. Counters are always
 * complete; only the failure list is capped at `maxFailures`.
 */
export class ImportResultBuilder {
    private readonly files: FileImportSummary[] = [];
    private readonly failures: ImportFailure[] = [];
    private truncated = 0;
    private records = 0;
    private rowsFailed = 0;

    constructor(private readonly batch: ImportBatch, private readonly maxFailures: number) { }

    add(outcome: Pick<FileOutcome, 'sourcePath' | 'records' | 'failures'>) {
        const fileFailed = outcome.failures.some(f => f.level === 'file');
        const rowErrors = outcome.failures.filter(f => f.level === 'row').length;

        this.records += outcome.records.length;
        this.rowsFailed += rowErrors;
        this.files.push({
            sourcePath: outcome.sourcePath,
            status: fileFailed ? 'failed' : 'ok',
            records: outcome.records.length,
            rowErrors,
        });

        for (const failure of outcome.failures) {
            if (this.failures.length < this.maxFailures) this.failures.push(failure);
            else this.truncated++;
        }
    }

    finish(cancelled = false): ImportResult {
        const filesFailed = this.files.filter(f => f.status === 'failed').length;
        return {
            batch: this.batch,
            filesTotal: this.files.length,
            filesSucceeded: this.files.length - filesFailed,
            filesFailed,
            recordsImported: this.records,
            rowsFailed: this.rowsFailed,
            failures: this.failures.slice(),
            failuresTruncated: this.truncated,
            cancelled,
            files: this.files.slice(),
        };
    }
}

/**
 * Group an explicit record list (and its failures) by source file, in the
 * order each file is first seen.
 */
export function groupBySource(
    records: readonly MeasurementRecord[],
    failures: readonly ImportFailure[] = [],
    files?: readonly string[]
): Array<Pick<FileOutcome, 'sourcePath' | 'records' | 'failures'>> {
    const order: string[] = files ? [...files] : [];
    const byPath = new Map<string, { records: MeasurementRecord[]; failures: ImportFailure[] }>();
    const slot = (path: string) => {
        let entry = byPath.get(path);
        if (!entry) {
            entry = { records: [], failures: [] };
            byPath.set(path, entry);
            if (!order.includes(path)) order.push(path);
        }
        return entry;
    };
    order.forEach(slot);
    records.forEach(r => slot(r.sourcePath).records.push(r));
    failures.forEach(f => slot(f.sourcePath).failures.push(f));

    return order.map(sourcePath => {
        const entry = slot(sourcePath);
        return { sourcePath, records: entry.records, failures: entry.failures };
    });
}
