import type { FileOutcome, ImportFailure } from '@/types/ingest';
import type { MeasurementRecord } from '@/types/measurement';
import type { RowContext } from '@/types/report';
import { failureKindOf, RecordParseError, toErrorMessage } from './errors';
import { readFileBytes } from './fs';
import { normalizeRow } from './normalize';
import { parseReport } from './parser';

export interface ReportFile {
    path: string;
    size: number | null;
}

/**
 * Read, parse and normalize one report. Expected failures end up in the
 * outcome; anything else is a bug and propagates.
 */
export async function processFile(
    file: ReportFile,
    batchId: number,
    options: { headerScanLines: number }
): Promise<FileOutcome> {
    const records: MeasurementRecord[] = [];
    const failures: ImportFailure[] = [];
    let sizeBytes = file.size;

    try {
        const bytes = await readFileBytes(file.path);
        sizeBytes ??= bytes.byteLength;
        const report = await parseReport(bytes, file.path, options);
        const ctx: RowContext = {
            sourcePath: file.path,
            batchId,
            columns: report.columns,
            fileTimestamp: report.measuredAt,
        };
        for (const row of report.rows) {
            try {
                records.push(normalizeRow(row, ctx));
            } catch (err: unknown) {
                if (!(err instanceof RecordParseError)) throw err;
                failures.push({
                    kind: 'RecordParse',
                    level: 'row',
                    sourcePath: file.path,
                    lineNumber: err.lineNumber,
                    message: err.message,
                });
            }
        }
    } catch (err: unknown) {
        const kind = failureKindOf(err);
        if (!kind) throw err;
        // a file that fails as a whole contributes nothing
        return {
            sourcePath: file.path,
            sizeBytes,
            records: [],
            failures: [...failures, { kind, level: 'file', sourcePath: file.path, message: toErrorMessage(err) }],
        };
    }

    return { sourcePath: file.path, sizeBytes, records, failures };
}

/**
 * Run `work` over `items` with at most `limit` in flight and hand each
 * result to `onResult` in input order. The signal is checked before an
 * item starts; items already running finish and are delivered.
 * @returns true when the run stopped because of the signal
 */
export async function mapOrdered<T, R>(
    items: readonly T[],
    limit: number,
    work: (item: T, index: number) => Promise<R>,
    onResult: (result: R, index: number) => void,
    signal?: AbortSignal
): Promise<boolean> {
    const slots: Array<{ value: R } | undefined> = new Array(items.length);
    let next = 0;
    let flushed = 0;
    let cancelled = false;

    const flush = () => {
        while (flushed < items.length) {
            const slot = slots[flushed];
            if (!slot) break;
            slots[flushed] = undefined;
            onResult(slot.value, flushed);
            flushed++;
        }
    };

    const lane = async () => {
        for (;;) {
            if (signal?.aborted) {
                cancelled = true;
                return;
            }
            const i = next++;
            if (i >= items.length) return;
            slots[i] = { value: await work(items[i], i) };
            flush();
        }
    };

    const lanes = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: lanes }, lane));
    return cancelled;
}
