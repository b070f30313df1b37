import type { ImportResult } from '@/types/ingest';
import type { Logger } from './log';

/** One summary line per import run, plus a sample of the failures at debug level. */
export function logImportReport(result: ImportResult, logger: Logger, durationMs?: number) {
    const fmtN = (v: number) => new Intl.NumberFormat('en-US').format(v);

    const label = result.batch.sourcePath ?? `${fmtN(result.filesTotal)} file(s)`;
    const details =
        `batch #${result.batch.batchId} | files: ${fmtN(result.filesSucceeded)}/${fmtN(result.filesTotal)} ok` +
        ` | records: ${fmtN(result.recordsImported)}` +
        ` | failed files: ${fmtN(result.filesFailed)} | failed rows: ${fmtN(result.rowsFailed)}` +
        (result.cancelled ? ' | cancelled' : '') +
        (durationMs != null ? ` | ${fmtN(Math.round(durationMs))} ms` : '');

    if (result.filesFailed > 0 || result.rowsFailed > 0) logger.warn(`📦 ${label}  ${details}`);
    else logger.info(`📦 ${label}  ${details}`);

    if (result.failures.length) {
        const max = 10;
        const sample = result.failures.slice(0, max);
        const more = result.failures.length - sample.length + result.failuresTruncated;
        for (const f of sample) {
            logger.debug(`  ${f.kind} ${f.sourcePath}${f.lineNumber != null ? `:${f.lineNumber}` : ''} ${f.message}`);
        }
        if (more > 0) logger.debug(`  …(+${fmtN(more)} more)`);
    }
}
