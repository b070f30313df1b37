import { createAsyncThunk } from '@reduxjs/toolkit';

import type { RootState } from '@/store';
import type { ImportProgress, ImportResult } from '@/types/ingest';
import type { ImportBatch } from '@/types/measurement';
import { mapOrdered, processFile } from '@/utils/batchLoader';
import type { ReportFile } from '@/utils/batchLoader';
import { logImportReport } from '@/utils/console';
import { toErrorMessage } from '@/utils/errors';
import { ImportResultBuilder } from '@/utils/importResult';
import type { Logger } from '@/utils/log';
import { jobFinished, jobProgress, jobStarted } from './importJobSlice';
import { batchRegistered, recordsMerged } from './sessionSlice';

export interface ImportReportsArg {
    jobId: string;
    sourcePath: string | null;          // folder, or null for an explicit list
    files: ReportFile[];
    headerScanLines: number;
    importConcurrency: number;
    maxReportedFailures: number;
    logger: Logger;
    generation?: number;                // session generation the import was started in
    signal?: AbortSignal;
    onProgress?: (progress: ImportProgress) => void;
}

/**
 * Import one batch of report files. Each file merges into the session
 * with a single dispatch, in input order, as soon as it and every file
 * before it are done.
 */
export const importReports = createAsyncThunk<
    ImportResult,
    ImportReportsArg,
    { state: RootState; rejectValue: string }
>(
    'session/importReports',
    async (arg, thunkAPI) => {
        const { jobId, files, logger } = arg;
        try {
            const start = performance.now();

            const generation = arg.generation ?? thunkAPI.getState().session.generation;

            // read and register in the same tick so concurrent imports get distinct ids
            const batch: ImportBatch = {
                batchId: thunkAPI.getState().session.nextBatchId,
                sourcePath: arg.sourcePath,
                fileCount: files.length,
                importedAt: Date.now(),
            };
            thunkAPI.dispatch(batchRegistered(batch, generation));
            thunkAPI.dispatch(jobStarted({ id: jobId, batchId: batch.batchId }));

            const builder = new ImportResultBuilder(batch, arg.maxReportedFailures);
            let processed = 0;

            const cancelled = await mapOrdered(
                files,
                arg.importConcurrency,
                (file) => processFile(file, batch.batchId, { headerScanLines: arg.headerScanLines }),
                (outcome) => {
                    if (outcome.records.length) thunkAPI.dispatch(recordsMerged(batch, outcome.records, generation));
                    builder.add(outcome);
                    processed++;
                    thunkAPI.dispatch(jobProgress({ id: jobId, processed, currentFile: outcome.sourcePath }));
                    arg.onProgress?.({
                        jobId,
                        processed,
                        total: files.length,
                        currentFile: outcome.sourcePath,
                        sizeBytes: outcome.sizeBytes,
                    });
                },
                arg.signal
            );

            const result = builder.finish(cancelled);
            thunkAPI.dispatch(jobFinished({ id: jobId, status: cancelled ? 'cancelled' : 'done' }));
            logImportReport(result, logger, performance.now() - start);
            return result;
        } catch (err: unknown) {
            const message = toErrorMessage(err);
            logger.error('import failed:', message);
            thunkAPI.dispatch(jobFinished({ id: jobId, status: 'error', error: message }));
            return thunkAPI.rejectWithValue(message);
        }
    }
);
