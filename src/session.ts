import { createSessionStore } from './store';
import type { RootState, SessionStore } from './store';
import { jobQueued, jobsClearCompleted } from './slices/importJobSlice';
import { importReports } from './slices/importReports';
import { addLog } from './slices/logSlice';
import {
    batchRegistered,
    recordsMerged,
    selectAllStatistics,
    selectBatches,
    selectItemNames,
    selectItemStatistics,
    selectRecordCount,
    selectSeries,
    selectSourcePaths,
    sessionReset,
} from './slices/sessionSlice';

import type { AnalyzerConfig } from './types/config';
import type { ImportFailure, ImportProgress, ImportResult } from './types/ingest';
import type { ImportJob } from './types/job';
import type { Log } from './types/log';
import type {
    ImportBatch,
    ItemStatistics,
    MeasurementRecord,
    SessionSummary,
    ToleranceSuggestion,
} from './types/measurement';

import type { ReportFile } from './utils/batchLoader';
import { AnalyzerError, InsufficientDataError } from './utils/errors';
import { buildRawDataCsv, buildStatisticsCsv, writeCsv } from './utils/exportReport';
import { listReportFiles } from './utils/fs';
import { groupBySource, ImportResultBuilder } from './utils/importResult';
import { loadConfig, resolveConfig } from './utils/init';
import { createLogger } from './utils/log';
import type { Logger } from './utils/log';
import { suggestTolerance, validateTargetYield } from './utils/tolerance';

export interface AnalyzerSessionOptions {
    config?: Partial<AnalyzerConfig>;
    echo?: boolean;                     // print log entries to the console (default true)
}

export interface ImportOptions {
    signal?: AbortSignal;
    onProgress?: (progress: ImportProgress) => void;
}

export type ImportSource = { folder: string } | { files: string[] };

/** A running import: await `result`, or `cancel()` before the remaining files start. */
export interface ImportHandle {
    jobId: string;
    result: Promise<ImportResult>;
    cancel(): void;
}

export type RecordOrder = 'arrival' | 'timestamp';

/**
 * Query surface over one analysis session. Owns its store; two sessions
 * never share records, batch ids or logs.
 */
export class AnalyzerSession {
    readonly config: AnalyzerConfig;
    readonly logger: Logger;
    private readonly store: SessionStore;
    private readonly running = new Set<AbortController>();

    constructor(options: AnalyzerSessionOptions = {}) {
        this.config = resolveConfig(options.config);
        this.store = createSessionStore();
        this.logger = createLogger('analyzer', {
            level: this.config.logLevel,
            echo: options.echo ?? true,
            sink: (log) => this.store.dispatch(addLog(log, this.config.maxLogEntries)),
        });
    }

    /** Session configured from `analyzer.config.json` (or `path`), overridden by `options.config`. */
    static async fromConfigFile(path?: string, options: AnalyzerSessionOptions = {}): Promise<AnalyzerSession> {
        const config = await loadConfig(path, createLogger('config', { echo: options.echo ?? true }));
        return new AnalyzerSession({ ...options, config: { ...config, ...options.config } });
    }

    get state(): RootState {
        return this.store.getState();
    }

    ////////////////////////////////////////////////////////////////////////////
    // NOTE: Queries
    ////////////////////////////////////////////////////////////////////////////

    /** Item names in natural order. */
    listItems(): string[] {
        return selectItemNames(this.state);
    }

    getStatistics(itemName: string): ItemStatistics | null {
        return selectItemStatistics(this.state, itemName, this.config.minSamples);
    }

    getAllStatistics(): ItemStatistics[] {
        return selectAllStatistics(this.state, this.config.minSamples);
    }

    /**
     * Records of one item. `timestamp` order is stable and puts records
     * without a timestamp last, in arrival order.
     */
    getRecords(itemName: string, { order = 'arrival' }: { order?: RecordOrder } = {}): readonly MeasurementRecord[] {
        const records = selectSeries(this.state, itemName)?.records ?? [];
        if (order === 'arrival') return records;
        return records.slice().sort((a, b) => {
            if (a.timestamp === b.timestamp) return 0;
            if (a.timestamp === null) return 1;
            if (b.timestamp === null) return -1;
            return a.timestamp - b.timestamp;
        });
    }

    /** @throws InvalidParameterError, InsufficientDataError */
    suggestTolerance(itemName: string, targetYield = this.config.targetYield): ToleranceSuggestion {
        const series = selectSeries(this.state, itemName);
        if (!series) {
            validateTargetYield(targetYield, this.config);
            throw new InsufficientDataError(itemName, 0);
        }
        return suggestTolerance(series, targetYield, this.config);
    }

    summary(): SessionSummary {
        const stats = this.getAllStatistics();
        const yields = stats.flatMap(s => s.failRate === null ? [] : [1 - s.failRate]);
        return {
            fileCount: selectSourcePaths(this.state).size,
            itemCount: stats.length,
            itemsWithNg: stats.filter(s => s.ngCount > 0).length,
            averageYield: yields.length ? yields.reduce((a, b) => a + b, 0) / yields.length : null,
            batchCount: selectBatches(this.state).length,
            recordCount: selectRecordCount(this.state),
        };
    }

    getLogs(): Log[] {
        return this.state.log.logs;
    }

    getJobs(): ImportJob[] {
        return this.state.importJobs.jobs;
    }

    ////////////////////////////////////////////////////////////////////////////
    // NOTE: Imports
    ////////////////////////////////////////////////////////////////////////////

    /**
     * Import the report files directly inside `path`.
     * @throws IOFailure when the folder cannot be listed
     */
    async importFolder(path: string, options: ImportOptions = {}): Promise<ImportResult> {
        return this.startImport({ folder: path }, options).result;
    }

    async importFiles(paths: string[], options: ImportOptions = {}): Promise<ImportResult> {
        return this.startImport({ files: paths }, options).result;
    }

    /**
     * Start an import in the background with its own cancel handle.
     * Records belong to the session generation current at this call; a
     * `reset()` before they land cancels the import and drops them.
     */
    startImport(source: ImportSource, options: ImportOptions = {}): ImportHandle {
        const controller = new AbortController();
        const upstream = options.signal;
        const forward = () => controller.abort();
        if (upstream?.aborted) controller.abort();
        else upstream?.addEventListener('abort', forward, { once: true });
        this.running.add(controller);

        const generation = this.state.session.generation;
        const opts: ImportOptions = { ...options, signal: controller.signal };
        let jobId = '';
        const onJob = (id: string) => { jobId = id; };

        const run = 'folder' in source
            ? listReportFiles(source.folder, this.config.duplicatePolicy)
                .then(files => this.runImport(source.folder, files, opts, generation, onJob))
            : this.runImport(null, source.files.map(path => ({ path, size: null })), opts, generation, onJob);

        const result = run.finally(() => {
            upstream?.removeEventListener('abort', forward);
            this.running.delete(controller);
        });

        return {
            get jobId() { return jobId; },
            result,
            cancel: () => controller.abort(),
        };
    }

    /**
     * Merge already-normalized records as one batch, in one dispatch.
     * Failures are carried into the result as reported.
     */
    merge(
        batch: ImportBatch,
        records: MeasurementRecord[],
        options: { failures?: ImportFailure[]; files?: string[] } = {}
    ): ImportResult {
        this.store.dispatch(recordsMerged(batch, records));
        const builder = new ImportResultBuilder(batch, this.config.maxReportedFailures);
        for (const outcome of groupBySource(records, options.failures, options.files)) builder.add(outcome);
        return builder.finish();
    }

    /** Allocate and register the next batch id, for callers that feed `merge` themselves. */
    openBatch(sourcePath: string | null, fileCount: number): ImportBatch {
        const batch: ImportBatch = {
            batchId: this.state.session.nextBatchId,
            sourcePath,
            fileCount,
            importedAt: Date.now(),
        };
        this.store.dispatch(batchRegistered(batch));
        return batch;
    }

    /** Cancel running imports and drop every series and batch; batch ids restart at 1. */
    reset() {
        for (const controller of this.running) controller.abort();
        this.store.dispatch(sessionReset());
        this.store.dispatch(jobsClearCompleted());
        this.logger.info('session reset');
    }

    ////////////////////////////////////////////////////////////////////////////
    // NOTE: Export
    ////////////////////////////////////////////////////////////////////////////

    statisticsCsv(targetYield = this.config.targetYield): string {
        validateTargetYield(targetYield, this.config);
        const state = this.state;   // one snapshot for the whole table
        const rows = selectAllStatistics(state, this.config.minSamples).map(stats => {
            const series = selectSeries(state, stats.itemName);
            let suggestedTolerance: number | null = null;
            if (series && stats.sampleCount >= 2) {
                suggestedTolerance = suggestTolerance(series, targetYield, this.config).suggestedTolerance;
            }
            return { stats, suggestedTolerance };
        });
        return buildStatisticsCsv(rows);
    }

    rawDataCsv(): string {
        const state = this.state;
        const names = selectItemNames(state);
        return buildRawDataCsv(names.flatMap(name => selectSeries(state, name)?.records ?? []));
    }

    async exportStatistics(path: string, targetYield = this.config.targetYield): Promise<string> {
        const written = await writeCsv(path, this.statisticsCsv(targetYield));
        this.logger.info(`statistics exported to ${written}`);
        return written;
    }

    async exportRawData(path: string): Promise<string> {
        const written = await writeCsv(path, this.rawDataCsv());
        this.logger.info(`raw data exported to ${written}`);
        return written;
    }

    ////////////////////////////////////////////////////////////////////////////

    private async runImport(
        sourcePath: string | null,
        files: ReportFile[],
        options: ImportOptions,
        generation: number,
        onJob: (jobId: string) => void
    ): Promise<ImportResult> {
        const { payload: job } = this.store.dispatch(jobQueued({ sourcePath, total: files.length }));
        onJob(job.id);

        const action = await this.store.dispatch(importReports({
            jobId: job.id,
            sourcePath,
            files,
            headerScanLines: this.config.headerScanLines,
            importConcurrency: this.config.importConcurrency,
            maxReportedFailures: this.config.maxReportedFailures,
            logger: this.logger.child('import'),
            generation,
            signal: options.signal,
            onProgress: options.onProgress,
        }));

        if (importReports.fulfilled.match(action)) return action.payload;
        throw new AnalyzerError('IMPORT_FAILED', action.payload ?? action.error.message ?? 'import failed');
    }
}
