import type { AnalyzerConfig } from '@/types/config';
import type { ConsoleLogState } from '@/types/log';
import type { ImportJobsState } from '@/types/job';
import type { SessionState } from '@/slices/sessionSlice';

export const now = () => new Date().toISOString();

export const initialConfig: AnalyzerConfig = {
    targetYield: 0.90,
    minTargetYield: 0.80,
    maxTargetYield: 0.9973,
    minSamples: 30,

    headerScanLines: 60,
    importConcurrency: 4,
    maxReportedFailures: 100,
    duplicatePolicy: 'preferCsv',

    logLevel: 'info',
    maxLogEntries: 1000,
};

export const initialSessionState: SessionState = {
    series: {},
    batches: [],
    nextBatchId: 1,
    generation: 0,
};

export const initialLogState: ConsoleLogState = {
    logs: [],
};

export const initialImportJobsState: ImportJobsState = {
    jobs: [],
    activeId: null,
};
