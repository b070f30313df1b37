import type { DuplicatePolicy } from './ingest';
import type { LogLevel } from './log';

export interface AnalyzerConfig {
    targetYield: number;                // default yield for exports & the CLI
    minTargetYield: number;
    maxTargetYield: number;
    minSamples: number;                 // below this, results are flagged low-confidence

    headerScanLines: number;            // how far to look for the header row
    importConcurrency: number;          // files parsed at once
    maxReportedFailures: number;        // bound on ImportResult.failures
    duplicatePolicy: DuplicatePolicy;   // same-name .csv + .pdf in one folder

    logLevel: LogLevel;
    maxLogEntries: number;              // captured into the session's log slice
}
