import type { AnalyzerConfig } from '@/types/config';
import type { DuplicatePolicy } from '@/types/ingest';
import { InvalidParameterError } from './errors';
import { isLogLevel } from './log';

const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['preferCsv', 'preferPdf', 'all'];

export const isDuplicatePolicy = (v: unknown): v is DuplicatePolicy =>
    typeof v === 'string' && (DUPLICATE_POLICIES as readonly string[]).includes(v);

/**
 * Structural check of a config file: every key that is present has the
 * right type. Unknown keys are ignored; missing keys fall back to defaults.
 */
export function isValidAnalyzerConfig(input: unknown): input is Partial<AnalyzerConfig> {
    if (!input || typeof input !== 'object' || Array.isArray(input)) return false;

    const cfg = input as Partial<Record<keyof AnalyzerConfig, unknown>>;
    const num = (v: unknown) => v === undefined || (typeof v === 'number' && Number.isFinite(v));

    return (
        num(cfg.targetYield) &&
        num(cfg.minTargetYield) &&
        num(cfg.maxTargetYield) &&
        num(cfg.minSamples) &&
        num(cfg.headerScanLines) &&
        num(cfg.importConcurrency) &&
        num(cfg.maxReportedFailures) &&
        num(cfg.maxLogEntries) &&
        (cfg.duplicatePolicy === undefined || isDuplicatePolicy(cfg.duplicatePolicy)) &&
        (cfg.logLevel === undefined || isLogLevel(cfg.logLevel))
    );
}

/** Range checks on a complete config. */
export function validateConfig(config: AnalyzerConfig): AnalyzerConfig {
    const int = (key: keyof AnalyzerConfig, v: number, min: number) => {
        if (!Number.isInteger(v) || v < min) {
            throw new InvalidParameterError(key, `${key} must be an integer ≥ ${min}, got ${v}`);
        }
    };

    if (!(config.minTargetYield > 0 && config.minTargetYield < config.maxTargetYield && config.maxTargetYield < 1)) {
        throw new InvalidParameterError(
            'minTargetYield',
            `target yield range [${config.minTargetYield}, ${config.maxTargetYield}] must lie inside (0, 1)`
        );
    }
    if (!(config.targetYield >= config.minTargetYield && config.targetYield <= config.maxTargetYield)) {
        throw new InvalidParameterError(
            'targetYield',
            `targetYield ${config.targetYield} outside [${config.minTargetYield}, ${config.maxTargetYield}]`
        );
    }
    int('minSamples', config.minSamples, 2);
    int('headerScanLines', config.headerScanLines, 1);
    int('importConcurrency', config.importConcurrency, 1);
    int('maxReportedFailures', config.maxReportedFailures, 0);
    int('maxLogEntries', config.maxLogEntries, 0);
    return config;
}
