export { AnalyzerSession } from './session';
export type { AnalyzerSessionOptions, ImportHandle, ImportOptions, ImportSource, RecordOrder } from './session';
export { createSessionStore } from './store';
export type { AppDispatch, RootState, SessionStore } from './store';

export * from './types/measurement';
export * from './types/report';
export type * from './types/ingest';
export type * from './types/config';
export type * from './types/log';
export type * from './types/job';

export {
    AnalyzerError,
    InsufficientDataError,
    InvalidParameterError,
    IOFailure,
    MalformedReportError,
    RecordParseError,
} from './utils/errors';
export { normalizeLabel, resolveColumns } from './utils/labels';
export type { LabelMatcher, ResolverOptions } from './utils/labels';
export { parseReport } from './utils/parser';
export { classify, normalizeRow } from './utils/normalize';
export { computeStatistics, cpkBand } from './utils/statistics';
export { invNorm, suggestTolerance, zForYield } from './utils/tolerance';
export { loadConfig, resolveConfig } from './utils/init';
export { createLogger } from './utils/log';
export type { Logger } from './utils/log';
