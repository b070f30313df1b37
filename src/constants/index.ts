// Default values (constants) are defined here

// Looked up in the working directory when no explicit config path is given
export const CONFIG_FILENAME = 'analyzer.config.json';

// Extension → row source. Anything else is rejected by the parser.
export const DELIMITED_EXTENSIONS = ['.csv', '.tsv', '.txt'] as const;
export const PDF_EXTENSIONS = ['.pdf'] as const;

// Encodings tried in order for delimited reports (instrument PCs in TW/JP)
export const REPORT_ENCODINGS = ['utf-8', 'big5', 'shift_jis'] as const;

// Below this, a value is treated as zero (design value sentinel, σ, spec width)
export const EPSILON = 1e-9;
export const DESIGN_ZERO_EPSILON = 1e-6;

// Pass/Fail limits are compared with this many ulps of slack at the limit's magnitude
export const LIMIT_ULPS = 4;

// Metadata lines (before the header) are only searched for a timestamp this far
export const METADATA_TIMESTAMP_LINES = 20;

// PDF words whose baselines differ by at most this much (pt) share a line
export const PDF_LINE_TOLERANCE = 3;

// Suggested tolerance vs. current spec: ±20% band counts as "adequate"
export const SPEC_TIGHT_RATIO = 1.2;
export const SPEC_AMPLE_RATIO = 0.8;

export const CPK_GOOD = 1.33;
export const CPK_MARGINAL = 1.0;
