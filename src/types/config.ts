/**
 * Log level options. `silent` disables output (used by the test suite).
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Matcher configuration.
 */
export interface MatcherConfig {
    /** Minimum normalized-title similarity for a title+year match */
    titleThreshold: number;
    /** Length-difference ratio above which similarity short-circuits to 0 */
    lengthRatioCutoff: number;
}

/**
 * Confidence bands applied by callers of the matcher.
 */
export interface PolicyConfig {
    /** Confidence at or above which a match is merged into the existing row */
    autoMergeThreshold: number;
    /** Confidence at or above which a match is recorded for review */
    reviewThreshold: number;
}

/**
 * Verification configuration.
 */
export interface VerifyConfig {
    /** Hop bound for supersedes_id walks; longer chains are treated as cycles */
    maxChainDepth: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface CuneibibConfig {
    /** SQLite database path */
    db: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    matcher: MatcherConfig;
    policy: PolicyConfig;
    verify: VerifyConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CuneibibConfig = {
    db: './cuneibib.db',
    logLevel: 'info',
    jsonLogs: false,
    matcher: {
        titleThreshold: 0.85,
        lengthRatioCutoff: 0.4,
    },
    policy: {
        autoMergeThreshold: 0.9,
        reviewThreshold: 0.5,
    },
    verify: {
        maxChainDepth: 20,
    },
};
