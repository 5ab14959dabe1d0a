/**
 * Base class for errors raised by this library. Storage errors from
 * better-sqlite3 are not wrapped and reach the caller as they are.
 */
export class CuneibibError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The config file exists but does not describe a valid configuration.
 */
export class ConfigError extends CuneibibError {
    constructor(
        message: string,
        public readonly filepath: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * A curated supersession file could not be read or parsed.
 */
export class CurationFileError extends CuneibibError {
    constructor(
        message: string,
        public readonly filepath: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * Thrown by `assertReleasable()` when at least one verification check failed.
 */
export class ReleaseBlockedError extends CuneibibError {
    constructor(public readonly failedChecks: string[]) {
        super(`Release blocked by ${failedChecks.length} failed check(s): ${failedChecks.join(', ')}`);
    }
}
