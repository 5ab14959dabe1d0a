import pino from 'pino';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: ReadonlySet<string> = new Set(['silent', 'error', 'warn', 'info', 'debug']);

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 *
 * Modules fetch the logger with `getLogger()` at call time so that a later
 * `initLogger()` takes effect everywhere.
 */
let loggerInstance: pino.Logger | null = null;

export function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && LOG_LEVELS.has(value);
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a logger at `CUNEIBIB_LOG_LEVEL` (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const envLevel = process.env['CUNEIBIB_LOG_LEVEL'];
        loggerInstance = initLogger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
    }
    return loggerInstance;
}
