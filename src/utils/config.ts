import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CuneibibConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger, isLogLevel } from './logger.js';

const unitInterval = z.number().min(0).max(1);

/**
 * Shape of cuneibib.config.json. Every key is optional; unknown keys are rejected.
 */
const FileConfigSchema = z
    .object({
        db: z.string().min(1).optional(),
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
        jsonLogs: z.boolean().optional(),
        matcher: z
            .object({
                titleThreshold: unitInterval.optional(),
                lengthRatioCutoff: unitInterval.optional(),
            })
            .strict()
            .optional(),
        policy: z
            .object({
                autoMergeThreshold: unitInterval.optional(),
                reviewThreshold: unitInterval.optional(),
            })
            .strict()
            .optional(),
        verify: z
            .object({
                maxChainDepth: z.number().int().positive().optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export type CliConfigFlags = Partial<Pick<CuneibibConfig, 'db' | 'logLevel' | 'jsonLogs'>>;

/**
 * Load configuration from cuneibib.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('cuneibib', {
        searchPlaces: ['cuneibib.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid config file: ${issues.join('; ')}`, result.filepath, { cause: parsed.error });
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): CliConfigFlags {
    const env: CliConfigFlags = {};

    const db = process.env['CUNEIBIB_DB'];
    if (db) env.db = db;

    const level = process.env['CUNEIBIB_LOG_LEVEL'];
    if (isLogLevel(level)) env.logLevel = level;

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * @param searchFrom - Directory to look for the config file in (defaults to cwd)
 */
export async function resolveConfig(
    cliFlags: CliConfigFlags,
    searchFrom?: string
): Promise<CuneibibConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    const merged: CuneibibConfig = {
        db: cliFlags.db ?? envConfig.db ?? fileConfig?.db ?? DEFAULT_CONFIG.db,
        logLevel: cliFlags.logLevel ?? envConfig.logLevel ?? fileConfig?.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? fileConfig?.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
        // Deep merge nested objects
        matcher: {
            ...DEFAULT_CONFIG.matcher,
            ...fileConfig?.matcher,
        },
        policy: {
            ...DEFAULT_CONFIG.policy,
            ...fileConfig?.policy,
        },
        verify: {
            ...DEFAULT_CONFIG.verify,
            ...fileConfig?.verify,
        },
    };

    if (merged.policy.reviewThreshold > merged.policy.autoMergeThreshold) {
        throw new ConfigError(
            `policy.reviewThreshold (${merged.policy.reviewThreshold}) exceeds policy.autoMergeThreshold (${merged.policy.autoMergeThreshold})`,
            'cuneibib.config.json'
        );
    }

    return merged;
}
