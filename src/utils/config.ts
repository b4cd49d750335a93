import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type DatadexConfig } from '../types/index.js';
import { ConfigurationError, describeError } from '../errors.js';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * Shape accepted from a config file or the environment. Every key is optional;
 * unknown keys are rejected so that typos surface.
 */
const partialConfigSchema = z
    .object({
        db: z.string().min(1),
        hashDir: z.boolean(),
        paramsFilename: z.string().min(1),
        blankLineSeparates: z.boolean(),
        logLevel: logLevelSchema,
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

type PartialConfig = z.infer<typeof partialConfigSchema>;

function validate(source: string, input: unknown): PartialConfig {
    const result = partialConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration in ${source}: ${issues.join('; ')}`, { source, issues }, 'INVALID_CONFIG');
    }
    return result.data;
}

/**
 * Load configuration from datadex.config.json (or a "datadex" key in package.json).
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<PartialConfig | null> {
    const explorer = cosmiconfig('datadex', {
        searchPlaces: ['package.json', 'datadex.config.json'],
    });

    let result: CosmiconfigResult;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        const path = searchFrom ?? process.cwd();
        throw new ConfigurationError(`Cannot load config file: ${describeError(error).message}`, { path }, 'INVALID_CONFIG');
    }
    if (result && !result.isEmpty) {
        return validate(result.filepath, result.config);
    }

    return null;
}

function parseBoolean(name: string, raw: string): boolean {
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
    throw new ConfigurationError(`Environment variable ${name} is not a boolean: '${raw}'`, { name, value: raw }, 'INVALID_CONFIG');
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): PartialConfig {
    const raw: Record<string, unknown> = {};

    const db = env['DATADEX_DB'];
    if (db) raw['db'] = db;

    const hashDir = env['DATADEX_HASH_DIR'];
    if (hashDir !== undefined) raw['hashDir'] = parseBoolean('DATADEX_HASH_DIR', hashDir);

    const logLevel = env['DATADEX_LOG_LEVEL'];
    if (logLevel) raw['logLevel'] = logLevel;

    return validate('environment', raw);
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * `cliFlags` must only carry keys the user actually set.
 */
export async function resolveConfig(
    cliFlags: Partial<DatadexConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<DatadexConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);
    const flagConfig = validate('command line', cliFlags);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...flagConfig,
    };
}

