/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Full datadex configuration merged from CLI flags, env vars, and config file.
 */
export interface DatadexConfig {
    // Storage
    db: string;

    // Indexing
    hashDir: boolean;
    paramsFilename: string;
    blankLineSeparates: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: DatadexConfig = {
    db: './datadex.db',
    hashDir: false,
    paramsFilename: 'params.txt',
    blankLineSeparates: false,
    logLevel: 'info',
    jsonLogs: false,
};
