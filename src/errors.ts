/**
 * Error taxonomy for datadex.
 *
 * Every error carries a machine-readable `code` and a `details` record
 * naming the offending path, column or clause.
 */

export type DatadexErrorCode =
    | 'NO_LIBRARY'
    | 'INVALID_CONFIG'
    | 'SCHEMA'
    | 'IO_ERROR'
    | 'PARSE_ERROR'
    | 'QUERY_ERROR';

export class DatadexError extends Error {
    constructor(
        public readonly code: DatadexErrorCode,
        message: string,
        public readonly details: Record<string, unknown> = {},
    ) {
        super(message);
        this.name = 'DatadexError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * No library has been created, or the configuration is invalid.
 */
export class ConfigurationError extends DatadexError {
    constructor(message: string, details: Record<string, unknown> = {}, code: 'NO_LIBRARY' | 'INVALID_CONFIG' = 'NO_LIBRARY') {
        super(code, message, details);
        this.name = 'ConfigurationError';
    }
}

/**
 * The library schema cannot be (re)defined as requested.
 */
export class SchemaError extends DatadexError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super('SCHEMA', message, details);
        this.name = 'SchemaError';
    }
}

/**
 * A filesystem operation failed on `path`.
 */
export class DatadexIOError extends DatadexError {
    constructor(
        public readonly path: string,
        operation: string,
        reason: string,
        errno?: string,
    ) {
        super('IO_ERROR', `IO error during ${operation} on '${path}': ${reason}`, {
            path,
            operation,
            reason,
            ...(errno ? { errno } : {}),
        });
        this.name = 'DatadexIOError';
    }
}

/**
 * A parameter file could not be read or decoded.
 */
export class ParseError extends DatadexError {
    constructor(
        public readonly path: string,
        reason: string,
    ) {
        super('PARSE_ERROR', `Cannot parse parameter file '${path}': ${reason}`, { path, reason });
        this.name = 'ParseError';
    }
}

/**
 * A query clause is malformed or refers to something that does not exist.
 */
export class QueryError extends DatadexError {
    constructor(
        public readonly clause: string,
        reason: string,
        position?: number,
    ) {
        super('QUERY_ERROR', `Invalid query '${clause}': ${reason}`, {
            clause,
            reason,
            ...(position !== undefined ? { position } : {}),
        });
        this.name = 'QueryError';
    }
}

/**
 * Type guard to check if an error is a DatadexError.
 */
export function isDatadexError(error: unknown): error is DatadexError {
    return error instanceof DatadexError;
}

/**
 * Best-effort message and errno from an unknown thrown value.
 */
export function describeError(error: unknown): { message: string; errno?: string } {
    if (error instanceof Error) {
        const errno = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return errno ? { message: error.message, errno } : { message: error.message };
    }
    return { message: String(error) };
}
