/**
 * Public API.
 */
export { DataDex, type DataDexOptions } from './library/datadex.js';
export { LibrarySchema, normalizeColumns, type ColumnSpec } from './library/schema.js';
export { Indexer, type IndexerOptions, type IndexResult } from './indexer/indexer.js';
export { parseParams, parseJsonParams, readParamsFile, type ParseOptions } from './params/parser.js';
export { parseLiteral } from './params/literal.js';
export { hashDirectory, renameToDigest } from './hash/hash-directory.js';
export { parseClause } from './query/parser.js';
export { compileQuery, filterRows, inferColumnKinds, type RowMatcher, type ColumnKind } from './query/evaluator.js';
export type { Predicate, Literal, ComparisonOp } from './query/ast.js';
export type { IndexStore } from './storage/index-store.js';
export { DatadexDatabase } from './storage/database.js';
export { resolveConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export {
    DatadexError,
    ConfigurationError,
    SchemaError,
    DatadexIOError,
    ParseError,
    QueryError,
    isDatadexError,
    type DatadexErrorCode,
} from './errors.js';
export * from './types/index.js';
