/**
 * Barrel export for all shared types.
 */
export type { ParamValue, ParameterSet, CellValue } from './params.js';
export type { LibraryColumn, Row, IndexFailure, IndexReport } from './library.js';
export { DEFAULT_CONFIG } from './config.js';
export type { DatadexConfig, LogLevel } from './config.js';
