import type { LibraryColumn, Row } from '../types/index.js';

/**
 * Backing storage for a library: the column schema and the indexed rows.
 * Rows come back in insertion order.
 */
export interface IndexStore {
    /** Column schema, or null when no library has been created. */
    getColumns(): LibraryColumn[] | null;
    /** Replace the column schema. Rows are left untouched. */
    setColumns(columns: LibraryColumn[]): void;
    /** Remove the schema and every row. */
    dropColumns(): void;

    append(rows: Row[]): void;
    clear(): void;
    all(): Row[];
    count(): number;
    /** Delete every row owned by `datasetPath`; returns the number removed. */
    deleteByPath(datasetPath: string): number;

    close(): void;
}
