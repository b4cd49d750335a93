import { existsSync } from 'node:fs';
import type { IndexReport, LibraryColumn, Row } from '../types/index.js';
import type { IndexStore } from '../storage/index-store.js';
import { DatadexDatabase } from '../storage/database.js';
import { Indexer, type IndexerOptions } from '../indexer/indexer.js';
import { filterRows } from '../query/evaluator.js';
import { ConfigurationError, SchemaError } from '../errors.js';
import { getComponentLogger } from '../utils/logger.js';
import { LibrarySchema, normalizeColumns, type ColumnSpec } from './schema.js';

export type DataDexOptions = IndexerOptions;

const DEFAULT_OPTIONS: DataDexOptions = {
    paramsFilename: 'params.txt',
    hashDir: false,
    blankLineSeparates: false,
};

/**
 * A library of datasets: a column schema plus the rows indexed against it.
 *
 * All state lives in the store handed to the constructor, so several
 * instances over different stores never interfere.
 */
export class DataDex {
    private readonly options: DataDexOptions;
    private readonly indexer: Indexer;
    private logger = getComponentLogger('DataDex');

    constructor(
        private readonly store: IndexStore,
        options: Partial<DataDexOptions> = {}
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
        this.indexer = new Indexer(this.options);
    }

    /**
     * Open (or create) a SQLite-backed library at `dbPath`.
     */
    static open(dbPath: string, options: Partial<DataDexOptions> = {}): DataDex {
        return new DataDex(new DatadexDatabase(dbPath), options);
    }

    get hashDir(): boolean {
        return this.options.hashDir;
    }

    /**
     * Column schema, or null if no library has been created.
     */
    get columns(): LibraryColumn[] | null {
        return this.store.getColumns();
    }

    // ─── Schema ───────────────────────────────────────────────

    /**
     * Define the library columns. Refused while the library still holds rows.
     */
    createLibrary(spec: ColumnSpec): void {
        const columns = normalizeColumns(spec);

        const existing = this.store.getColumns();
        if (existing) {
            const rows = this.store.count();
            if (rows > 0) {
                throw new SchemaError(
                    `Library already exists with columns (${existing.map((c) => c.name).join(', ')}) and ${rows} rows; reset it first`,
                    { columns: existing.map((c) => c.name), rows }
                );
            }
        }

        this.store.setColumns(columns);
        this.logger.info({ columns: columns.map((c) => c.name) }, 'Library created');
    }

    /**
     * Remove every row, keeping the columns.
     */
    resetLibrary(): void {
        this.requireSchema('reset');
        this.store.clear();
        this.logger.info('Library reset');
    }

    /**
     * Remove the columns and every row.
     */
    dropLibrary(): void {
        this.store.dropColumns();
        this.logger.info('Library dropped');
    }

    // ─── Indexing ─────────────────────────────────────────────

    /**
     * Index every dataset directory under `root`. Returns false only when
     * datasets were found and none of them could be indexed.
     */
    index(root: string): boolean {
        return this.indexWithReport(root).ok;
    }

    indexWithReport(root: string): IndexReport {
        const schema = this.requireSchema('index');
        const { rows, report } = this.indexer.run(root, schema);
        this.store.append(rows);
        return report;
    }

    /**
     * Reset the library, then index `root`.
     */
    reindex(root: string): boolean {
        this.resetLibrary();
        return this.index(root);
    }

    /**
     * Delete the rows of datasets that no longer exist on disk.
     * Returns the number of rows removed.
     */
    prune(): number {
        this.requireSchema('prune');

        let removed = 0;
        const paths = new Set(this.store.all().map((row) => row.datasetPath));
        for (const path of paths) {
            if (!existsSync(path)) {
                removed += this.store.deleteByPath(path);
                this.logger.debug({ path }, 'Pruned missing dataset');
            }
        }

        if (removed > 0) {
            this.logger.info({ removed }, 'Pruned rows');
        }
        return removed;
    }

    // ─── Queries ──────────────────────────────────────────────

    /**
     * Every row, in insertion order.
     */
    lookup(): Row[] {
        return this.store.all();
    }

    /**
     * Dataset paths of the rows matching every clause.
     */
    search(...clauses: string[]): string[] {
        return this.searchRows(...clauses).map((row) => row.datasetPath);
    }

    /**
     * Rows matching every clause, in insertion order.
     */
    searchRows(...clauses: string[]): Row[] {
        const schema = this.requireSchema('search');
        return filterRows(clauses, schema, this.store.all());
    }

    close(): void {
        this.store.close();
    }

    private requireSchema(operation: string): LibrarySchema {
        const columns = this.store.getColumns();
        if (!columns) {
            throw new ConfigurationError(`Cannot ${operation}: no library has been created`, { operation });
        }
        return new LibrarySchema(columns);
    }
}
