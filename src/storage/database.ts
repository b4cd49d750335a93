import Database from 'better-sqlite3';
import type { CellValue, LibraryColumn, Row } from '../types/index.js';
import type { IndexStore } from './index-store.js';
import { DatadexError } from '../errors.js';
import { getComponentLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Library schema: one row per column, ordered by position
CREATE TABLE IF NOT EXISTS library_columns (
  position INTEGER PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  description TEXT
);

-- Indexed rows: values are a JSON array aligned with library_columns
CREATE TABLE IF NOT EXISTS library_rows (
  row_id INTEGER PRIMARY KEY,
  dataset_path TEXT NOT NULL,
  values_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_rows_dataset_path ON library_rows(dataset_path);
`;

interface ColumnRecord {
    position: number;
    name: string;
    description: string | null;
}

interface RowRecord {
    row_id: number;
    dataset_path: string;
    values_json: string;
}

function isCellValue(value: unknown): value is CellValue {
    return value === null || typeof value === 'string' || typeof value === 'number';
}

/**
 * Decode a stored values_json column, rejecting anything that is not a flat
 * array of scalars.
 */
function decodeValues(json: string, rowId: number): CellValue[] {
    const decoded: unknown = JSON.parse(json);
    if (!Array.isArray(decoded) || !decoded.every(isCellValue)) {
        throw new DatadexError('IO_ERROR', `Corrupt row ${rowId}: values are not a flat array`, { rowId });
    }
    return decoded;
}

/**
 * Index store on better-sqlite3.
 * Handles schema migration, WAL mode, and row persistence.
 */
export class DatadexDatabase implements IndexStore {
    private db: Database.Database;
    private logger = getComponentLogger('DatadexDatabase');

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');

        this.migrate();

        this.logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            this.logger.debug('Database migrated to v1');
        }
    }

    // ─── Columns ──────────────────────────────────────────────

    getColumns(): LibraryColumn[] | null {
        const records = this.db
            .prepare<[], ColumnRecord>('SELECT position, name, description FROM library_columns ORDER BY position')
            .all();
        if (records.length === 0) return null;
        return records.map((r) => ({ name: r.name, description: r.description }));
    }

    setColumns(columns: LibraryColumn[]): void {
        const insert = this.db.prepare('INSERT INTO library_columns (position, name, description) VALUES (?, ?, ?)');

        this.transaction(() => {
            this.db.prepare('DELETE FROM library_columns').run();
            columns.forEach((column, position) => {
                insert.run(position, column.name, column.description);
            });
        });
    }

    dropColumns(): void {
        this.transaction(() => {
            this.db.prepare('DELETE FROM library_rows').run();
            this.db.prepare('DELETE FROM library_columns').run();
        });
    }

    // ─── Rows ─────────────────────────────────────────────────

    /**
     * Insert rows in a single transaction, preserving their order.
     */
    append(rows: Row[]): void {
        const stmt = this.db.prepare('INSERT INTO library_rows (dataset_path, values_json) VALUES (?, ?)');

        this.transaction(() => {
            for (const row of rows) {
                stmt.run(row.datasetPath, JSON.stringify(row.values));
            }
        });
    }

    clear(): void {
        this.db.prepare('DELETE FROM library_rows').run();
    }

    all(): Row[] {
        return this.db
            .prepare<[], RowRecord>('SELECT row_id, dataset_path, values_json FROM library_rows ORDER BY row_id')
            .all()
            .map((r) => ({ values: decodeValues(r.values_json, r.row_id), datasetPath: r.dataset_path }));
    }

    count(): number {
        const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM library_rows').get();
        return row?.count ?? 0;
    }

    deleteByPath(datasetPath: string): number {
        return this.db.prepare('DELETE FROM library_rows WHERE dataset_path = ?').run(datasetPath).changes;
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        this.logger.debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
