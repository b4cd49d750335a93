import type { CellValue, LibraryColumn, ParameterSet, Row } from '../types/index.js';
import { SchemaError } from '../errors.js';
import { isKeyword } from '../query/tokenizer.js';

const COLUMN_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Column declaration accepted by `createLibrary`: a list of names, or a
 * map of name → description.
 */
export type ColumnSpec = readonly string[] | Readonly<Record<string, string>>;

/**
 * Normalize a column declaration into validated columns.
 */
export function normalizeColumns(spec: ColumnSpec): LibraryColumn[] {
    const columns: LibraryColumn[] = isNameList(spec)
        ? spec.map((name) => ({ name, description: null }))
        : Object.entries(spec).map(([name, description]) => ({ name, description }));

    if (columns.length === 0) {
        throw new SchemaError('No column names provided');
    }

    const seen = new Set<string>();
    for (const { name } of columns) {
        if (!COLUMN_NAME_PATTERN.test(name)) {
            throw new SchemaError(`Invalid column name '${name}': must start with a letter or underscore and contain only letters, digits and underscores`, { column: name });
        }
        if (isKeyword(name)) {
            throw new SchemaError(`Invalid column name '${name}': reserved query keyword`, { column: name });
        }
        if (seen.has(name)) {
            throw new SchemaError(`Duplicate column name '${name}'`, { column: name });
        }
        seen.add(name);
    }

    return columns;
}

function isNameList(spec: ColumnSpec): spec is readonly string[] {
    return Array.isArray(spec);
}

/**
 * The ordered column set rows are shaped to.
 */
export class LibrarySchema {
    readonly columns: readonly LibraryColumn[];
    private readonly positions: Map<string, number>;

    constructor(columns: readonly LibraryColumn[]) {
        this.columns = columns;
        this.positions = new Map(columns.map((c, i) => [c.name, i]));
    }

    static fromSpec(spec: ColumnSpec): LibrarySchema {
        return new LibrarySchema(normalizeColumns(spec));
    }

    get names(): string[] {
        return this.columns.map((c) => c.name);
    }

    /**
     * Position of a column, or undefined if the library has no such column.
     * Matching is exact and case-sensitive.
     */
    indexOf(name: string): number | undefined {
        return this.positions.get(name);
    }

    /**
     * Shape a parameter block into a row: absent columns become null,
     * parameters outside the schema are dropped.
     */
    project(params: ParameterSet, datasetPath: string): Row {
        const values: CellValue[] = this.columns.map((c) => params.get(c.name) ?? null);
        return { values, datasetPath };
    }
}
