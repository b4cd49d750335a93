import type { CellValue, IndexReport, LibraryColumn, Row } from '../types/index.js';

function formatCell(value: CellValue): string {
    return value === null ? 'null' : String(value);
}

/**
 * Tab-separated table: a header line of column names plus `path`,
 * then one line per row.
 */
export function formatRowsTable(columns: readonly LibraryColumn[], rows: readonly Row[]): string[] {
    const header = [...columns.map((c) => c.name), 'path'].join('\t');
    return [header, ...rows.map((row) => [...row.values.map(formatCell), row.datasetPath].join('\t'))];
}

/**
 * Rows as JSON objects keyed by column name.
 */
export function rowsToObjects(columns: readonly LibraryColumn[], rows: readonly Row[]): Array<Record<string, CellValue>> {
    return rows.map((row) => {
        const obj: Record<string, CellValue> = {};
        columns.forEach((column, i) => {
            obj[column.name] = row.values[i] ?? null;
        });
        obj['path'] = row.datasetPath;
        return obj;
    });
}

export function formatIndexReport(root: string, report: IndexReport): string[] {
    const lines = [`Indexed ${report.datasets} datasets (${report.rows} rows) under ${root}`];
    if (report.skipped > 0) {
        lines.push(`  Skipped: ${report.skipped} (empty parameter files)`);
    }
    for (const failure of report.failures) {
        lines.push(`  Failed:  ${failure.path}: ${failure.message}`);
    }
    return lines;
}
