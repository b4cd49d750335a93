import { describe, it, expect } from 'vitest';
import { formatIndexReport, formatRowsTable, rowsToObjects } from '../cli/render.js';
import type { LibraryColumn, Row } from '../types/index.js';

const columns: LibraryColumn[] = [
    { name: 'theta', description: null },
    { name: 'phi', description: null },
];

const rows: Row[] = [
    { values: [5, 1.3], datasetPath: 'example/dataset1' },
    { values: [3, null], datasetPath: 'example/dataset3' },
];

describe('CLI rendering', () => {
    it('should format rows as a tab-separated table', () => {
        expect(formatRowsTable(columns, rows)).toEqual([
            'theta\tphi\tpath',
            '5\t1.3\texample/dataset1',
            '3\tnull\texample/dataset3',
        ]);
    });

    it('should convert rows to objects keyed by column', () => {
        expect(rowsToObjects(columns, rows)).toEqual([
            { theta: 5, phi: 1.3, path: 'example/dataset1' },
            { theta: 3, phi: null, path: 'example/dataset3' },
        ]);
    });

    it('should summarize an index report', () => {
        expect(
            formatIndexReport('example', {
                ok: true,
                datasets: 3,
                rows: 4,
                skipped: 1,
                failures: [{ path: 'example/dup', message: 'target exists' }],
            })
        ).toEqual([
            'Indexed 3 datasets (4 rows) under example',
            '  Skipped: 1 (empty parameter files)',
            '  Failed:  example/dup: target exists',
        ]);
    });
});
