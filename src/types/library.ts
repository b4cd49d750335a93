import type { CellValue } from './params.js';

/**
 * A library column as persisted alongside the rows.
 */
export interface LibraryColumn {
    name: string;
    description: string | null;
}

/**
 * One indexed record: one value per library column plus the owning dataset.
 */
export interface Row {
    values: CellValue[];
    datasetPath: string;
}

/**
 * A dataset that could not be indexed, with the reason.
 */
export interface IndexFailure {
    path: string;
    message: string;
}

/**
 * Outcome of a single `index()` walk.
 */
export interface IndexReport {
    ok: boolean;
    datasets: number;
    rows: number;
    skipped: number;
    failures: IndexFailure[];
}
