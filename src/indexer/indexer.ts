import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import type { IndexFailure, IndexReport, Row } from '../types/index.js';
import type { LibrarySchema } from '../library/schema.js';
import { readParamsFile } from '../params/parser.js';
import { hashDirectory, renameToDigest } from '../hash/hash-directory.js';
import { DatadexIOError, describeError } from '../errors.js';
import { getComponentLogger } from '../utils/logger.js';

export interface IndexerOptions {
    paramsFilename: string;
    hashDir: boolean;
    blankLineSeparates: boolean;
}

export interface IndexResult {
    rows: Row[];
    report: IndexReport;
}

function byName(a: Dirent, b: Dirent): number {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function isFile(path: string): boolean {
    try {
        return statSync(path).isFile();
    } catch {
        return false;
    }
}

/**
 * Walks a directory tree and turns every dataset directory (one that holds
 * a parameter file) into rows shaped by the library schema.
 *
 * Dataset directories are leaves: the walk does not descend into them.
 * A root that holds a parameter file is itself the only dataset.
 */
export class Indexer {
    private logger = getComponentLogger('Indexer');

    constructor(private readonly options: IndexerOptions) {}

    run(root: string, schema: LibrarySchema): IndexResult {
        let rootIsDir = false;
        try {
            rootIsDir = statSync(root).isDirectory();
        } catch (error) {
            const { message, errno } = describeError(error);
            throw new DatadexIOError(root, 'index', message, errno);
        }
        if (!rootIsDir) {
            throw new DatadexIOError(root, 'index', 'not a directory');
        }

        const rows: Row[] = [];
        const failures: IndexFailure[] = [];
        let datasets = 0;
        let skipped = 0;

        const collect = (dir: string): void => {
            try {
                const datasetRows = this.indexDataset(dir, schema);
                if (datasetRows.length === 0) {
                    skipped++;
                    this.logger.warn({ path: dir }, 'Empty parameter file, dataset skipped');
                    return;
                }
                rows.push(...datasetRows);
                datasets++;
                this.logger.debug({ path: datasetRows[0]?.datasetPath, rows: datasetRows.length }, 'Dataset indexed');
            } catch (error) {
                const message = describeError(error).message;
                failures.push({ path: dir, message });
                this.logger.warn({ path: dir, error: message }, 'Dataset failed');
            }
        };

        const visit = (dir: string): void => {
            let entries: Dirent[];
            try {
                entries = readdirSync(dir, { withFileTypes: true });
            } catch (error) {
                if (dir === root) {
                    const { message, errno } = describeError(error);
                    throw new DatadexIOError(root, 'index', message, errno);
                }
                failures.push({ path: dir, message: describeError(error).message });
                this.logger.warn({ path: dir, error }, 'Cannot list directory');
                return;
            }

            for (const entry of entries.sort(byName)) {
                if (!entry.isDirectory() || entry.name.startsWith('.')) continue;

                const child = join(dir, entry.name);
                if (isFile(join(child, this.options.paramsFilename))) {
                    collect(child);
                } else {
                    visit(child);
                }
            }
        };

        if (isFile(join(root, this.options.paramsFilename))) {
            collect(root);
        } else {
            visit(root);
        }

        const report: IndexReport = {
            ok: failures.length === 0 || datasets > 0,
            datasets,
            rows: rows.length,
            skipped,
            failures,
        };
        this.logger.info({ root, datasets, rows: rows.length, skipped, failures: failures.length }, 'Index walk complete');

        return { rows, report };
    }

    /**
     * Parse one dataset's parameter file and, in hash mode, rename the
     * dataset to its content digest. The rename happens only once the
     * parameter file has parsed.
     */
    private indexDataset(dir: string, schema: LibrarySchema): Row[] {
        const blocks = readParamsFile(join(dir, this.options.paramsFilename), {
            blankLineSeparates: this.options.blankLineSeparates,
        });
        if (blocks.length === 0) return [];

        let datasetPath = dir;
        if (this.options.hashDir) {
            const digest = hashDirectory(dir);
            datasetPath = renameToDigest(dir, digest);
            this.logger.debug({ from: dir, to: datasetPath }, 'Dataset renamed to content digest');
        }

        const absolute = resolve(datasetPath);
        return blocks.map((block) => schema.project(block, absolute));
    }
}
