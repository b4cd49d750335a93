#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { DataDex } from '../library/datadex.js';
import { ConfigurationError, isDatadexError } from '../errors.js';
import { formatIndexReport, formatRowsTable, rowsToObjects } from './render.js';
import type { DatadexConfig, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

type GlobalOptions = {
    db?: string;
    paramsFile?: string;
    blankLines?: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
};

const headersSchema = z.record(z.string());

/**
 * Only the flags the user actually passed, so config file and env still apply.
 */
function cliFlags(opts: GlobalOptions & { hashDir?: boolean }): Partial<DatadexConfig> {
    const flags: Partial<DatadexConfig> = {};
    if (opts.db !== undefined) flags.db = opts.db;
    if (opts.paramsFile !== undefined) flags.paramsFilename = opts.paramsFile;
    if (opts.blankLines !== undefined) flags.blankLineSeparates = opts.blankLines;
    if (opts.logLevel !== undefined) flags.logLevel = opts.logLevel;
    if (opts.jsonLogs !== undefined) flags.jsonLogs = opts.jsonLogs;
    if (opts.hashDir !== undefined) flags.hashDir = opts.hashDir;
    return flags;
}

/**
 * Resolve config, open the library, run `fn`, and always close the store.
 * Errors are reported on stderr and turn into exit status 1.
 */
async function withLibrary(
    opts: GlobalOptions & { hashDir?: boolean },
    fn: (dex: DataDex) => void
): Promise<void> {
    let dex: DataDex | undefined;
    try {
        const config = await resolveConfig(cliFlags(opts));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        getLogger().debug({ config }, 'Resolved configuration');

        dex = DataDex.open(config.db, {
            hashDir: config.hashDir,
            paramsFilename: config.paramsFilename,
            blankLineSeparates: config.blankLineSeparates,
        });
        fn(dex);
    } catch (error) {
        if (isDatadexError(error)) {
            console.error(`${error.name}: ${error.message}`);
        } else {
            console.error('Unexpected error:', error);
        }
        process.exitCode = 1;
    } finally {
        dex?.close();
    }
}

function readHeaders(path: string): Record<string, string> {
    let decoded: unknown;
    try {
        decoded = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError(`Cannot read headers file '${path}': ${String(error)}`, { path }, 'INVALID_CONFIG');
    }
    const result = headersSchema.safeParse(decoded);
    if (!result.success) {
        throw new ConfigurationError(`Headers file '${path}' must map column names to descriptions`, { path }, 'INVALID_CONFIG');
    }
    return result.data;
}

const program = new Command();

program
    .name('datadex')
    .description('Index dataset directories by their declared parameters and query them.')
    .version(VERSION)
    .option('--db <path>', 'Library database path (default: ./datadex.db)')
    .option('--params-file <name>', 'Parameter file name (default: params.txt)')
    .option('--blank-lines', 'Treat blank lines in parameter files as block separators')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs');

// ─── CREATE command ───────────────────────────────────────

program
    .command('create')
    .description('Create the library with the given parameter columns')
    .argument('[columns...]', 'Column names')
    .option('--headers <file>', 'JSON file mapping column names to descriptions')
    .action(async (columns: string[], opts: { headers?: string }, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions>(), (dex) => {
            dex.createLibrary(opts.headers ? readHeaders(opts.headers) : columns);
            console.log(`Library created with columns: ${dex.columns?.map((c) => c.name).join(', ') ?? ''}`);
        });
    });

// ─── RESET / DROP commands ────────────────────────────────

program
    .command('reset')
    .description('Remove every row, keeping the columns')
    .action(async (_opts: unknown, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions>(), (dex) => {
            dex.resetLibrary();
            console.log('Library reset.');
        });
    });

program
    .command('drop')
    .description('Remove the library columns and every row')
    .action(async (_opts: unknown, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions>(), (dex) => {
            dex.dropLibrary();
            console.log('Library dropped.');
        });
    });

// ─── INDEX / REINDEX commands ─────────────────────────────

program
    .command('index')
    .description('Index every dataset directory under <root>')
    .argument('<root>', 'Root directory')
    .option('--hash-dir', 'Rename each dataset directory to its content hash')
    .action(async (root: string, _opts: unknown, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions & { hashDir?: boolean }>(), (dex) => {
            const report = dex.indexWithReport(root);
            for (const line of formatIndexReport(root, report)) console.log(line);
            if (!report.ok) process.exitCode = 1;
        });
    });

program
    .command('reindex')
    .description('Reset the library, then index <root>')
    .argument('<root>', 'Root directory')
    .option('--hash-dir', 'Rename each dataset directory to its content hash')
    .action(async (root: string, _opts: unknown, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions & { hashDir?: boolean }>(), (dex) => {
            dex.resetLibrary();
            const report = dex.indexWithReport(root);
            for (const line of formatIndexReport(root, report)) console.log(line);
            if (!report.ok) process.exitCode = 1;
        });
    });

program
    .command('prune')
    .description('Remove rows whose dataset directory no longer exists')
    .action(async (_opts: unknown, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions>(), (dex) => {
            console.log(`Pruned ${dex.prune()} rows.`);
        });
    });

// ─── LOOKUP / SEARCH commands ─────────────────────────────

program
    .command('lookup')
    .description('Print every row')
    .option('--json', 'Output JSON')
    .action(async (opts: { json?: boolean }, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions>(), (dex) => {
            const columns = dex.columns ?? [];
            const rows = dex.lookup();
            if (opts.json) {
                console.log(JSON.stringify(rowsToObjects(columns, rows), null, 2));
            } else {
                for (const line of formatRowsTable(columns, rows)) console.log(line);
            }
        });
    });

program
    .command('search')
    .description('Print the datasets matching every clause, e.g. "phi between 1 and 2" "theta = 3"')
    .argument('[clauses...]', 'Query clauses (conjoined)')
    .option('--rows', 'Print full rows instead of paths')
    .option('--json', 'Output JSON')
    .action(async (clauses: string[], opts: { rows?: boolean; json?: boolean }, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions>(), (dex) => {
            const columns = dex.columns ?? [];
            const rows = dex.searchRows(...clauses);
            if (opts.rows) {
                if (opts.json) {
                    console.log(JSON.stringify(rowsToObjects(columns, rows), null, 2));
                } else {
                    for (const line of formatRowsTable(columns, rows)) console.log(line);
                }
                return;
            }
            const paths = rows.map((row) => row.datasetPath);
            if (opts.json) {
                console.log(JSON.stringify(paths, null, 2));
            } else {
                for (const path of paths) console.log(path);
            }
        });
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show library columns and row counts')
    .action(async (_opts: unknown, command: Command) => {
        await withLibrary(command.optsWithGlobals<GlobalOptions>(), (dex) => {
            const columns = dex.columns;
            if (!columns) {
                console.log('No library has been created.');
                return;
            }
            const rows = dex.lookup();
            const datasets = new Set(rows.map((row) => row.datasetPath)).size;

            console.log('\nLibrary\n');
            console.log(`  Rows:     ${rows.length}`);
            console.log(`  Datasets: ${datasets}`);
            console.log(`  Hashing:  ${dex.hashDir ? 'on' : 'off'}`);
            console.log('\n  Columns:');
            for (const column of columns) {
                console.log(column.description ? `    ${column.name}: ${column.description}` : `    ${column.name}`);
            }
            console.log('');
        });
    });

await program.parseAsync();
