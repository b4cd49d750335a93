import type { CellValue, ParamValue, Row } from '../types/index.js';
import type { LibrarySchema } from '../library/schema.js';
import { QueryError } from '../errors.js';
import type { Literal, Predicate } from './ast.js';
import { parseClause } from './parser.js';

export type RowMatcher = (row: Row) => boolean;

export type ColumnKind = 'numeric' | 'text';

/**
 * A column is textual as soon as any stored value in it is text;
 * otherwise (all numbers, or all null) it is numeric.
 */
export function inferColumnKinds(schema: LibrarySchema, rows: readonly Row[]): ColumnKind[] {
    const kinds: ColumnKind[] = schema.columns.map(() => 'numeric');
    for (const row of rows) {
        row.values.forEach((value, i) => {
            if (typeof value === 'string') kinds[i] = 'text';
        });
    }
    return kinds;
}

function literalText(literal: Literal): string {
    return literal.kind === 'number' ? literal.text : literal.value;
}

function equals(value: ParamValue, literal: Literal): boolean {
    if (typeof value === 'number' && literal.kind === 'number') {
        return value === literal.value;
    }
    return String(value) === literalText(literal);
}

/**
 * Compile a predicate tree into a row matcher, checking every column
 * reference and operand type up front.
 */
function compile(predicate: Predicate, clause: string, schema: LibrarySchema, kinds: ColumnKind[]): RowMatcher {
    if (predicate.kind === 'and') {
        const parts = predicate.clauses.map((p) => compile(p, clause, schema, kinds));
        return (row) => parts.every((match) => match(row));
    }

    const { column } = predicate;
    const position = schema.indexOf(column);
    if (position === undefined) {
        throw new QueryError(clause, `unknown column '${column}' (columns: ${schema.names.join(', ')})`);
    }
    const cell = (row: Row): CellValue => row.values[position] ?? null;

    const requireNumber = (literal: Literal): number => {
        if (kinds[position] === 'text') {
            throw new QueryError(clause, `column '${column}' is not numeric`);
        }
        if (literal.kind !== 'number') {
            throw new QueryError(clause, `'${literal.value}' is not a number`);
        }
        return literal.value;
    };

    const ordered = (test: (value: number) => boolean): RowMatcher => (row) => {
        const value = cell(row);
        return typeof value === 'number' && test(value);
    };

    switch (predicate.kind) {
        case 'isNull':
            return (row) => cell(row) === null;
        case 'isNotNull':
            return (row) => cell(row) !== null;
        case 'eq': {
            const { literal } = predicate;
            return (row) => {
                const value = cell(row);
                return value !== null && equals(value, literal);
            };
        }
        case 'ne': {
            const { literal } = predicate;
            return (row) => {
                const value = cell(row);
                return value !== null && !equals(value, literal);
            };
        }
        case 'lt': {
            const bound = requireNumber(predicate.literal);
            return ordered((v) => v < bound);
        }
        case 'le': {
            const bound = requireNumber(predicate.literal);
            return ordered((v) => v <= bound);
        }
        case 'gt': {
            const bound = requireNumber(predicate.literal);
            return ordered((v) => v > bound);
        }
        case 'ge': {
            const bound = requireNumber(predicate.literal);
            return ordered((v) => v >= bound);
        }
        case 'between': {
            const low = requireNumber(predicate.low);
            const high = requireNumber(predicate.high);
            return ordered((v) => low <= v && v <= high);
        }
    }
}

/**
 * Compile a set of clauses into one matcher. Clauses are conjoined;
 * no clauses matches every row. Every clause is parsed and checked before
 * the matcher is returned, so a bad clause never yields partial results.
 */
export function compileQuery(clauses: readonly string[], schema: LibrarySchema, rows: readonly Row[]): RowMatcher {
    const kinds = inferColumnKinds(schema, rows);
    const matchers = clauses.map((clause) => compile(parseClause(clause), clause, schema, kinds));
    return (row) => matchers.every((match) => match(row));
}

/**
 * Rows matching every clause, in their original order.
 */
export function filterRows(clauses: readonly string[], schema: LibrarySchema, rows: readonly Row[]): Row[] {
    const match = compileQuery(clauses, schema, rows);
    return rows.filter(match);
}
