/**
 * Predicate tree produced by the query parser.
 */

export type Literal =
    | { kind: 'number'; value: number; text: string }
    | { kind: 'text'; value: string };

export type ComparisonOp = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';

export interface Comparison {
    kind: ComparisonOp;
    column: string;
    literal: Literal;
}

export interface Between {
    kind: 'between';
    column: string;
    low: Literal;
    high: Literal;
}

export interface NullCheck {
    kind: 'isNull' | 'isNotNull';
    column: string;
}

export interface Conjunction {
    kind: 'and';
    clauses: Predicate[];
}

export type Predicate = Comparison | Between | NullCheck | Conjunction;

