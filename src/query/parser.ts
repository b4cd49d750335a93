import { QueryError } from '../errors.js';
import { isKeyword, tokenize, type Token } from './tokenizer.js';
import type { ComparisonOp, Literal, Predicate } from './ast.js';

const OPERATOR_KINDS: Record<string, ComparisonOp> = {
    '=': 'eq',
    '==': 'eq',
    '!=': 'ne',
    '<>': 'ne',
    '<': 'lt',
    '<=': 'le',
    '>': 'gt',
    '>=': 'ge',
};

/**
 * Recursive-descent parser for one clause:
 *
 *   clause    := predicate ( AND predicate )*
 *   predicate := column op literal
 *              | column IS [NOT] NULL
 *              | column BETWEEN literal AND literal
 *
 * Keywords are case-insensitive.
 */
class ClauseParser {
    private readonly tokens: Token[];
    private index = 0;

    constructor(private readonly clause: string) {
        this.tokens = tokenize(clause);
    }

    parse(): Predicate {
        if (this.peek().kind === 'eof') {
            throw this.error('empty clause');
        }

        const clauses: Predicate[] = [this.parsePredicate()];
        while (this.acceptKeyword('and')) {
            clauses.push(this.parsePredicate());
        }

        const trailing = this.peek();
        if (trailing.kind !== 'eof') {
            throw this.error(`unexpected '${trailing.text}'`, trailing);
        }

        const [first] = clauses;
        return clauses.length === 1 && first ? first : { kind: 'and', clauses };
    }

    private parsePredicate(): Predicate {
        const columnToken = this.next();
        if (columnToken.kind !== 'word' || isKeyword(columnToken.text)) {
            throw this.error(`expected a column name, found ${describe(columnToken)}`, columnToken);
        }
        const column = columnToken.text;

        if (this.acceptKeyword('is')) {
            const negated = this.acceptKeyword('not');
            this.expectKeyword('null');
            return { kind: negated ? 'isNotNull' : 'isNull', column };
        }

        if (this.acceptKeyword('between')) {
            const low = this.parseLiteral();
            this.expectKeyword('and');
            const high = this.parseLiteral();
            return { kind: 'between', column, low, high };
        }

        const opToken = this.next();
        const kind = opToken.kind === 'op' ? OPERATOR_KINDS[opToken.text] : undefined;
        if (!kind) {
            throw this.error(`expected an operator after '${column}', found ${describe(opToken)}`, opToken);
        }
        return { kind, column, literal: this.parseLiteral() };
    }

    private parseLiteral(): Literal {
        const token = this.next();
        switch (token.kind) {
            case 'number':
                return { kind: 'number', value: Number.parseFloat(token.text), text: token.text };
            case 'string':
                return { kind: 'text', value: token.text };
            case 'word':
                if (!isKeyword(token.text)) {
                    return { kind: 'text', value: token.text };
                }
                break;
            default:
                break;
        }
        throw this.error(`expected a value, found ${describe(token)}`, token);
    }

    private peek(): Token {
        return this.tokens[this.index] ?? this.eof();
    }

    private next(): Token {
        const token = this.peek();
        if (token.kind !== 'eof') this.index++;
        return token;
    }

    private eof(): Token {
        return { kind: 'eof', text: '', pos: this.clause.length };
    }

    private acceptKeyword(keyword: string): boolean {
        const token = this.peek();
        if (token.kind === 'word' && token.text.toLowerCase() === keyword) {
            this.index++;
            return true;
        }
        return false;
    }

    private expectKeyword(keyword: string): void {
        if (!this.acceptKeyword(keyword)) {
            const token = this.peek();
            throw this.error(`expected '${keyword.toUpperCase()}', found ${describe(token)}`, token);
        }
    }

    private error(reason: string, token?: Token): QueryError {
        return new QueryError(this.clause, reason, token?.pos);
    }
}

function describe(token: Token): string {
    switch (token.kind) {
        case 'eof':
            return 'end of clause';
        case 'string':
            return `string '${token.text}'`;
        default:
            return `'${token.text}'`;
    }
}

/**
 * Parse one textual clause into a predicate tree.
 */
export function parseClause(clause: string): Predicate {
    return new ClauseParser(clause).parse();
}
