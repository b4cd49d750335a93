import { QueryError } from '../errors.js';

export type TokenKind = 'word' | 'number' | 'string' | 'op' | 'eof';

export interface Token {
    kind: TokenKind;
    /** Source text; for strings, the unescaped contents. */
    text: string;
    /** Offset of the token in the clause. */
    pos: number;
}

/** Reserved words of the query language; never valid column names. */
export const KEYWORDS: ReadonlySet<string> = new Set(['and', 'is', 'not', 'null', 'between']);

export function isKeyword(word: string): boolean {
    return KEYWORDS.has(word.toLowerCase());
}

const OPERATORS = ['<=', '>=', '!=', '<>', '==', '=', '<', '>'] as const;
const WORD_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER_PATTERN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;

/**
 * Split a clause into tokens. Strings are quoted with ' or "; a doubled
 * quote inside a string stands for the quote character itself.
 */
export function tokenize(clause: string): Token[] {
    const tokens: Token[] = [];
    let pos = 0;

    while (pos < clause.length) {
        const ch = clause.charAt(pos);

        if (/\s/.test(ch)) {
            pos++;
            continue;
        }

        if (ch === '"' || ch === "'") {
            const start = pos;
            let text = '';
            pos++;
            for (;;) {
                if (pos >= clause.length) {
                    throw new QueryError(clause, 'unterminated string', start);
                }
                const c = clause.charAt(pos);
                if (c === ch) {
                    if (clause.charAt(pos + 1) === ch) {
                        text += ch;
                        pos += 2;
                        continue;
                    }
                    pos++;
                    break;
                }
                text += c;
                pos++;
            }
            tokens.push({ kind: 'string', text, pos: start });
            continue;
        }

        const op = OPERATORS.find((o) => clause.startsWith(o, pos));
        if (op) {
            tokens.push({ kind: 'op', text: op, pos });
            pos += op.length;
            continue;
        }

        NUMBER_PATTERN.lastIndex = pos;
        const number = NUMBER_PATTERN.exec(clause);
        if (number) {
            tokens.push({ kind: 'number', text: number[0], pos });
            pos += number[0].length;
            continue;
        }

        WORD_PATTERN.lastIndex = pos;
        const word = WORD_PATTERN.exec(clause);
        if (word) {
            tokens.push({ kind: 'word', text: word[0], pos });
            pos += word[0].length;
            continue;
        }

        throw new QueryError(clause, `unexpected character '${ch}'`, pos);
    }

    tokens.push({ kind: 'eof', text: '', pos: clause.length });
    return tokens;
}
