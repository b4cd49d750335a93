import type { ParamValue } from '../types/index.js';

/**
 * A typed literal matcher: returns the decoded value, or undefined
 * when the text is not a literal of its kind.
 */
type LiteralMatcher = (text: string) => ParamValue | undefined;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;

const matchInteger: LiteralMatcher = (text) => {
    if (!INTEGER_PATTERN.test(text)) return undefined;
    const value = Number.parseInt(text, 10);
    return Number.isSafeInteger(value) ? value : undefined;
};

const matchFloat: LiteralMatcher = (text) => {
    if (!FLOAT_PATTERN.test(text)) return undefined;
    const value = Number.parseFloat(text);
    return Number.isFinite(value) ? value : undefined;
};

const matchText: LiteralMatcher = (text) => unquote(text);

/**
 * Tried in order; the first matcher that accepts the text wins.
 */
const MATCHERS: readonly LiteralMatcher[] = [matchInteger, matchFloat, matchText];

/**
 * Strip one pair of matching surrounding quotes.
 */
export function unquote(text: string): string {
    if (text.length >= 2) {
        const first = text[0];
        const last = text[text.length - 1];
        if ((first === '"' || first === "'") && first === last) {
            return text.slice(1, -1);
        }
    }
    return text;
}

/**
 * Decode a raw parameter value: integer, then float, then trimmed text.
 *
 * Integers too large to be represented exactly fall through to float.
 */
export function parseLiteral(raw: string): ParamValue {
    const text = raw.trim();
    for (const match of MATCHERS) {
        const value = match(text);
        if (value !== undefined) return value;
    }
    return text;
}

