import { describe, it, expect } from 'vitest';
import { tokenize } from '../query/tokenizer.js';
import { parseClause } from '../query/parser.js';
import { QueryError } from '../errors.js';

describe('Query tokenizer', () => {
    it('should split words, operators and numbers', () => {
        expect(tokenize('phi<=1.5').map((t) => [t.kind, t.text])).toEqual([
            ['word', 'phi'],
            ['op', '<='],
            ['number', '1.5'],
            ['eof', ''],
        ]);
    });

    it('should read signed numbers after an operator', () => {
        expect(tokenize('x > -2e3').map((t) => t.text)).toEqual(['x', '>', '-2e3', '']);
    });

    it('should unescape doubled quotes inside strings', () => {
        const [, , str] = tokenize("name = 'O''Brien'");
        expect(str).toEqual({ kind: 'string', text: "O'Brien", pos: 7 });
    });

    it('should reject unterminated strings', () => {
        expect(() => tokenize('name = "open')).toThrow(/unterminated string/);
    });

    it('should reject unexpected characters', () => {
        expect(() => tokenize('theta ~ 3')).toThrow(QueryError);
    });
});

describe('Query parser', () => {
    it('should parse comparisons', () => {
        expect(parseClause('theta = 3')).toEqual({ kind: 'eq', column: 'theta', literal: { kind: 'number', value: 3, text: '3' } });
        expect(parseClause('theta == 3').kind).toBe('eq');
        expect(parseClause('theta != 3').kind).toBe('ne');
        expect(parseClause('theta <> 3').kind).toBe('ne');
        expect(parseClause('theta < 3').kind).toBe('lt');
        expect(parseClause('theta <= 3').kind).toBe('le');
        expect(parseClause('theta > 3').kind).toBe('gt');
        expect(parseClause('theta >= 3').kind).toBe('ge');
    });

    it('should parse text literals, quoted or bare', () => {
        expect(parseClause("model = 'ising 2d'")).toEqual({ kind: 'eq', column: 'model', literal: { kind: 'text', value: 'ising 2d' } });
        expect(parseClause('model = ising')).toEqual({ kind: 'eq', column: 'model', literal: { kind: 'text', value: 'ising' } });
    });

    it('should parse null checks case-insensitively', () => {
        expect(parseClause('phi is null')).toEqual({ kind: 'isNull', column: 'phi' });
        expect(parseClause('phi IS NOT NULL')).toEqual({ kind: 'isNotNull', column: 'phi' });
    });

    it('should parse between', () => {
        expect(parseClause('phi between 1 and 2')).toEqual({
            kind: 'between',
            column: 'phi',
            low: { kind: 'number', value: 1, text: '1' },
            high: { kind: 'number', value: 2, text: '2' },
        });
    });

    it('should parse conjunctions inside a clause', () => {
        const predicate = parseClause('phi between 1 and 2 and theta = 3 AND phi is not null');
        expect(predicate).toMatchObject({
            kind: 'and',
            clauses: [
                { kind: 'between', column: 'phi' },
                { kind: 'eq', column: 'theta' },
                { kind: 'isNotNull', column: 'phi' },
            ],
        });
    });

    it.each([
        ['', 'empty clause'],
        ['theta', 'expected an operator'],
        ['theta =', 'expected a value'],
        ['= 3', 'expected a column name'],
        ['phi is', "expected 'NULL'"],
        ['phi is not 3', "expected 'NULL'"],
        ['phi between 1 2', "expected 'AND'"],
        ['theta = 3 theta', "unexpected 'theta'"],
        ['theta = 3 and', 'expected a column name'],
        ['null = 3', 'expected a column name'],
        ['theta = null', 'expected a value'],
    ])('should reject %j', (clause, reason) => {
        expect(() => parseClause(clause)).toThrow(reason);
    });

    it('should name the offending clause in the error', () => {
        try {
            parseClause('phi between 1');
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(QueryError);
            expect(error).toMatchObject({ clause: 'phi between 1', code: 'QUERY_ERROR' });
        }
    });
});
