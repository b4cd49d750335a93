import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseLiteral } from '../params/literal.js';
import { parseParams, parseJsonParams, readParamsFile } from '../params/parser.js';
import { ParseError } from '../errors.js';

function blocksOf(text: string, blankLineSeparates = false): Array<Record<string, number | string>> {
    return [...parseParams(text, { blankLineSeparates })].map((block) => Object.fromEntries(block));
}

describe('parseLiteral', () => {
    it('should decode integers', () => {
        expect(parseLiteral('5')).toBe(5);
        expect(parseLiteral('-12')).toBe(-12);
        expect(parseLiteral(' +7 ')).toBe(7);
    });

    it('should decode floats', () => {
        expect(parseLiteral('1.3')).toBe(1.3);
        expect(parseLiteral('.5')).toBe(0.5);
        expect(parseLiteral('2.')).toBe(2);
        expect(parseLiteral('1e-3')).toBe(0.001);
        expect(parseLiteral('-4.25E2')).toBe(-425);
    });

    it('should keep anything else as trimmed text', () => {
        expect(parseLiteral('  ising model ')).toBe('ising model');
        expect(parseLiteral('1.2.3')).toBe('1.2.3');
        expect(parseLiteral('nan')).toBe('nan');
        expect(parseLiteral('0x10')).toBe('0x10');
    });

    it('should strip one pair of matching quotes from text', () => {
        expect(parseLiteral('"square"')).toBe('square');
        expect(parseLiteral("'lattice'")).toBe('lattice');
        expect(parseLiteral('"mismatched\'')).toBe('"mismatched\'');
    });

    it('should fall back to float for integers beyond the safe range', () => {
        expect(parseLiteral('12345678901234567890')).toBe(12345678901234567000);
    });
});

describe('parseParams', () => {
    it('should parse a single block', () => {
        expect(blocksOf('theta: 5\nphi: 1.3\n')).toEqual([{ theta: 5, phi: 1.3 }]);
    });

    it('should start a new block when a key repeats', () => {
        expect(blocksOf('theta: 5\nphi: 1.3\ntheta: 3\n')).toEqual([{ theta: 5, phi: 1.3 }, { theta: 3 }]);
    });

    it('should split only on the first colon', () => {
        expect(blocksOf('path: /data/run:1')).toEqual([{ path: '/data/run:1' }]);
    });

    it('should skip blank, comment and malformed lines', () => {
        const text = ['# header', '', 'theta: 5', 'garbage line', ': 3', 'phi:', 'mode: fast', '   '].join('\n');
        expect(blocksOf(text)).toEqual([{ theta: 5, mode: 'fast' }]);
    });

    it('should ignore blank lines as separators by default', () => {
        expect(blocksOf('theta: 5\n\nphi: 1.3\n')).toEqual([{ theta: 5, phi: 1.3 }]);
    });

    it('should split on blank lines when enabled', () => {
        expect(blocksOf('theta: 5\n\n\nphi: 1.3\n', true)).toEqual([{ theta: 5 }, { phi: 1.3 }]);
    });

    it('should handle CRLF line endings', () => {
        expect(blocksOf('theta: 5\r\nphi: 2\r\n')).toEqual([{ theta: 5, phi: 2 }]);
    });

    it('should yield nothing for empty input', () => {
        expect(blocksOf('')).toEqual([]);
        expect(blocksOf('\n\n# only a comment\n')).toEqual([]);
    });

    it('should allow the consumer to stop early', () => {
        const seen: Array<number | string | undefined> = [];
        for (const block of parseParams('a: 1\na: 2\na: 3')) {
            seen.push(block.get('a'));
            if (seen.length === 2) break;
        }
        expect(seen).toEqual([1, 2]);
    });
});

describe('parseJsonParams', () => {
    it('should read a single object as one block', () => {
        const blocks = parseJsonParams('{"theta": 5, "phi": 1.3, "label": "x", "ok": true, "nested": {"a": 1}}', 'params.json');
        expect(blocks.map((b) => Object.fromEntries(b))).toEqual([{ theta: 5, phi: 1.3, label: 'x', ok: 'true' }]);
    });

    it('should read an array of objects as several blocks', () => {
        const blocks = parseJsonParams('[{"theta": 5}, {"theta": 3}]', 'params.json');
        expect(blocks.map((b) => Object.fromEntries(b))).toEqual([{ theta: 5 }, { theta: 3 }]);
    });

    it('should reject invalid JSON', () => {
        expect(() => parseJsonParams('{theta: 5', 'bad.json')).toThrow(ParseError);
    });

    it('should reject non-object documents', () => {
        expect(() => parseJsonParams('[1, 2]', 'bad.json')).toThrow(/expected a JSON object/);
    });
});

describe('readParamsFile', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'datadex-params-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should read a text parameter file', () => {
        const file = join(dir, 'params.txt');
        writeFileSync(file, 'theta: 5\nphi: 1.3\ntheta: 3\n');
        const blocks = readParamsFile(file);
        expect(blocks).toHaveLength(2);
        expect(blocks[1]?.get('theta')).toBe(3);
    });

    it('should read a JSON parameter file by extension', () => {
        const file = join(dir, 'params.json');
        writeFileSync(file, '{"theta": 5}');
        expect(readParamsFile(file).map((b) => Object.fromEntries(b))).toEqual([{ theta: 5 }]);
    });

    it('should raise ParseError naming the path when the file cannot be read', () => {
        const target = join(dir, 'params.txt');
        mkdirSync(target);
        let caught: unknown;
        try {
            readParamsFile(target);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ParseError);
        expect(caught).toMatchObject({ path: target, code: 'PARSE_ERROR' });
    });
});
