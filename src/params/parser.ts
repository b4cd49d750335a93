import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import type { ParameterSet, ParamValue } from '../types/index.js';
import { ParseError, describeError } from '../errors.js';
import { parseLiteral } from './literal.js';

export interface ParseOptions {
    /** Also close the current block on a blank line. */
    blankLineSeparates?: boolean;
}

/**
 * Split one line into key and raw value, or null if it is not a `key: value` line.
 */
function splitLine(line: string): [string, string] | null {
    const colon = line.indexOf(':');
    if (colon <= 0) return null;

    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    if (!key || !value) return null;

    return [key, value];
}

/**
 * Parse the text of a parameter file into blocks.
 *
 * A key that repeats within the current block starts a new block.
 * Blank, comment (`#`) and malformed lines are skipped.
 */
export function* parseParams(text: string, options: ParseOptions = {}): Generator<ParameterSet> {
    let block: ParameterSet = new Map();

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();

        if (!line) {
            if (options.blankLineSeparates && block.size > 0) {
                yield block;
                block = new Map();
            }
            continue;
        }
        if (line.startsWith('#')) continue;

        const pair = splitLine(line);
        if (!pair) continue;

        const [key, raw] = pair;
        if (block.has(key)) {
            yield block;
            block = new Map();
        }
        block.set(key, parseLiteral(raw));
    }

    if (block.size > 0) {
        yield block;
    }
}

/**
 * Convert one decoded JSON object into a block. Nested values are dropped.
 */
function objectToBlock(obj: Record<string, unknown>): ParameterSet {
    const block: ParameterSet = new Map();
    for (const [key, value] of Object.entries(obj)) {
        let decoded: ParamValue | undefined;
        if (typeof value === 'number' && Number.isFinite(value)) decoded = value;
        else if (typeof value === 'string') decoded = value;
        else if (typeof value === 'boolean') decoded = String(value);
        if (decoded !== undefined) block.set(key, decoded);
    }
    return block;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON parameter file: one object, or an array of objects (one block each).
 */
export function parseJsonParams(text: string, path: string): ParameterSet[] {
    let decoded: unknown;
    try {
        decoded = JSON.parse(text);
    } catch (error) {
        throw new ParseError(path, `invalid JSON (${describeError(error).message})`);
    }

    const objects = Array.isArray(decoded) ? decoded : [decoded];
    const blocks: ParameterSet[] = [];
    for (const obj of objects) {
        if (!isPlainObject(obj)) {
            throw new ParseError(path, 'expected a JSON object or an array of objects');
        }
        const block = objectToBlock(obj);
        if (block.size > 0) blocks.push(block);
    }
    return blocks;
}

/**
 * Read and parse a parameter file. Files ending in `.json` are decoded as JSON,
 * everything else as `key: value` lines.
 */
export function readParamsFile(path: string, options: ParseOptions = {}): ParameterSet[] {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ParseError(path, describeError(error).message);
    }

    if (basename(path).toLowerCase().endsWith('.json')) {
        return parseJsonParams(text, path);
    }
    return [...parseParams(text, options)];
}
