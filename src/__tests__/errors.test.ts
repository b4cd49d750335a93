import { describe, it, expect } from 'vitest';
import {
    ConfigurationError,
    DatadexError,
    DatadexIOError,
    ParseError,
    QueryError,
    SchemaError,
    describeError,
    isDatadexError,
} from '../errors.js';

describe('Errors', () => {
    it('should carry code, name and details', () => {
        const error = new QueryError('theta ~ 3', "unexpected character '~'", 6);
        expect(error.code).toBe('QUERY_ERROR');
        expect(error.name).toBe('QueryError');
        expect(error.message).toBe("Invalid query 'theta ~ 3': unexpected character '~'");
        expect(error.details).toEqual({ clause: 'theta ~ 3', reason: "unexpected character '~'", position: 6 });
    });

    it('should keep the prototype chain for instanceof checks', () => {
        const errors = [
            new ConfigurationError('no library'),
            new SchemaError('bad'),
            new DatadexIOError('/data', 'rename', 'target exists'),
            new ParseError('/data/params.txt', 'EACCES'),
            new QueryError('x', 'bad'),
        ];
        for (const error of errors) {
            expect(error).toBeInstanceOf(Error);
            expect(error).toBeInstanceOf(DatadexError);
            expect(isDatadexError(error)).toBe(true);
        }
        expect(new SchemaError('bad')).toBeInstanceOf(SchemaError);
    });

    it('should format IO errors with path and operation', () => {
        const error = new DatadexIOError('/data/run1', 'rename', 'target exists', 'EEXIST');
        expect(error.message).toBe("IO error during rename on '/data/run1': target exists");
        expect(error.details).toEqual({ path: '/data/run1', operation: 'rename', reason: 'target exists', errno: 'EEXIST' });
    });

    it('should distinguish configuration error codes', () => {
        expect(new ConfigurationError('x').code).toBe('NO_LIBRARY');
        expect(new ConfigurationError('x', {}, 'INVALID_CONFIG').code).toBe('INVALID_CONFIG');
    });

    it('should not treat plain errors as datadex errors', () => {
        expect(isDatadexError(new Error('x'))).toBe(false);
        expect(isDatadexError('x')).toBe(false);
    });

    it('should describe unknown thrown values', () => {
        const withCode = Object.assign(new Error('denied'), { code: 'EACCES' });
        expect(describeError(withCode)).toEqual({ message: 'denied', errno: 'EACCES' });
        expect(describeError(new Error('plain'))).toEqual({ message: 'plain' });
        expect(describeError(42)).toEqual({ message: '42' });
    });
});
