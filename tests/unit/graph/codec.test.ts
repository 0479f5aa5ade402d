import { describe, it, expect } from 'vitest';
import { decodeValue, encodeValue } from '../../../src/graph/codec';
import { GraphError } from '../../../src/lib/errors';

function throughJson(value: unknown): unknown {
    return decodeValue(JSON.parse(JSON.stringify(encodeValue(value))));
}

describe('codec', () => {
    it('should pass plain JSON values through unchanged', () => {
        const value = { a: 1, b: ['x', true, null], c: { d: 'e' } };

        expect(encodeValue(value)).toEqual(value);
        expect(throughJson(value)).toEqual(value);
    });

    it('should tag a Date with its epoch milliseconds', () => {
        expect(encodeValue(new Date(42))).toEqual({ $type: 'Date', value: '42' });
        expect(throughJson(new Date(42))).toEqual(new Date(42));
    });

    it('should restore maps, sets and bigints', () => {
        const value = {
            counts: new Map([['a', 1], ['b', 2]]),
            tags: new Set(['x', 'y']),
            big: 12345678901234567890n,
        };

        const restored = throughJson(value);

        expect(restored).toEqual(value);
    });

    it('should restore non-finite numbers and undefined array items', () => {
        expect(throughJson([Infinity, -Infinity, undefined])).toEqual([Infinity, -Infinity, undefined]);
        expect(Number.isNaN(throughJson(NaN))).toBe(true);
    });

    it('should drop undefined object properties', () => {
        expect(encodeValue({ a: 1, b: undefined })).toEqual({ a: 1 });
    });

    it('should keep a plain object that uses the tag key as data', () => {
        const value = { $type: 'Date', value: 'not a date' };

        expect(encodeValue(value)).toEqual({ $type: 'Object', value: { $type: 'Date', value: 'not a date' } });
        expect(throughJson(value)).toEqual(value);
    });

    it('should refuse functions', () => {
        expect(() => encodeValue({ run: () => 1 })).toThrow(GraphError);
        expect(() => encodeValue({ run: () => 1 })).toThrow('Cannot serialize a function in graph state');
    });

    it('should refuse an unknown tag', () => {
        expect(() => decodeValue({ $type: 'Regex', value: 'x' })).toThrow('Unknown encoded type in graph state: Regex');
    });
});
