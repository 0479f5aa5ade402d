/**
 * Snapshot codec for checkpoints.
 *
 * Values JSON has no form for (Date, Map, Set, BigInt, non-finite numbers,
 * undefined inside arrays) are written as `{ $type, value }` records so that a
 * field's own schema accepts them again after `decodeValue`.
 */

import { GraphError } from '../lib/errors';

/** JSON-safe encoded value */
export type EncodedValue = null | boolean | number | string | EncodedValue[] | { [key: string]: EncodedValue };

const TYPE_KEY = '$type';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tagged(type: string, value: EncodedValue): EncodedValue {
    return { [TYPE_KEY]: type, value };
}

function encodeEntries(value: object): { [key: string]: EncodedValue } {
    const result: { [key: string]: EncodedValue } = {};
    for (const [key, entry] of Object.entries(value)) {
        // Absent and undefined properties are the same to an object schema
        if (entry !== undefined) {
            result[key] = encodeValue(entry);
        }
    }
    return result;
}

/**
 * Encode a snapshot value into JSON-safe data.
 */
export function encodeValue(value: unknown): EncodedValue {
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return value;
        case 'number':
            return Number.isFinite(value) ? value : tagged('Number', String(value));
        case 'bigint':
            return tagged('BigInt', value.toString());
        case 'undefined':
            return tagged('Undefined', null);
        case 'function':
        case 'symbol':
            throw new GraphError(`Cannot serialize a ${typeof value} in graph state`);
    }

    if (typeof value !== 'object' || value === null) return null;
    if (Array.isArray(value)) return value.map(encodeValue);
    if (value instanceof Date) return tagged('Date', String(value.getTime()));
    if (value instanceof Map) {
        return tagged('Map', [...value.entries()].map(([key, entry]) => [encodeValue(key), encodeValue(entry)]));
    }
    if (value instanceof Set) return tagged('Set', [...value].map(encodeValue));

    const entries = encodeEntries(value);
    return Object.prototype.hasOwnProperty.call(entries, TYPE_KEY) ? tagged('Object', entries) : entries;
}

function decodeEntries(value: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
        result[key] = decodeValue(entry);
    }
    return result;
}

function decodeTagged(type: string, value: unknown): unknown {
    switch (type) {
        case 'Number':
            return Number(value);
        case 'BigInt':
            return typeof value === 'string' ? BigInt(value) : undefined;
        case 'Undefined':
            return undefined;
        case 'Date':
            return new Date(Number(value));
        case 'Map': {
            const pairs: unknown[] = Array.isArray(value) ? value : [];
            return new Map(pairs.map((pair): [unknown, unknown] => {
                const [key, entry]: unknown[] = Array.isArray(pair) ? pair : [];
                return [decodeValue(key), decodeValue(entry)];
            }));
        }
        case 'Set': {
            const items: unknown[] = Array.isArray(value) ? value : [];
            return new Set(items.map(decodeValue));
        }
        case 'Object':
            return isRecord(value) ? decodeEntries(value) : {};
        default:
            throw new GraphError(`Unknown encoded type in graph state: ${type}`);
    }
}

/**
 * Reverse of `encodeValue`.
 */
export function decodeValue(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(decodeValue);
    if (!isRecord(value)) return value;

    const type = value[TYPE_KEY];
    if (typeof type === 'string' && Object.keys(value).length === 2 && 'value' in value) {
        return decodeTagged(type, value.value);
    }
    return decodeEntries(value);
}
