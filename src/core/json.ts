/**
 * JSON values as produced by `JSON.parse`, with accessors that return
 * `undefined` for missing or differently-typed fields instead of failing.
 */

import { PingError } from './errors.js';

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses `text` and requires the top level to be an object.
 */
export function parseJsonObject(text: string): JsonObject {
    let parsed: JsonValue;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new PingError('Status document is not valid JSON', 'INVALID_JSON', undefined,
            error instanceof Error ? error : undefined);
    }
    if (!isJsonObject(parsed)) {
        throw new PingError(
            `Status document must be a JSON object, got ${Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed}`,
            'INVALID_JSON'
        );
    }
    return parsed;
}

export function getObject(object: JsonObject, key: string): JsonObject | undefined {
    const value = object[key];
    return isJsonObject(value) ? value : undefined;
}

export function getArray(object: JsonObject, key: string): JsonValue[] | undefined {
    const value = object[key];
    return Array.isArray(value) ? value : undefined;
}

export function getString(object: JsonObject, key: string): string | undefined {
    const value = object[key];
    return typeof value === 'string' ? value : undefined;
}

export function getNumber(object: JsonObject, key: string): number | undefined {
    const value = object[key];
    return typeof value === 'number' ? value : undefined;
}

export function getBoolean(object: JsonObject, key: string): boolean | undefined {
    const value = object[key];
    return typeof value === 'boolean' ? value : undefined;
}
