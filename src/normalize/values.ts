import { TransformError } from '../utils/errors.js';

/**
 * Field readers for untrusted raw records. Each returns undefined for an
 * absent or blank value and throws TransformError for a value of the
 * wrong type.
 */

export function optionalText(value: unknown, paperId: string | null, field: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new TransformError(`${field} must be a string`, paperId, field);
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Like optionalText, with internal whitespace runs collapsed (titles come
 * with hard line breaks).
 */
export function optionalLine(value: unknown, paperId: string | null, field: string): string | undefined {
    return optionalText(value, paperId, field)?.replace(/\s+/g, ' ');
}

export function optionalBoolean(value: unknown, paperId: string | null, field: string): boolean | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
        throw new TransformError(`${field} must be a boolean`, paperId, field);
    }
    return value;
}

export function optionalObject(value: unknown, paperId: string | null, field: string): object | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'object' || Array.isArray(value)) {
        throw new TransformError(`${field} must be an object`, paperId, field);
    }
    return value;
}

export function optionalArray(value: unknown, paperId: string | null, field: string): unknown[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        throw new TransformError(`${field} must be an array`, paperId, field);
    }
    return value;
}

/**
 * Split a delimited string into trimmed, de-duplicated, non-empty parts.
 */
export function splitList(value: string | undefined, separator: RegExp): string[] | undefined {
    if (value === undefined) return undefined;
    const parts = [...new Set(value.split(separator).map((part) => part.trim()).filter(Boolean))];
    return parts.length > 0 ? parts : undefined;
}

/**
 * Parse a timestamp into canonical ISO 8601 (UTC).
 */
export function toIsoTimestamp(value: string, paperId: string | null, field: string): string {
    const millis = Date.parse(value);
    if (Number.isNaN(millis)) {
        throw new TransformError(`${field} is not a valid date: "${value}"`, paperId, field);
    }
    return new Date(millis).toISOString();
}

/**
 * Read a property of an already type-checked object.
 */
export function prop(source: object | undefined, key: string): unknown {
    return source === undefined ? undefined : Reflect.get(source, key);
}
