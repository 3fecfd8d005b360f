import { LosslessNumber, isInteger, isLosslessNumber, parse, stringify } from 'lossless-json';

/**
 * Generic JSON tree handled by the codecs.
 *
 * Numbers parsed from text are kept as `LosslessNumber` so that the lexical
 * difference between `5` and `5.0` survives a decode/encode cycle. Trees built
 * by hand (or by `JSON.parse`) may carry plain numbers instead.
 */
export type JsonNumber = LosslessNumber | number;

export type JsonValue = null | boolean | string | JsonNumber | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

/** A segment of a field path: object key or array index. */
export type PathSegment = string | number;

function hasProtoKey(text: string): boolean {
    if (!text.includes('__proto__') && !text.includes('\\u')) return false;
    let found = false;
    JSON.parse(text, (key: string, value: unknown) => {
        if (key === '__proto__') found = true;
        return value;
    });
    return found;
}

/**
 * Parses JSON text, keeping every number as a `LosslessNumber`.
 * Throws a `SyntaxError` for malformed text, and for an object key
 * `__proto__`, which a parsed object cannot hold.
 */
export function parseJson(text: string): unknown {
    const tree = parse(text);
    if (hasProtoKey(text)) {
        throw new SyntaxError("Object key '__proto__' is not supported");
    }
    return tree;
}

/**
 * Serializes a tree to text. `LosslessNumber`s are written verbatim.
 */
export function stringifyJson(tree: JsonValue, indent?: number | string): string {
    return stringify(tree, undefined, indent) ?? 'null';
}

export function isJsonNumber(value: unknown): value is JsonNumber {
    return typeof value === 'number' || isLosslessNumber(value);
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * The source text of a number: verbatim for lossless numbers, `String()` otherwise.
 */
export function numberLiteral(value: JsonNumber): string {
    return typeof value === 'number' ? String(value) : value.value;
}

/**
 * True when the number was written without a fraction or exponent.
 * Plain numbers count as integers when they have no fractional part.
 */
export function isIntegerLiteral(value: JsonNumber): boolean {
    return typeof value === 'number' ? Number.isInteger(value) : isInteger(value.value);
}

/** Name of the JSON type of a value, as used in error messages. */
export function jsonTypeOf(value: unknown): string {
    if (value === undefined) return 'nothing';
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (isJsonNumber(value)) return 'number';
    if (typeof value === 'object') return 'object';
    return typeof value;
}

/**
 * Walks `path` from `root`. Returns undefined as soon as a segment is missing.
 */
export function valueAtPath(root: unknown, path: readonly PathSegment[]): unknown {
    let current = root;
    for (const segment of path) {
        if (typeof segment === 'number') {
            if (!Array.isArray(current)) return undefined;
            current = current[segment];
        } else {
            if (!isJsonObject(current)) return undefined;
            current = current[segment];
        }
    }
    return current;
}

/**
 * Formats a path as `layers[2].entities[0].x`. The empty path is `<root>`.
 */
export function formatPath(path: readonly PathSegment[]): string {
    let out = '';
    for (const segment of path) {
        if (typeof segment === 'number') {
            out += `[${String(segment)}]`;
        } else {
            out += out === '' ? segment : `.${segment}`;
        }
    }
    return out === '' ? '<root>' : out;
}

/** Builds a lossless integer literal. */
export function integerNumber(value: number): LosslessNumber {
    return new LosslessNumber(value.toFixed(0));
}

/**
 * Builds a lossless float literal that always carries a fraction or exponent,
 * so `5` is written as `5.0`.
 */
export function floatNumber(value: number): LosslessNumber {
    if (Object.is(value, -0)) return new LosslessNumber('-0.0');
    const text = String(value);
    return new LosslessNumber(/[.eE]/.test(text) ? text : `${text}.0`);
}
