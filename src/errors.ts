/**
 * Shared error factory.
 *
 * Two families live here: `SchemaError`s produced by the decoders, encoders and
 * unpack helpers, and the MCP error response shape returned by tool handlers.
 * Every factory is pure and builds its message from a fixed template, so callers
 * (and tests) can rely on the exact text.
 */

import { type PathSegment, formatPath } from './json/tree.js';

export type SchemaErrorKind =
    | 'MalformedInput'
    | 'MissingField'
    | 'TypeMismatch'
    | 'AmbiguousVariant'
    | 'UnknownVariant'
    | 'NumericRange'
    | 'UnpackMismatch';

export interface SchemaErrorDetails {
    /** Dotted field path, e.g. `layers[2].entities[0].x` */
    path?: string;
    expected?: string;
    actual?: string;
    /** Variants that matched when discrimination was ambiguous */
    candidates?: string[];
}

export class SchemaError extends Error {
    readonly kind: SchemaErrorKind;
    readonly path?: string;
    readonly expected?: string;
    readonly actual?: string;
    readonly candidates?: string[];

    constructor(kind: SchemaErrorKind, message: string, details: SchemaErrorDetails = {}) {
        super(message);
        this.name = 'SchemaError';
        this.kind = kind;
        this.path = details.path;
        this.expected = details.expected;
        this.actual = details.actual;
        this.candidates = details.candidates;
    }
}

/**
 * Outcome of a codec operation. Mirrors zod's `safeParse` result.
 */
export type SchemaResult<T> = { success: true; data: T } | { success: false; error: SchemaError };

export function ok<T>(data: T): SchemaResult<T> {
    return { success: true, data };
}

export function fail<T>(error: SchemaError): SchemaResult<T> {
    return { success: false, error };
}

function pathText(path: string | readonly PathSegment[]): string {
    return typeof path === 'string' ? path : formatPath(path);
}

// ----------------------------------------------------------------------------
// decode & encode
// ----------------------------------------------------------------------------

export function malformedInput(message: string): SchemaError {
    return new SchemaError('MalformedInput', `Malformed JSON input: ${message}`);
}

export function missingField(path: string | readonly PathSegment[]): SchemaError {
    const p = pathText(path);
    return new SchemaError('MissingField', `Missing required field '${p}'.`, { path: p });
}

export function typeMismatch(path: string | readonly PathSegment[], expected: string, actual: string): SchemaError {
    const p = pathText(path);
    return new SchemaError('TypeMismatch', `Field '${p}' has the wrong type: expected ${expected}, found ${actual}.`, {
        path: p,
        expected,
        actual,
    });
}

export function ambiguousVariant(path: string | readonly PathSegment[], candidates: string[]): SchemaError {
    const p = pathText(path);
    return new SchemaError('AmbiguousVariant', `Object at '${p}' matches more than one variant (${candidates.join(', ')}).`, {
        path: p,
        candidates,
    });
}

export function unknownVariant(path: string | readonly PathSegment[], detail: string): SchemaError {
    const p = pathText(path);
    return new SchemaError('UnknownVariant', `Object at '${p}' matches no known variant: ${detail}.`, { path: p });
}

export function numericRange(path: string | readonly PathSegment[]): SchemaError {
    const p = pathText(path);
    return new SchemaError('NumericRange', `Number at '${p}' is out of the representable range.`, { path: p });
}

export function reservedKey(path: string | readonly PathSegment[]): SchemaError {
    const p = pathText(path);
    return new SchemaError('TypeMismatch', `Key '${p}' is reserved and cannot name a value.`, {
        path: p,
        expected: 'a value name other than __proto__',
        actual: '__proto__',
    });
}

// ----------------------------------------------------------------------------
// unpack
// ----------------------------------------------------------------------------

export function unpackMismatch(expected: string, actual: string): SchemaError {
    return new SchemaError('UnpackMismatch', `Expected a '${expected}' variant but found '${actual}'.`, {
        expected,
        actual,
    });
}

// ----------------------------------------------------------------------------
// tool responses
// ----------------------------------------------------------------------------

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

export function projectFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Project file not found: ${path}`);
}

export function levelFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Level file not found: ${path}`);
}

export function layerNotFound(name: string): DomainErrorResponse {
    return domainError(`Layer '${name}' does not exist in this level.`);
}

export function notATileLayer(name: string, actual: string): DomainErrorResponse {
    return domainError(`Layer '${name}' is a ${actual} layer. Only tile, tileCoords and grid layers have cells.`);
}

export function schemaErrorResponse(error: SchemaError): DomainErrorResponse {
    return domainError(`${error.kind}: ${error.message}`);
}
