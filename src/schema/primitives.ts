import { z } from 'zod';
import {
    type JsonNumber,
    type PathSegment,
    floatNumber,
    isIntegerLiteral,
    isJsonNumber,
    isJsonObject,
    jsonTypeOf,
    numberLiteral,
    valueAtPath,
} from '../json/tree.js';
import * as errors from '../errors.js';
import type { Vec2 } from '../types/vec2.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Kinds carried in `params.kind` of the custom issues raised here, read back by
 * `toSchemaError`.
 */
type CustomIssueKind = 'AmbiguousVariant' | 'UnknownVariant' | 'NumericRange' | 'ReservedKey' | 'TypeMismatch';

export function raise(
    ctx: z.RefinementCtx,
    kind: CustomIssueKind,
    message: string,
    params: Record<string, unknown> = {},
    path: PathSegment[] = [],
): void {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message, path, params: { ...params, kind } });
}

export function raiseInvalidType(
    ctx: z.RefinementCtx,
    expected: z.ZodParsedType,
    raw: unknown,
    path: PathSegment[] = [],
): void {
    ctx.addIssue({
        code: z.ZodIssueCode.invalid_type,
        expected,
        received: z.getParsedType(raw),
        path,
    });
}

/**
 * Re-raises the issues of a nested parse on the current context, under `prefix`.
 */
export function forwardIssues(error: z.ZodError, ctx: z.RefinementCtx, prefix: PathSegment[] = []): void {
    for (const issue of error.issues) {
        ctx.addIssue({ ...issue, path: [...prefix, ...issue.path] });
    }
}

/**
 * Hands a value over to the schema picked by a discriminator. Issues of the
 * nested parse are reported at the current path.
 */
export function delegate<Output>(result: z.SafeParseReturnType<unknown, Output>, ctx: z.RefinementCtx): Output {
    if (result.success) return result.data;
    forwardIssues(result.error, ctx);
    return z.NEVER;
}

// ----------------------------------------------------------------------------
// numbers
// ----------------------------------------------------------------------------

/**
 * A signed 32-bit integer. Rejects literals with a fraction or exponent.
 */
export const int32 = z.unknown().transform((raw, ctx): number => {
    if (!isJsonNumber(raw) || !isIntegerLiteral(raw)) {
        raiseInvalidType(ctx, z.ZodParsedType.integer, raw);
        return z.NEVER;
    }
    const value = Number(numberLiteral(raw));
    if (value < INT32_MIN || value > INT32_MAX) {
        raise(ctx, 'NumericRange', 'Integer out of range');
        return z.NEVER;
    }
    return value;
});

/**
 * Any finite number.
 */
export const float = z.unknown().transform((raw, ctx): number => {
    if (!isJsonNumber(raw)) {
        raiseInvalidType(ctx, z.ZodParsedType.number, raw);
        return z.NEVER;
    }
    const value = Number(numberLiteral(raw));
    if (!Number.isFinite(value)) {
        raise(ctx, 'NumericRange', 'Number out of range');
        return z.NEVER;
    }
    return value;
});

/**
 * An integer restricted to a fixed set of codes, such as export and array modes.
 */
export function intChoice<T extends number>(choices: readonly T[]) {
    return int32.transform((value, ctx): T => {
        const match = choices.find((choice) => choice === value);
        if (match === undefined) {
            raise(ctx, 'TypeMismatch', 'Unsupported code', { expected: choices.map(String).join(' | ') });
            return z.NEVER;
        }
        return match;
    });
}

export function vec2(component: typeof int32 | typeof float): z.ZodType<Vec2, z.ZodTypeDef, unknown> {
    return withFloatForms(z.object({ x: component, y: component }));
}

// ----------------------------------------------------------------------------
// float literal forms
// ----------------------------------------------------------------------------

/**
 * Keys of decoded objects whose float field was written with a fraction or
 * exponent although its value is whole (`100.0`, `1e2`).
 */
const wholeFloatKeys = new WeakMap<object, ReadonlySet<string>>();

function isWholeFloatLiteral(value: unknown): boolean {
    return isJsonNumber(value) && !isIntegerLiteral(value) && Number.isInteger(Number(numberLiteral(value)));
}

/**
 * Remembers which keys of `raw` hold whole numbers written as floats, against
 * the decoded object `out`.
 */
export function rememberFloatForms<T extends object>(out: T, raw: unknown): T {
    if (!isJsonObject(raw)) return out;
    const source = raw;
    const keys = Object.keys(source).filter((key) => isWholeFloatLiteral(source[key]));
    if (keys.length > 0) {
        wholeFloatKeys.set(out, new Set(keys));
    }
    return out;
}

/**
 * Copies the remembered float forms of `from` onto `to`, for models rebuilt
 * with a spread.
 */
export function carryFloatForms<T extends object>(from: object, to: T): T {
    const keys = wholeFloatKeys.get(from);
    if (keys !== undefined) {
        wholeFloatKeys.set(to, keys);
    }
    return to;
}

/**
 * Runs `schema` and remembers the float forms of the object it decoded.
 */
export function withFloatForms<T extends object>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): z.ZodType<T, z.ZodTypeDef, unknown> {
    return z.unknown().transform((raw, ctx): T => {
        const result = schema.safeParse(raw);
        if (!result.success) {
            forwardIssues(result.error, ctx);
            return z.NEVER;
        }
        return rememberFloatForms(result.data, raw);
    });
}

/**
 * Encodes an integer field. Throws a NumericRange SchemaError when the value
 * is fractional or does not fit in 32 bits.
 */
export function encodeInt32(value: number, path: PathSegment[]): number {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
        throw errors.numericRange(path);
    }
    return value;
}

/**
 * Encodes the float field of `owner` named by the last segment of `path`.
 * A whole value decoded from a literal such as `100.0` is written back with
 * its fraction; any other value is written as it reads. Throws a NumericRange
 * SchemaError for NaN or infinity.
 */
export function encodeFloat(owner: object, value: number, path: PathSegment[]): JsonNumber {
    if (!Number.isFinite(value)) {
        throw errors.numericRange(path);
    }
    const key = path[path.length - 1];
    if (typeof key === 'string' && Number.isInteger(value) && wholeFloatKeys.get(owner)?.has(key) === true) {
        return floatNumber(value);
    }
    return value;
}

// ----------------------------------------------------------------------------
// zod → SchemaError
// ----------------------------------------------------------------------------

function stringParam(params: Record<string, unknown> | undefined, key: string): string | undefined {
    const value = params?.[key];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Converts the first issue of a failed parse into a SchemaError.
 *
 * `root` is the tree that was parsed, used to tell a missing key from a present
 * one of the wrong type and to name the JSON type actually found.
 * `prefix` is prepended to the reported path.
 */
export function toSchemaError(error: z.ZodError, root: unknown, prefix: PathSegment[] = []): errors.SchemaError {
    const issue = error.issues[0];
    const path = [...prefix, ...issue.path];
    const actual = valueAtPath(root, issue.path);

    switch (issue.code) {
        case z.ZodIssueCode.custom: {
            const kind = stringParam(issue.params, 'kind');
            if (kind === 'AmbiguousVariant') {
                const candidates: unknown = issue.params?.candidates;
                return errors.ambiguousVariant(path, Array.isArray(candidates) ? candidates.map(String) : []);
            }
            if (kind === 'UnknownVariant') {
                return errors.unknownVariant(path, issue.message);
            }
            if (kind === 'NumericRange') {
                return errors.numericRange(path);
            }
            if (kind === 'ReservedKey') {
                return errors.reservedKey(path);
            }
            return errors.typeMismatch(path, stringParam(issue.params, 'expected') ?? issue.message, jsonTypeOf(actual));
        }
        case z.ZodIssueCode.invalid_type:
            if (actual === undefined) {
                return errors.missingField(path);
            }
            return errors.typeMismatch(path, issue.expected, jsonTypeOf(actual));
        default:
            return errors.typeMismatch(path, issue.message, jsonTypeOf(actual));
    }
}
