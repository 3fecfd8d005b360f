import { z } from 'zod';
import {
    type JsonObject,
    type JsonValue,
    type PathSegment,
    floatNumber,
    integerNumber,
    isIntegerLiteral,
    isJsonNumber,
    isJsonObject,
    numberLiteral,
} from '../json/tree.js';
import { type CustomValue, type Value, formatHexColor, parseHexColor } from '../types/value.js';
import type { ValueDefinition } from '../types/value-template.js';
import { float, forwardIssues, raise, raiseInvalidType } from './primitives.js';
import * as errors from '../errors.js';

/** Assigning this key sets an object's prototype instead of adding an entry. */
export const RESERVED_VALUE_NAME = '__proto__';

function isStringArray(raw: unknown): raw is string[] {
    if (!Array.isArray(raw)) return false;
    const items: unknown[] = raw;
    return items.every((item) => typeof item === 'string');
}

/**
 * A value with no declared type. The variant follows the JSON shape: integer
 * literals become `integer`, any other number `float`.
 */
export const untypedValueSchema = z.unknown().transform((raw, ctx): Value => {
    if (typeof raw === 'boolean') return { type: 'boolean', value: raw };
    if (typeof raw === 'string') return { type: 'string', value: raw };
    if (isStringArray(raw)) return { type: 'arrayString', value: raw };

    if (isJsonNumber(raw)) {
        const value = Number(numberLiteral(raw));
        if (!Number.isFinite(value)) {
            raise(ctx, 'NumericRange', 'Number out of range');
            return z.NEVER;
        }
        if (!isIntegerLiteral(raw)) return { type: 'float', value };
        if (!Number.isSafeInteger(value)) {
            raise(ctx, 'NumericRange', 'Integer out of range');
            return z.NEVER;
        }
        return { type: 'integer', value };
    }

    raise(ctx, 'TypeMismatch', 'Unsupported value', { expected: 'boolean, string, number or string array' });
    return z.NEVER;
});

/**
 * An integer value. Values are not bound to 32 bits, only to what a JS number
 * holds exactly.
 */
const integerValueSchema = z.unknown().transform((raw, ctx): Value => {
    if (!isJsonNumber(raw) || !isIntegerLiteral(raw)) {
        raiseInvalidType(ctx, z.ZodParsedType.integer, raw);
        return z.NEVER;
    }
    const value = Number(numberLiteral(raw));
    if (!Number.isSafeInteger(value)) {
        raise(ctx, 'NumericRange', 'Integer out of range');
        return z.NEVER;
    }
    return { type: 'integer', value };
});

const colorValueSchema = z.string().transform((text, ctx): Value => {
    const parsed = parseHexColor(text);
    if (!parsed) {
        raise(ctx, 'TypeMismatch', 'Invalid color', { expected: 'hex color (#rrggbb or #rrggbbaa)' });
        return z.NEVER;
    }
    return { type: 'color', value: parsed.color, includeAlpha: parsed.includeAlpha };
});

const enumValueSchema = z.unknown().transform((raw, ctx): Value => {
    if (typeof raw === 'string') return { type: 'enum', value: raw };
    if (isStringArray(raw)) return { type: 'arrayEnum', value: raw };
    raiseInvalidType(ctx, z.ZodParsedType.string, raw);
    return z.NEVER;
});

const stringValueSchema = z.unknown().transform((raw, ctx): Value => {
    if (typeof raw === 'string') return { type: 'string', value: raw };
    if (isStringArray(raw)) return { type: 'arrayString', value: raw };
    raiseInvalidType(ctx, z.ZodParsedType.string, raw);
    return z.NEVER;
});

const TYPED_VALUE_SCHEMAS: Record<ValueDefinition, z.ZodType<Value, z.ZodTypeDef, unknown>> = {
    Boolean: z.boolean().transform((value): Value => ({ type: 'boolean', value })),
    Color: colorValueSchema,
    Enum: enumValueSchema,
    Integer: integerValueSchema,
    Float: float.transform((value): Value => ({ type: 'float', value })),
    String: stringValueSchema,
    Text: z.string().transform((value): Value => ({ type: 'text', value })),
};

/**
 * Schema for a raw value whose type is declared by a value template definition.
 */
export function typedValueSchema(definition: ValueDefinition): z.ZodType<Value, z.ZodTypeDef, unknown> {
    return TYPED_VALUE_SCHEMAS[definition];
}

/**
 * A `values` object. Entries keep their source order.
 */
export const customValuesSchema = z.unknown().transform((raw, ctx): CustomValue[] => {
    if (!isJsonObject(raw)) {
        raiseInvalidType(ctx, z.ZodParsedType.object, raw);
        return z.NEVER;
    }

    const values: CustomValue[] = [];
    for (const [name, entry] of Object.entries(raw)) {
        if (name === RESERVED_VALUE_NAME) {
            raise(ctx, 'ReservedKey', 'Reserved value name', {}, [name]);
            return z.NEVER;
        }
        const result = untypedValueSchema.safeParse(entry);
        if (!result.success) {
            forwardIssues(result.error, ctx, [name]);
            return z.NEVER;
        }
        values.push({ name, value: result.data });
    }
    return values;
});

// ----------------------------------------------------------------------------
// encoding
// ----------------------------------------------------------------------------

export function encodeValue(value: Value, path: PathSegment[]): JsonValue {
    switch (value.type) {
        case 'boolean':
        case 'enum':
        case 'string':
        case 'text':
            return value.value;
        case 'color':
            return formatHexColor(value.value, value.includeAlpha);
        case 'integer':
            if (!Number.isSafeInteger(value.value)) {
                throw errors.numericRange(path);
            }
            return integerNumber(value.value);
        case 'float':
            if (!Number.isFinite(value.value)) {
                throw errors.numericRange(path);
            }
            return floatNumber(value.value);
        case 'arrayString':
        case 'arrayEnum':
            return [...value.value];
    }
}

export function encodeCustomValues(values: CustomValue[], path: PathSegment[]): JsonObject {
    const out: JsonObject = {};
    for (const entry of values) {
        if (entry.name === RESERVED_VALUE_NAME) {
            throw errors.reservedKey([...path, entry.name]);
        }
        out[entry.name] = encodeValue(entry.value, [...path, entry.name]);
    }
    return out;
}
