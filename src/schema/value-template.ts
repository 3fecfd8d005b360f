import { z } from 'zod';
import { type JsonObject, type PathSegment, isJsonObject } from '../json/tree.js';
import {
    type BooleanValueTemplate,
    type ColorValueTemplate,
    type EnumValueTemplate,
    type FloatValueTemplate,
    type IntegerValueTemplate,
    type StringValueTemplate,
    type TextValueTemplate,
    type ValueDefinition,
    type ValueTemplate,
    VALUE_DEFINITIONS,
} from '../types/value-template.js';
import {
    delegate,
    encodeFloat,
    encodeInt32,
    float,
    int32,
    raise,
    raiseInvalidType,
    withFloatForms,
} from './primitives.js';

const base = z.object({
    name: z.string(),
    display: int32.optional(),
});

const VALUE_TEMPLATE_SCHEMAS: Record<ValueDefinition, z.ZodType<ValueTemplate, z.ZodTypeDef, unknown>> = {
    Boolean: base
        .extend({ defaults: z.boolean() })
        .transform((o): BooleanValueTemplate => ({ ...o, definition: 'Boolean' })),
    Color: base
        .extend({ defaults: z.string(), includeAlpha: z.boolean() })
        .transform((o): ColorValueTemplate => ({ ...o, definition: 'Color' })),
    Enum: base
        .extend({ defaults: int32, choices: z.array(z.string()) })
        .transform((o): EnumValueTemplate => ({ ...o, definition: 'Enum' })),
    Integer: base
        .extend({ defaults: int32, bounded: z.boolean(), min: int32, max: int32 })
        .transform((o): IntegerValueTemplate => ({ ...o, definition: 'Integer' })),
    Float: withFloatForms(
        base
            .extend({ defaults: float, bounded: z.boolean(), min: float, max: float })
            .transform((o): FloatValueTemplate => ({ ...o, definition: 'Float' })),
    ),
    String: base
        .extend({ defaults: z.string(), maxLength: int32, trimWhitespace: z.boolean() })
        .transform((o): StringValueTemplate => ({ ...o, definition: 'String' })),
    Text: base
        .extend({ defaults: z.string() })
        .transform((o): TextValueTemplate => ({ ...o, definition: 'Text' })),
};

/**
 * A value template, dispatched on its `definition` type name.
 */
export const valueTemplateSchema = z.unknown().transform((raw, ctx): ValueTemplate => {
    if (!isJsonObject(raw)) {
        raiseInvalidType(ctx, z.ZodParsedType.object, raw);
        return z.NEVER;
    }

    const tag = raw.definition;
    if (typeof tag !== 'string') {
        raiseInvalidType(ctx, z.ZodParsedType.string, tag, ['definition']);
        return z.NEVER;
    }

    const definition = VALUE_DEFINITIONS.find((candidate) => candidate === tag);
    if (definition === undefined) {
        raise(ctx, 'UnknownVariant', `unsupported value definition '${tag}'`);
        return z.NEVER;
    }

    return delegate(VALUE_TEMPLATE_SCHEMAS[definition].safeParse(raw), ctx);
});

export function encodeValueTemplate(template: ValueTemplate, path: PathSegment[]): JsonObject {
    const out: JsonObject = { name: template.name, definition: template.definition };
    if (template.display !== undefined) {
        out.display = encodeInt32(template.display, [...path, 'display']);
    }

    switch (template.definition) {
        case 'Boolean':
        case 'Text':
            out.defaults = template.defaults;
            break;
        case 'Color':
            out.defaults = template.defaults;
            out.includeAlpha = template.includeAlpha;
            break;
        case 'Enum':
            out.choices = [...template.choices];
            out.defaults = encodeInt32(template.defaults, [...path, 'defaults']);
            break;
        case 'Integer':
            out.defaults = encodeInt32(template.defaults, [...path, 'defaults']);
            out.bounded = template.bounded;
            out.min = encodeInt32(template.min, [...path, 'min']);
            out.max = encodeInt32(template.max, [...path, 'max']);
            break;
        case 'Float':
            out.defaults = encodeFloat(template, template.defaults, [...path, 'defaults']);
            out.bounded = template.bounded;
            out.min = encodeFloat(template, template.min, [...path, 'min']);
            out.max = encodeFloat(template, template.max, [...path, 'max']);
            break;
        case 'String':
            out.defaults = template.defaults;
            out.maxLength = encodeInt32(template.maxLength, [...path, 'maxLength']);
            out.trimWhitespace = template.trimWhitespace;
            break;
    }
    return out;
}
