import { z } from 'zod';
import type { JsonObject } from '../json/tree.js';
import type { Level } from '../types/level.js';
import { encodeLayer, layerSchema } from './layer.js';
import { encodeFloat, float, withFloatForms } from './primitives.js';
import { customValuesSchema, encodeCustomValues } from './value.js';

export const levelSchema: z.ZodType<Level, z.ZodTypeDef, unknown> = withFloatForms(
    z
        .object({
            ogmoVersion: z.string().optional(),
            width: float,
            height: float,
            offsetX: float,
            offsetY: float,
            layers: z.array(layerSchema),
            values: customValuesSchema.optional(),
        })
        .transform(({ values, ...rest }): Level => ({ ...rest, values: values ?? [] })),
);

/**
 * Builds the JSON tree of a level. Throws a NumericRange SchemaError when a
 * number cannot be written.
 */
export function encodeLevelTree(level: Level): JsonObject {
    const out: JsonObject = {};
    if (level.ogmoVersion !== undefined) out.ogmoVersion = level.ogmoVersion;

    out.width = encodeFloat(level, level.width, ['width']);
    out.height = encodeFloat(level, level.height, ['height']);
    out.offsetX = encodeFloat(level, level.offsetX, ['offsetX']);
    out.offsetY = encodeFloat(level, level.offsetY, ['offsetY']);
    out.layers = level.layers.map((layer, i) => encodeLayer(layer, ['layers', i]));
    out.values = encodeCustomValues(level.values, ['values']);
    return out;
}
