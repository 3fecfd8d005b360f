import { z } from 'zod';
import { type JsonObject, type PathSegment, isJsonObject } from '../json/tree.js';
import {
    type DecalLayerTemplate,
    type EntityLayerTemplate,
    type GridLayerTemplate,
    type LayerDefinition,
    type LayerTemplate,
    type TileLayerTemplate,
    ArrayMode,
    ExportMode,
    LAYER_DEFINITIONS,
} from '../types/layer-template.js';
import { delegate, encodeInt32, int32, intChoice, raise, raiseInvalidType, vec2 } from './primitives.js';
import { encodeValueTemplate, valueTemplateSchema } from './value-template.js';

export const exportModeSchema = intChoice<ExportMode>([ExportMode.Ids, ExportMode.Coords]);
export const arrayModeSchema = intChoice<ArrayMode>([ArrayMode.OneDimensional, ArrayMode.TwoDimensional]);

const base = z.object({
    name: z.string(),
    gridSize: vec2(int32),
    exportID: z.string(),
});

const LAYER_TEMPLATE_SCHEMAS: Record<LayerDefinition, z.ZodType<LayerTemplate, z.ZodTypeDef, unknown>> = {
    grid: base
        .extend({ arrayMode: arrayModeSchema, legend: z.record(z.string()) })
        .transform((o): GridLayerTemplate => ({ ...o, definition: 'grid' })),
    tile: base
        .extend({ exportMode: exportModeSchema, arrayMode: arrayModeSchema, defaultTileset: z.string() })
        .transform((o): TileLayerTemplate => ({ ...o, definition: 'tile' })),
    entity: base
        .extend({ requiredTags: z.array(z.string()), excludedTags: z.array(z.string()) })
        .transform((o): EntityLayerTemplate => ({ ...o, definition: 'entity' })),
    decal: base
        .extend({
            folder: z.string(),
            includeImageSequence: z.boolean(),
            scaleable: z.boolean(),
            rotatable: z.boolean(),
            values: z.array(valueTemplateSchema),
        })
        .transform((o): DecalLayerTemplate => ({ ...o, definition: 'decal' })),
};

/**
 * Keys that only one kind of layer template carries. Used when a template has
 * no `definition` tag.
 */
const DEFINITION_MARKERS: Record<LayerDefinition, readonly string[]> = {
    grid: ['legend'],
    tile: ['defaultTileset', 'exportMode'],
    entity: ['requiredTags', 'excludedTags'],
    decal: ['folder'],
};

/**
 * Picks the template kind: the `definition` tag when present, otherwise the
 * single kind whose marker keys appear on the object.
 */
export const layerTemplateSchema = z.unknown().transform((raw, ctx): LayerTemplate => {
    if (!isJsonObject(raw)) {
        raiseInvalidType(ctx, z.ZodParsedType.object, raw);
        return z.NEVER;
    }

    if (Object.hasOwn(raw, 'definition')) {
        const tag = raw.definition;
        if (typeof tag !== 'string') {
            raiseInvalidType(ctx, z.ZodParsedType.string, tag, ['definition']);
            return z.NEVER;
        }
        const definition = LAYER_DEFINITIONS.find((candidate) => candidate === tag);
        if (definition === undefined) {
            raise(ctx, 'UnknownVariant', `unsupported layer definition '${tag}'`);
            return z.NEVER;
        }
        return delegate(LAYER_TEMPLATE_SCHEMAS[definition].safeParse(raw), ctx);
    }

    const matches = LAYER_DEFINITIONS.filter((definition) =>
        DEFINITION_MARKERS[definition].some((key) => Object.hasOwn(raw, key)),
    );
    if (matches.length === 0) {
        raise(ctx, 'UnknownVariant', 'no definition tag and no grid, tile, entity or decal fields');
        return z.NEVER;
    }
    if (matches.length > 1) {
        raise(ctx, 'AmbiguousVariant', 'fields of several layer definitions', { candidates: matches });
        return z.NEVER;
    }
    return delegate(LAYER_TEMPLATE_SCHEMAS[matches[0]].safeParse(raw), ctx);
});

export function encodeLayerTemplate(template: LayerTemplate, path: PathSegment[]): JsonObject {
    const out: JsonObject = {
        definition: template.definition,
        name: template.name,
        gridSize: {
            x: encodeInt32(template.gridSize.x, [...path, 'gridSize', 'x']),
            y: encodeInt32(template.gridSize.y, [...path, 'gridSize', 'y']),
        },
        exportID: template.exportID,
    };

    switch (template.definition) {
        case 'grid':
            out.arrayMode = template.arrayMode;
            out.legend = { ...template.legend };
            break;
        case 'tile':
            out.exportMode = template.exportMode;
            out.arrayMode = template.arrayMode;
            out.defaultTileset = template.defaultTileset;
            break;
        case 'entity':
            out.requiredTags = [...template.requiredTags];
            out.excludedTags = [...template.excludedTags];
            break;
        case 'decal':
            out.folder = template.folder;
            out.includeImageSequence = template.includeImageSequence;
            out.scaleable = template.scaleable;
            out.rotatable = template.rotatable;
            out.values = template.values.map((value, i) => encodeValueTemplate(value, [...path, 'values', i]));
            break;
    }
    return out;
}
