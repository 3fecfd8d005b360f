import { z } from 'zod';
import { type JsonObject, type JsonValue, type PathSegment, isJsonObject } from '../json/tree.js';
import type {
    Decal,
    DecalLayer,
    Entity,
    EntityLayer,
    GridLayer,
    Layer,
    LayerBase,
    TileCoordsLayer,
    TileLayer,
} from '../types/layer.js';
import type { CustomValue } from '../types/value.js';
import { arrayModeSchema, exportModeSchema } from './layer-template.js';
import {
    encodeFloat,
    encodeInt32,
    float,
    forwardIssues,
    int32,
    raise,
    raiseInvalidType,
    rememberFloatForms,
    vec2,
    withFloatForms,
} from './primitives.js';
import { customValuesSchema, encodeCustomValues } from './value.js';

const layerBaseSchema = z.object({
    name: z.string(),
    _eid: z.string(),
    offsetX: float,
    offsetY: float,
    gridCellWidth: int32,
    gridCellHeight: int32,
    gridCellsX: int32,
    gridCellsY: int32,
    values: customValuesSchema.optional(),
});

function toBase(o: z.infer<typeof layerBaseSchema>): LayerBase {
    return {
        name: o.name,
        exportID: o._eid,
        offsetX: o.offsetX,
        offsetY: o.offsetY,
        gridCellWidth: o.gridCellWidth,
        gridCellHeight: o.gridCellHeight,
        gridCellsX: o.gridCellsX,
        gridCellsY: o.gridCellsY,
        values: o.values,
    };
}

const tileBaseSchema = layerBaseSchema.extend({
    tileset: z.string(),
    exportMode: exportModeSchema.optional(),
    arrayMode: arrayModeSchema.optional(),
});

const entitySchema = withFloatForms(
    z
        .object({
            name: z.string(),
            id: int32,
            _eid: z.string(),
            x: float,
            y: float,
            width: float.optional(),
            height: float.optional(),
            originX: float.optional(),
            originY: float.optional(),
            rotation: float.optional(),
            flippedX: z.boolean().optional(),
            flippedY: z.boolean().optional(),
            nodes: z.array(vec2(float)).optional(),
            values: customValuesSchema.optional(),
        })
        .transform(({ _eid, ...rest }): Entity => ({ ...rest, exportID: _eid })),
);

const decalSchema: z.ZodType<Decal, z.ZodTypeDef, unknown> = withFloatForms(
    z.object({
        x: float,
        y: float,
        texture: z.string(),
        rotation: float.optional(),
        scaleX: float.optional(),
        scaleY: float.optional(),
        values: customValuesSchema.optional(),
    }),
);

const gridSchema = layerBaseSchema.extend({ arrayMode: arrayModeSchema.optional(), grid: z.array(z.string()) });
const grid2DSchema = layerBaseSchema.extend({
    arrayMode: arrayModeSchema.optional(),
    grid2D: z.array(z.array(z.string())),
});

interface LayerDataKey {
    /** Key whose presence selects this variant */
    key: string;
    schema: z.ZodType<Layer, z.ZodTypeDef, unknown>;
}

/**
 * Every data key a level layer may carry, with the schema it selects. A layer
 * object must carry exactly one of them.
 */
const LAYER_DATA_KEYS: readonly LayerDataKey[] = [
    {
        key: 'grid',
        schema: gridSchema.transform(
            (o): GridLayer => ({ type: 'grid', ...toBase(o), arrayMode: o.arrayMode, cells: { layout: '1d', grid: o.grid } }),
        ),
    },
    {
        key: 'grid2D',
        schema: grid2DSchema.transform(
            (o): GridLayer => ({
                type: 'grid',
                ...toBase(o),
                arrayMode: o.arrayMode,
                cells: { layout: '2d', grid2D: o.grid2D },
            }),
        ),
    },
    {
        key: 'data',
        schema: tileBaseSchema.extend({ data: z.array(int32) }).transform(
            (o): TileLayer => ({
                type: 'tile',
                ...toBase(o),
                tileset: o.tileset,
                exportMode: o.exportMode,
                arrayMode: o.arrayMode,
                tiles: { layout: '1d', data: o.data },
            }),
        ),
    },
    {
        key: 'data2D',
        schema: tileBaseSchema.extend({ data2D: z.array(z.array(int32)) }).transform(
            (o): TileLayer => ({
                type: 'tile',
                ...toBase(o),
                tileset: o.tileset,
                exportMode: o.exportMode,
                arrayMode: o.arrayMode,
                tiles: { layout: '2d', data2D: o.data2D },
            }),
        ),
    },
    {
        key: 'dataCoords',
        schema: tileBaseSchema.extend({ dataCoords: z.array(z.array(int32)) }).transform(
            (o): TileCoordsLayer => ({
                type: 'tileCoords',
                ...toBase(o),
                tileset: o.tileset,
                exportMode: o.exportMode,
                arrayMode: o.arrayMode,
                tiles: { layout: '1d', dataCoords: o.dataCoords },
            }),
        ),
    },
    {
        key: 'dataCoords2D',
        schema: tileBaseSchema.extend({ dataCoords2D: z.array(z.array(z.array(int32))) }).transform(
            (o): TileCoordsLayer => ({
                type: 'tileCoords',
                ...toBase(o),
                tileset: o.tileset,
                exportMode: o.exportMode,
                arrayMode: o.arrayMode,
                tiles: { layout: '2d', dataCoords2D: o.dataCoords2D },
            }),
        ),
    },
    {
        key: 'entities',
        schema: layerBaseSchema
            .extend({ entities: z.array(entitySchema) })
            .transform((o): EntityLayer => ({ type: 'entity', ...toBase(o), entities: o.entities })),
    },
    {
        key: 'decals',
        schema: layerBaseSchema
            .extend({ decals: z.array(decalSchema), folder: z.string() })
            .transform((o): DecalLayer => ({ type: 'decal', ...toBase(o), decals: o.decals, folder: o.folder })),
    },
];

/**
 * A level layer. The variant is chosen by which data key the object carries;
 * none is an UnknownVariant, more than one an AmbiguousVariant.
 */
export const layerSchema = z.unknown().transform((raw, ctx): Layer => {
    if (!isJsonObject(raw)) {
        raiseInvalidType(ctx, z.ZodParsedType.object, raw);
        return z.NEVER;
    }

    const present = LAYER_DATA_KEYS.filter((entry) => Object.hasOwn(raw, entry.key));
    if (present.length === 0) {
        const keys = LAYER_DATA_KEYS.map((entry) => entry.key).join(', ');
        raise(ctx, 'UnknownVariant', `layer carries none of ${keys}`);
        return z.NEVER;
    }
    if (present.length > 1) {
        raise(ctx, 'AmbiguousVariant', 'layer carries several data keys', {
            candidates: present.map((entry) => entry.key),
        });
        return z.NEVER;
    }
    const result = present[0].schema.safeParse(raw);
    if (!result.success) {
        forwardIssues(result.error, ctx);
        return z.NEVER;
    }
    return rememberFloatForms(result.data, raw);
});

// ----------------------------------------------------------------------------
// encoding
// ----------------------------------------------------------------------------

function encodeOptionalValues(out: JsonObject, values: CustomValue[] | undefined, path: PathSegment[]): void {
    if (values !== undefined) {
        out.values = encodeCustomValues(values, [...path, 'values']);
    }
}

function encodeIntRows(rows: number[][], path: PathSegment[]): JsonValue[] {
    return rows.map((row, y) => row.map((id, x) => encodeInt32(id, [...path, y, x])));
}

function encodeEntity(entity: Entity, path: PathSegment[]): JsonObject {
    const out: JsonObject = {
        name: entity.name,
        id: encodeInt32(entity.id, [...path, 'id']),
        _eid: entity.exportID,
        x: encodeFloat(entity, entity.x, [...path, 'x']),
        y: encodeFloat(entity, entity.y, [...path, 'y']),
    };
    const optionalFloats = ['width', 'height', 'originX', 'originY', 'rotation'] as const;
    for (const key of optionalFloats) {
        const value = entity[key];
        if (value !== undefined) out[key] = encodeFloat(entity, value, [...path, key]);
    }
    if (entity.flippedX !== undefined) out.flippedX = entity.flippedX;
    if (entity.flippedY !== undefined) out.flippedY = entity.flippedY;
    if (entity.nodes !== undefined) {
        out.nodes = entity.nodes.map((node, i) => ({
            x: encodeFloat(node, node.x, [...path, 'nodes', i, 'x']),
            y: encodeFloat(node, node.y, [...path, 'nodes', i, 'y']),
        }));
    }
    encodeOptionalValues(out, entity.values, path);
    return out;
}

function encodeDecal(decal: Decal, path: PathSegment[]): JsonObject {
    const out: JsonObject = {
        x: encodeFloat(decal, decal.x, [...path, 'x']),
        y: encodeFloat(decal, decal.y, [...path, 'y']),
        texture: decal.texture,
    };
    const optionalFloats = ['rotation', 'scaleX', 'scaleY'] as const;
    for (const key of optionalFloats) {
        const value = decal[key];
        if (value !== undefined) out[key] = encodeFloat(decal, value, [...path, key]);
    }
    encodeOptionalValues(out, decal.values, path);
    return out;
}

export function encodeLayer(layer: Layer, path: PathSegment[]): JsonObject {
    const out: JsonObject = {
        name: layer.name,
        _eid: layer.exportID,
        offsetX: encodeFloat(layer, layer.offsetX, [...path, 'offsetX']),
        offsetY: encodeFloat(layer, layer.offsetY, [...path, 'offsetY']),
        gridCellWidth: encodeInt32(layer.gridCellWidth, [...path, 'gridCellWidth']),
        gridCellHeight: encodeInt32(layer.gridCellHeight, [...path, 'gridCellHeight']),
        gridCellsX: encodeInt32(layer.gridCellsX, [...path, 'gridCellsX']),
        gridCellsY: encodeInt32(layer.gridCellsY, [...path, 'gridCellsY']),
    };

    switch (layer.type) {
        case 'grid':
            if (layer.cells.layout === '1d') {
                out.grid = [...layer.cells.grid];
            } else {
                out.grid2D = layer.cells.grid2D.map((row) => [...row]);
            }
            if (layer.arrayMode !== undefined) out.arrayMode = layer.arrayMode;
            break;
        case 'tile':
            out.tileset = layer.tileset;
            if (layer.tiles.layout === '1d') {
                out.data = layer.tiles.data.map((id, i) => encodeInt32(id, [...path, 'data', i]));
            } else {
                out.data2D = encodeIntRows(layer.tiles.data2D, [...path, 'data2D']);
            }
            if (layer.exportMode !== undefined) out.exportMode = layer.exportMode;
            if (layer.arrayMode !== undefined) out.arrayMode = layer.arrayMode;
            break;
        case 'tileCoords':
            out.tileset = layer.tileset;
            if (layer.tiles.layout === '1d') {
                out.dataCoords = encodeIntRows(layer.tiles.dataCoords, [...path, 'dataCoords']);
            } else {
                const cells = layer.tiles.dataCoords2D;
                out.dataCoords2D = cells.map((row, y) => encodeIntRows(row, [...path, 'dataCoords2D', y]));
            }
            if (layer.exportMode !== undefined) out.exportMode = layer.exportMode;
            if (layer.arrayMode !== undefined) out.arrayMode = layer.arrayMode;
            break;
        case 'entity':
            out.entities = layer.entities.map((entity, i) => encodeEntity(entity, [...path, 'entities', i]));
            break;
        case 'decal':
            out.decals = layer.decals.map((decal, i) => encodeDecal(decal, [...path, 'decals', i]));
            out.folder = layer.folder;
            break;
    }

    encodeOptionalValues(out, layer.values, path);
    return out;
}
