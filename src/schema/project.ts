import { z } from 'zod';
import type { JsonObject, PathSegment } from '../json/tree.js';
import type { EntityTemplate, Project, Tileset } from '../types/project.js';
import type { Vec2 } from '../types/vec2.js';
import { encodeLayerTemplate, layerTemplateSchema } from './layer-template.js';
import { encodeFloat, encodeInt32, float, int32, vec2, withFloatForms } from './primitives.js';
import { encodeValueTemplate, valueTemplateSchema } from './value-template.js';

const shapeSchema = z.object({
    label: z.string(),
    points: z.array(vec2(float)),
});

const entityTemplateSchema: z.ZodType<EntityTemplate, z.ZodTypeDef, unknown> = withFloatForms(
    z.object({
        name: z.string(),
        exportID: z.string(),
        limit: int32,
        size: vec2(float),
        origin: vec2(float),
        originAnchored: z.boolean(),
        shape: shapeSchema,
        color: z.string(),
        tileX: z.boolean(),
        tileY: z.boolean(),
        tileSize: vec2(float),
        resizeableX: z.boolean(),
        resizeableY: z.boolean(),
        rotatable: z.boolean(),
        rotationDegrees: float,
        canFlipX: z.boolean(),
        canFlipY: z.boolean(),
        canSetColor: z.boolean(),
        hasNodes: z.boolean(),
        nodeLimit: int32,
        nodeDisplay: int32,
        nodeGhost: z.boolean(),
        tags: z.array(z.string()),
        values: z.array(valueTemplateSchema),
        texture: z.string().optional(),
        textureImage: z.string().optional(),
    }),
);

const tilesetSchema: z.ZodType<Tileset, z.ZodTypeDef, unknown> = z.object({
    label: z.string(),
    path: z.string(),
    image: z.string(),
    tileWidth: int32,
    tileHeight: int32,
    tileSeparationX: int32,
    tileSeparationY: int32,
    tileMarginX: int32.optional(),
    tileMarginY: int32.optional(),
});

export const projectSchema: z.ZodType<Project, z.ZodTypeDef, unknown> = z.object({
    name: z.string(),
    ogmoVersion: z.string().optional(),
    levelPaths: z.array(z.string()),
    backgroundColor: z.string(),
    gridColor: z.string(),
    anglesRadians: z.boolean(),
    directoryDepth: int32,
    layerGridDefaultSize: vec2(int32),
    levelDefaultSize: vec2(int32),
    levelMinSize: vec2(int32),
    levelMaxSize: vec2(int32),
    levelValues: z.array(valueTemplateSchema),
    defaultExportMode: z.string(),
    compactExport: z.boolean().optional(),
    externalScript: z.string().optional(),
    playCommand: z.string().optional(),
    entityTags: z.array(z.string()),
    layers: z.array(layerTemplateSchema),
    entities: z.array(entityTemplateSchema),
    tilesets: z.array(tilesetSchema),
});

// ----------------------------------------------------------------------------
// encoding
// ----------------------------------------------------------------------------

function encodeIntVec2(value: Vec2, path: PathSegment[]): JsonObject {
    return { x: encodeInt32(value.x, [...path, 'x']), y: encodeInt32(value.y, [...path, 'y']) };
}

function encodeFloatVec2(value: Vec2, path: PathSegment[]): JsonObject {
    return { x: encodeFloat(value, value.x, [...path, 'x']), y: encodeFloat(value, value.y, [...path, 'y']) };
}

function encodeEntityTemplate(entity: EntityTemplate, path: PathSegment[]): JsonObject {
    const out: JsonObject = {
        exportID: entity.exportID,
        name: entity.name,
        limit: encodeInt32(entity.limit, [...path, 'limit']),
        size: encodeFloatVec2(entity.size, [...path, 'size']),
        origin: encodeFloatVec2(entity.origin, [...path, 'origin']),
        originAnchored: entity.originAnchored,
        shape: {
            label: entity.shape.label,
            points: entity.shape.points.map((point, i) => encodeFloatVec2(point, [...path, 'shape', 'points', i])),
        },
        color: entity.color,
        tileX: entity.tileX,
        tileY: entity.tileY,
        tileSize: encodeFloatVec2(entity.tileSize, [...path, 'tileSize']),
        resizeableX: entity.resizeableX,
        resizeableY: entity.resizeableY,
        rotatable: entity.rotatable,
        rotationDegrees: encodeFloat(entity, entity.rotationDegrees, [...path, 'rotationDegrees']),
        canFlipX: entity.canFlipX,
        canFlipY: entity.canFlipY,
        canSetColor: entity.canSetColor,
        hasNodes: entity.hasNodes,
        nodeLimit: encodeInt32(entity.nodeLimit, [...path, 'nodeLimit']),
        nodeDisplay: encodeInt32(entity.nodeDisplay, [...path, 'nodeDisplay']),
        nodeGhost: entity.nodeGhost,
        tags: [...entity.tags],
        values: entity.values.map((value, i) => encodeValueTemplate(value, [...path, 'values', i])),
    };
    if (entity.texture !== undefined) out.texture = entity.texture;
    if (entity.textureImage !== undefined) out.textureImage = entity.textureImage;
    return out;
}

function encodeTileset(tileset: Tileset, path: PathSegment[]): JsonObject {
    const out: JsonObject = {
        label: tileset.label,
        path: tileset.path,
        image: tileset.image,
        tileWidth: encodeInt32(tileset.tileWidth, [...path, 'tileWidth']),
        tileHeight: encodeInt32(tileset.tileHeight, [...path, 'tileHeight']),
        tileSeparationX: encodeInt32(tileset.tileSeparationX, [...path, 'tileSeparationX']),
        tileSeparationY: encodeInt32(tileset.tileSeparationY, [...path, 'tileSeparationY']),
    };
    if (tileset.tileMarginX !== undefined) out.tileMarginX = encodeInt32(tileset.tileMarginX, [...path, 'tileMarginX']);
    if (tileset.tileMarginY !== undefined) out.tileMarginY = encodeInt32(tileset.tileMarginY, [...path, 'tileMarginY']);
    return out;
}

/**
 * Builds the JSON tree of a project. Throws a NumericRange SchemaError when a
 * number cannot be written.
 */
export function encodeProjectTree(project: Project): JsonObject {
    const out: JsonObject = { name: project.name };
    if (project.ogmoVersion !== undefined) out.ogmoVersion = project.ogmoVersion;

    out.levelPaths = [...project.levelPaths];
    out.backgroundColor = project.backgroundColor;
    out.gridColor = project.gridColor;
    out.anglesRadians = project.anglesRadians;
    out.directoryDepth = encodeInt32(project.directoryDepth, ['directoryDepth']);
    out.layerGridDefaultSize = encodeIntVec2(project.layerGridDefaultSize, ['layerGridDefaultSize']);
    out.levelDefaultSize = encodeIntVec2(project.levelDefaultSize, ['levelDefaultSize']);
    out.levelMinSize = encodeIntVec2(project.levelMinSize, ['levelMinSize']);
    out.levelMaxSize = encodeIntVec2(project.levelMaxSize, ['levelMaxSize']);
    out.levelValues = project.levelValues.map((value, i) => encodeValueTemplate(value, ['levelValues', i]));
    out.defaultExportMode = project.defaultExportMode;
    if (project.compactExport !== undefined) out.compactExport = project.compactExport;
    if (project.externalScript !== undefined) out.externalScript = project.externalScript;
    if (project.playCommand !== undefined) out.playCommand = project.playCommand;
    out.entityTags = [...project.entityTags];
    out.layers = project.layers.map((layer, i) => encodeLayerTemplate(layer, ['layers', i]));
    out.entities = project.entities.map((entity, i) => encodeEntityTemplate(entity, ['entities', i]));
    out.tilesets = project.tilesets.map((tileset, i) => encodeTileset(tileset, ['tilesets', i]));
    return out;
}
