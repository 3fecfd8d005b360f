import type { Vec2 } from './vec2.js';
import type { CustomValue } from './value.js';
import type { ArrayMode, ExportMode } from './layer-template.js';

/**
 * Core types for level layers.
 *
 * A level layer holds the concrete contents of one project layer template.
 * The on-disk object has no type tag; the variant follows from which data key
 * it carries (`grid`, `data`, `dataCoords`, `entities` or `decals`, plus the
 * `2D` forms). Layer order inside a level is render order.
 */

/**
 * Common properties shared by all layer types.
 */
export interface LayerBase {
    name: string;
    /** Export id of the layer template (`_eid` on disk) */
    exportID: string;
    offsetX: number;
    offsetY: number;
    gridCellWidth: number;
    gridCellHeight: number;
    gridCellsX: number;
    gridCellsY: number;
    /** Custom values attached to the layer, when the file carries any */
    values?: CustomValue[];
}

/**
 * Grid cells. `"0"` conventionally means empty.
 */
export type GridData = { layout: '1d'; grid: string[] } | { layout: '2d'; grid2D: string[][] };

/**
 * Tile ids, counted left to right, top to bottom in the tileset. `-1` is empty.
 */
export type TileData = { layout: '1d'; data: number[] } | { layout: '2d'; data2D: number[][] };

/**
 * Tileset cell co-ordinates `[u, v]`. `[-1]` is empty.
 */
export type TileCoordsData =
    | { layout: '1d'; dataCoords: number[][] }
    | { layout: '2d'; dataCoords2D: number[][][] };

export interface GridLayer extends LayerBase {
    type: 'grid';
    arrayMode?: ArrayMode;
    cells: GridData;
}

export interface TileLayer extends LayerBase {
    type: 'tile';
    /** Label of the tileset the ids refer to */
    tileset: string;
    exportMode?: ExportMode;
    arrayMode?: ArrayMode;
    tiles: TileData;
}

export interface TileCoordsLayer extends LayerBase {
    type: 'tileCoords';
    tileset: string;
    exportMode?: ExportMode;
    arrayMode?: ArrayMode;
    tiles: TileCoordsData;
}

/**
 * A placed entity. Optional fields are only written when the entity template
 * enables the matching feature (resizing, origin, rotation, flipping, nodes).
 */
export interface Entity {
    name: string;
    id: number;
    /** Export id of the entity template (`_eid` on disk) */
    exportID: string;
    x: number;
    y: number;
    width?: number;
    height?: number;
    originX?: number;
    originY?: number;
    rotation?: number;
    flippedX?: boolean;
    flippedY?: boolean;
    nodes?: Vec2[];
    values?: CustomValue[];
}

export interface EntityLayer extends LayerBase {
    type: 'entity';
    entities: Entity[];
}

/**
 * A placed decal image.
 */
export interface Decal {
    x: number;
    y: number;
    /** Image path relative to the decal layer's folder */
    texture: string;
    rotation?: number;
    scaleX?: number;
    scaleY?: number;
    values?: CustomValue[];
}

export interface DecalLayer extends LayerBase {
    type: 'decal';
    decals: Decal[];
    /** Folder holding the decal images, relative to the project */
    folder: string;
}

/**
 * A Layer is a discriminated union of the five concrete layer types.
 */
export type Layer = GridLayer | TileLayer | TileCoordsLayer | EntityLayer | DecalLayer;

export type LayerType = Layer['type'];

export const LAYER_TYPES: readonly LayerType[] = ['grid', 'tile', 'tileCoords', 'entity', 'decal'];
