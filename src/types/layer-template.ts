import type { Vec2 } from './vec2.js';
import type { ValueTemplate } from './value-template.js';

/**
 * Core types for layer templates.
 *
 * Layer templates are declared once in the project and describe what each
 * level layer may hold. Their order in the project is display order.
 */

/** How a tile layer stores its cells: tileset ids or tileset co-ordinates. */
export const ExportMode = {
    Ids: 0,
    Coords: 1,
} as const;

export type ExportMode = (typeof ExportMode)[keyof typeof ExportMode];

/** Whether cell data is written as a flat array or as rows. */
export const ArrayMode = {
    OneDimensional: 0,
    TwoDimensional: 1,
} as const;

export type ArrayMode = (typeof ArrayMode)[keyof typeof ArrayMode];

/**
 * Common properties shared by all layer templates.
 */
export interface LayerTemplateBase {
    name: string;
    /** Size of each grid cell in pixels */
    gridSize: Vec2;
    /** Unique export id, echoed by level layers as `_eid` */
    exportID: string;
}

export interface GridLayerTemplate extends LayerTemplateBase {
    definition: 'grid';
    arrayMode: ArrayMode;
    /** Cell value → display color. Key order follows the project file. */
    legend: Record<string, string>;
}

export interface TileLayerTemplate extends LayerTemplateBase {
    definition: 'tile';
    exportMode: ExportMode;
    arrayMode: ArrayMode;
    /** Label of the tileset selected by default */
    defaultTileset: string;
}

export interface EntityLayerTemplate extends LayerTemplateBase {
    definition: 'entity';
    /** Tags an entity must have to be placed on this layer */
    requiredTags: string[];
    /** Tags that keep an entity off this layer */
    excludedTags: string[];
}

export interface DecalLayerTemplate extends LayerTemplateBase {
    definition: 'decal';
    /** Folder searched for decal images, relative to the project */
    folder: string;
    includeImageSequence: boolean;
    scaleable: boolean;
    rotatable: boolean;
    values: ValueTemplate[];
}

export type LayerTemplate = GridLayerTemplate | TileLayerTemplate | EntityLayerTemplate | DecalLayerTemplate;

export type LayerDefinition = LayerTemplate['definition'];

export const LAYER_DEFINITIONS: readonly LayerDefinition[] = ['grid', 'tile', 'entity', 'decal'];
