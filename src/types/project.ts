import type { Vec2 } from './vec2.js';
import type { LayerTemplate } from './layer-template.js';
import type { ValueTemplate } from './value-template.js';

/**
 * Core types for the project file (`*.ogmo`).
 *
 * The project declares everything levels may contain: layer templates, entity
 * templates, tilesets and level value templates.
 */

/**
 * An entity icon outline.
 */
export interface Shape {
    label: string;
    points: Vec2[];
}

/**
 * A template for an entity.
 */
export interface EntityTemplate {
    name: string;
    exportID: string;
    /** Maximum number of instances per level. 0 for no limit */
    limit: number;
    size: Vec2;
    origin: Vec2;
    originAnchored: boolean;
    shape: Shape;
    /** Icon color, hex */
    color: string;
    tileX: boolean;
    tileY: boolean;
    tileSize: Vec2;
    resizeableX: boolean;
    resizeableY: boolean;
    rotatable: boolean;
    /** Rotation snapping interval */
    rotationDegrees: number;
    canFlipX: boolean;
    canFlipY: boolean;
    canSetColor: boolean;
    hasNodes: boolean;
    /** Maximum number of nodes. 0 for no limit */
    nodeLimit: number;
    nodeDisplay: number;
    nodeGhost: boolean;
    tags: string[];
    values: ValueTemplate[];
    /** Texture path, relative to the project */
    texture?: string;
    /** Texture as a base64 data URL */
    textureImage?: string;
}

/**
 * A tileset: an image sliced into a grid of tiles.
 */
export interface Tileset {
    /** Unique label. Tile layers refer to the tileset by this label. */
    label: string;
    /** Image path, relative to the project */
    path: string;
    /** Image as a base64 data URL */
    image: string;
    tileWidth: number;
    tileHeight: number;
    tileSeparationX: number;
    tileSeparationY: number;
    /** Margins arrived in later editor builds */
    tileMarginX?: number;
    tileMarginY?: number;
}

/**
 * The complete structure of a project file.
 */
export interface Project {
    name: string;
    /** Editor version that last wrote the file, e.g. "3.4.0" */
    ogmoVersion?: string;
    /** Folders holding the project's levels, relative to the project */
    levelPaths: string[];
    backgroundColor: string;
    gridColor: string;
    anglesRadians: boolean;
    /** Depth the editor searches `levelPaths` for levels */
    directoryDepth: number;
    layerGridDefaultSize: Vec2;
    levelDefaultSize: Vec2;
    levelMinSize: Vec2;
    levelMaxSize: Vec2;
    levelValues: ValueTemplate[];
    /** File extension for exported levels, e.g. ".json" */
    defaultExportMode: string;
    compactExport?: boolean;
    externalScript?: string;
    playCommand?: string;
    entityTags: string[];
    /** Layer templates in display order */
    layers: LayerTemplate[];
    entities: EntityTemplate[];
    tilesets: Tileset[];
}
