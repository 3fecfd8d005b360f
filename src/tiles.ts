import type { GridLayer, TileCoordsLayer, TileLayer } from './types/layer.js';
import type { Tileset } from './types/project.js';
import type { Vec2 } from './types/vec2.js';

/**
 * Cell iteration over the packed storage of grid and tile layers.
 *
 * Flat (`1d`) storage is read left to right, top to bottom, wrapping every
 * `gridCellsX` cells. Pixel positions are grid positions scaled by the layer's
 * cell size.
 */

export interface Tile {
    /** Tile id in the tileset, or null for an empty cell */
    id: number | null;
    gridPosition: Vec2;
    pixelPosition: Vec2;
}

export interface TileCoords {
    /** Tileset cell `[u, v]` as a vector, or null for an empty cell */
    coords: Vec2 | null;
    /** `coords` scaled by the layer's cell size */
    pixelCoords: Vec2 | null;
    gridPosition: Vec2;
    pixelPosition: Vec2;
}

export interface GridCell {
    value: string;
    gridPosition: Vec2;
    pixelPosition: Vec2;
}

interface CellGeometry {
    gridCellWidth: number;
    gridCellHeight: number;
    gridCellsX: number;
}

function flatten<T>(layer: CellGeometry, cells: T[]): Array<{ cell: T; x: number; y: number }> {
    const columns = Math.max(layer.gridCellsX, 1);
    return cells.map((cell, i) => ({ cell, x: i % columns, y: Math.floor(i / columns) }));
}

function rows<T>(cells: T[][]): Array<{ cell: T; x: number; y: number }> {
    return cells.flatMap((row, y) => row.map((cell, x) => ({ cell, x, y })));
}

function positions(layer: CellGeometry, x: number, y: number): { gridPosition: Vec2; pixelPosition: Vec2 } {
    return {
        gridPosition: { x, y },
        pixelPosition: { x: x * layer.gridCellWidth, y: y * layer.gridCellHeight },
    };
}

/**
 * Every cell of a tile layer, empty ones included.
 */
export function unpackTiles(layer: TileLayer): Tile[] {
    const cells = layer.tiles.layout === '1d' ? flatten(layer, layer.tiles.data) : rows(layer.tiles.data2D);
    return cells.map(({ cell, x, y }) => ({
        id: cell === -1 ? null : cell,
        ...positions(layer, x, y),
    }));
}

/**
 * Tiles that are not empty.
 */
export function placedTiles(layer: TileLayer): Tile[] {
    return unpackTiles(layer).filter((tile) => tile.id !== null);
}

/**
 * Every cell of a tile co-ordinates layer, empty ones included.
 */
export function unpackTileCoords(layer: TileCoordsLayer): TileCoords[] {
    const cells =
        layer.tiles.layout === '1d' ? flatten(layer, layer.tiles.dataCoords) : rows(layer.tiles.dataCoords2D);
    return cells.map(({ cell, x, y }) => {
        const empty = cell.length < 2 || cell[0] === -1;
        return {
            coords: empty ? null : { x: cell[0], y: cell[1] },
            pixelCoords: empty ? null : { x: cell[0] * layer.gridCellWidth, y: cell[1] * layer.gridCellHeight },
            ...positions(layer, x, y),
        };
    });
}

/**
 * Every cell of a grid layer.
 */
export function unpackGridCells(layer: GridLayer): GridCell[] {
    const cells = layer.cells.layout === '1d' ? flatten(layer, layer.cells.grid) : rows(layer.cells.grid2D);
    return cells.map(({ cell, x, y }) => ({ value: cell, ...positions(layer, x, y) }));
}

/**
 * Pixel origin of each tile in a tileset image, row by row.
 *
 * The project only stores the image path, so the caller supplies the image size.
 */
export function tilesetTileCoords(tileset: Tileset, textureWidth: number, textureHeight: number): Vec2[] {
    const marginX = tileset.tileMarginX ?? 0;
    const marginY = tileset.tileMarginY ?? 0;
    const stepX = tileset.tileWidth + tileset.tileSeparationX;
    const stepY = tileset.tileHeight + tileset.tileSeparationY;
    if (stepX <= 0 || stepY <= 0) return [];

    // the last tile in a row or column has no trailing separation
    const columns = Math.floor((textureWidth - marginX + tileset.tileSeparationX) / stepX);
    const tileRows = Math.floor((textureHeight - marginY + tileset.tileSeparationY) / stepY);

    const coords: Vec2[] = [];
    for (let y = 0; y < tileRows; y++) {
        for (let x = 0; x < columns; x++) {
            coords.push({ x: marginX + x * stepX, y: marginY + y * stepY });
        }
    }
    return coords;
}
