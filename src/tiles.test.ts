import { describe, it, expect } from 'vitest';
import { placedTiles, tilesetTileCoords, unpackGridCells, unpackTileCoords, unpackTiles } from './tiles.js';
import { type GridLayer, type LayerBase, type TileCoordsLayer, type TileLayer } from './types/layer.js';
import { type Tileset } from './types/project.js';

const base: LayerBase = {
    name: 'main',
    exportID: 'layer-main',
    offsetX: 0,
    offsetY: 0,
    gridCellWidth: 16,
    gridCellHeight: 8,
    gridCellsX: 2,
    gridCellsY: 2,
};

describe('unpackTiles', () => {
    const layer: TileLayer = { ...base, type: 'tile', tileset: 'terrain', tiles: { layout: '1d', data: [5, -1, -1, 7] } };

    it('wraps flat data every gridCellsX cells', () => {
        expect(unpackTiles(layer)).toEqual([
            { id: 5, gridPosition: { x: 0, y: 0 }, pixelPosition: { x: 0, y: 0 } },
            { id: null, gridPosition: { x: 1, y: 0 }, pixelPosition: { x: 16, y: 0 } },
            { id: null, gridPosition: { x: 0, y: 1 }, pixelPosition: { x: 0, y: 8 } },
            { id: 7, gridPosition: { x: 1, y: 1 }, pixelPosition: { x: 16, y: 8 } },
        ]);
    });

    it('placedTiles skips empty cells', () => {
        expect(placedTiles(layer).map((tile) => tile.id)).toEqual([5, 7]);
    });

    it('reads rows of 2D data', () => {
        const rows: TileLayer = { ...layer, tiles: { layout: '2d', data2D: [[1], [2, 3]] } };
        expect(placedTiles(rows).map((tile) => tile.gridPosition)).toEqual([
            { x: 0, y: 0 },
            { x: 0, y: 1 },
            { x: 1, y: 1 },
        ]);
    });
});

describe('unpackTileCoords', () => {
    it('treats [-1] as an empty cell', () => {
        const layer: TileCoordsLayer = {
            ...base,
            type: 'tileCoords',
            tileset: 'terrain',
            tiles: { layout: '1d', dataCoords: [[2, 1], [-1]] },
        };
        expect(unpackTileCoords(layer)).toEqual([
            {
                coords: { x: 2, y: 1 },
                pixelCoords: { x: 32, y: 8 },
                gridPosition: { x: 0, y: 0 },
                pixelPosition: { x: 0, y: 0 },
            },
            { coords: null, pixelCoords: null, gridPosition: { x: 1, y: 0 }, pixelPosition: { x: 16, y: 0 } },
        ]);
    });
});

describe('unpackGridCells', () => {
    it('returns every cell with its value', () => {
        const layer: GridLayer = { ...base, type: 'grid', cells: { layout: '2d', grid2D: [['1', '0']] } };
        expect(unpackGridCells(layer)).toEqual([
            { value: '1', gridPosition: { x: 0, y: 0 }, pixelPosition: { x: 0, y: 0 } },
            { value: '0', gridPosition: { x: 1, y: 0 }, pixelPosition: { x: 16, y: 0 } },
        ]);
    });
});

describe('tilesetTileCoords', () => {
    const tileset: Tileset = {
        label: 'terrain',
        path: 'tiles/terrain.png',
        image: '',
        tileWidth: 16,
        tileHeight: 16,
        tileSeparationX: 0,
        tileSeparationY: 0,
    };

    it('walks the image row by row', () => {
        expect(tilesetTileCoords(tileset, 32, 32)).toEqual([
            { x: 0, y: 0 },
            { x: 16, y: 0 },
            { x: 0, y: 16 },
            { x: 16, y: 16 },
        ]);
    });

    it('accounts for separation and margins', () => {
        const spaced: Tileset = { ...tileset, tileSeparationX: 2, tileSeparationY: 2, tileMarginX: 1, tileMarginY: 1 };
        // (35 - 1 + 2) / 18 = 2 columns, (18 - 1 + 2) / 18 = 1 row
        expect(tilesetTileCoords(spaced, 35, 18)).toEqual([
            { x: 1, y: 1 },
            { x: 19, y: 1 },
        ]);
    });

    it('ignores a partial trailing tile', () => {
        expect(tilesetTileCoords(tileset, 40, 16)).toHaveLength(2);
    });
});
