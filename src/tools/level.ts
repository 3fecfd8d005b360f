import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as path from 'node:path';
import { loadLevelFile } from '../io/level-io.js';
import { loadProjectFile } from '../io/project-io.js';
import { type Layer } from '../types/layer.js';
import { type Level } from '../types/level.js';
import { type CustomValue, formatHexColor } from '../types/value.js';
import { placedTiles, unpackGridCells, unpackTileCoords } from '../tiles.js';
import { layerByName } from '../unpack.js';
import { resolveValues } from '../resolve.js';
import * as errors from '../errors.js';
import { type ToolResponse, jsonResponse, loadFailure, validationReport } from './response.js';

/**
 * Zod input schema for the `level` tool.
 *
 * - `info`: level size, offset and counts
 * - `layers`: one summary per layer, in file order
 * - `tiles`: occupied cells of one tile, tileCoords or grid layer (requires `layer`)
 * - `values`: level values, re-typed against the project when `project_path` is given
 * - `validate`: decodes the file and reports the first schema error, if any
 */
export const levelInputSchema = {
    action: z.enum(['info', 'layers', 'tiles', 'values', 'validate']).describe(
        'Action to perform: info (level summary), layers (layer list), tiles (cells of one layer), values (custom level values), validate (check the file against the schema)',
    ),
    path: z.string().describe('Path to the level .json file'),
    layer: z.string().optional().describe('Layer name (required for tiles)'),
    project_path: z.string().optional().describe('Path to the .ogmo project, used by values to apply value templates'),
};

export interface LevelToolArgs {
    action: 'info' | 'layers' | 'tiles' | 'values' | 'validate';
    path: string;
    layer?: string;
    project_path?: string;
}

/**
 * Registers the `level` tool on the MCP server.
 */
export function registerLevelTool(server: McpServer): void {
    server.registerTool(
        'level',
        {
            title: 'Level',
            description: 'Inspect an Ogmo level file. Actions: info, layers, tiles, values, validate.',
            inputSchema: levelInputSchema,
        },
        async (args) => runLevelTool(args),
    );
}

export async function runLevelTool(args: LevelToolArgs): Promise<ToolResponse> {
    if (!args.path) {
        return errors.invalidArgument(`level ${args.action} requires a "path" to the level file.`);
    }
    const resolvedPath = path.resolve(args.path);

    let level: Level;
    try {
        level = await loadLevelFile(resolvedPath);
    } catch (error: unknown) {
        if (args.action === 'validate' && error instanceof errors.SchemaError) {
            return validationReport(error);
        }
        return loadFailure(error);
    }

    switch (args.action) {
        case 'info':
            return jsonResponse({
                path: resolvedPath,
                ogmoVersion: level.ogmoVersion ?? null,
                width: level.width,
                height: level.height,
                offsetX: level.offsetX,
                offsetY: level.offsetY,
                layers: level.layers.length,
                values: level.values.length,
            });
        case 'layers':
            return jsonResponse(level.layers.map(summarizeLayer));
        case 'tiles':
            return handleTiles(level, args.layer);
        case 'values':
            return handleValues(level, args.project_path);
        case 'validate':
            return jsonResponse({ valid: true, path: resolvedPath });
    }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function contentCount(layer: Layer): number {
    switch (layer.type) {
        case 'grid':
            return unpackGridCells(layer).length;
        case 'tile':
            return placedTiles(layer).length;
        case 'tileCoords':
            return unpackTileCoords(layer).filter((cell) => cell.coords !== null).length;
        case 'entity':
            return layer.entities.length;
        case 'decal':
            return layer.decals.length;
    }
}

function summarizeLayer(layer: Layer) {
    return {
        name: layer.name,
        type: layer.type,
        exportID: layer.exportID,
        gridCellsX: layer.gridCellsX,
        gridCellsY: layer.gridCellsY,
        count: contentCount(layer),
    };
}

function handleTiles(level: Level, layerName: string | undefined): ToolResponse {
    if (!layerName) {
        return errors.invalidArgument('level tiles requires a "layer" name.');
    }
    const layer = layerByName(level, layerName);
    if (!layer) {
        return errors.layerNotFound(layerName);
    }

    switch (layer.type) {
        case 'tile':
            return jsonResponse({
                layer: layer.name,
                type: layer.type,
                tileset: layer.tileset,
                tiles: placedTiles(layer).map((tile) => ({ ...tile.gridPosition, id: tile.id })),
            });
        case 'tileCoords':
            return jsonResponse({
                layer: layer.name,
                type: layer.type,
                tileset: layer.tileset,
                tiles: unpackTileCoords(layer).flatMap((cell) =>
                    cell.coords ? [{ ...cell.gridPosition, u: cell.coords.x, v: cell.coords.y }] : [],
                ),
            });
        case 'grid':
            return jsonResponse({
                layer: layer.name,
                type: layer.type,
                cells: unpackGridCells(layer).map((cell) => ({ ...cell.gridPosition, value: cell.value })),
            });
        default:
            return errors.notATileLayer(layer.name, layer.type);
    }
}

function displayValues(values: CustomValue[]) {
    return values.map(({ name, value }) => ({
        name,
        type: value.type,
        value: value.type === 'color' ? formatHexColor(value.value, value.includeAlpha) : value.value,
    }));
}

async function handleValues(level: Level, projectPath: string | undefined): Promise<ToolResponse> {
    if (!projectPath) {
        return jsonResponse(displayValues(level.values));
    }

    try {
        const project = await loadProjectFile(path.resolve(projectPath));
        const resolved = resolveValues(level.values, project.levelValues);
        if (!resolved.success) {
            return errors.schemaErrorResponse(resolved.error);
        }
        return jsonResponse(displayValues(resolved.data));
    } catch (error: unknown) {
        return loadFailure(error);
    }
}
