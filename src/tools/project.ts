import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as path from 'node:path';
import { loadProjectFile } from '../io/project-io.js';
import { type Project } from '../types/project.js';
import * as errors from '../errors.js';
import { type ToolResponse, jsonResponse, loadFailure, validationReport } from './response.js';

/**
 * Zod input schema for the `project` tool.
 *
 * - `info`: name, version and counts of layers, tilesets, entities and level values
 * - `layers`: layer templates in display order
 * - `tilesets`: tileset labels, paths and tile sizes
 * - `validate`: decodes the file and reports the first schema error, if any
 */
export const projectInputSchema = {
    action: z.enum(['info', 'layers', 'tilesets', 'validate']).describe(
        'Action to perform: info (project summary), layers (layer templates), tilesets (tileset list), validate (check the file against the schema)',
    ),
    path: z.string().describe('Path to the .ogmo project file'),
};

export interface ProjectToolArgs {
    action: 'info' | 'layers' | 'tilesets' | 'validate';
    path: string;
}

/**
 * Registers the `project` tool on the MCP server.
 */
export function registerProjectTool(server: McpServer): void {
    server.registerTool(
        'project',
        {
            title: 'Project',
            description: 'Inspect an Ogmo project file. Actions: info, layers, tilesets, validate.',
            inputSchema: projectInputSchema,
        },
        async (args) => runProjectTool(args),
    );
}

export async function runProjectTool(args: ProjectToolArgs): Promise<ToolResponse> {
    if (!args.path) {
        return errors.invalidArgument(`project ${args.action} requires a "path" to the .ogmo file.`);
    }
    const resolvedPath = path.resolve(args.path);

    let project: Project;
    try {
        project = await loadProjectFile(resolvedPath);
    } catch (error: unknown) {
        if (args.action === 'validate' && error instanceof errors.SchemaError) {
            return validationReport(error);
        }
        return loadFailure(error);
    }

    switch (args.action) {
        case 'info':
            return handleInfo(project, resolvedPath);
        case 'layers':
            return handleLayers(project);
        case 'tilesets':
            return handleTilesets(project);
        case 'validate':
            return jsonResponse({ valid: true, path: resolvedPath });
    }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleInfo(project: Project, filePath: string): ToolResponse {
    return jsonResponse({
        path: filePath,
        name: project.name,
        ogmoVersion: project.ogmoVersion ?? null,
        levelPaths: project.levelPaths,
        layers: project.layers.length,
        tilesets: project.tilesets.length,
        entities: project.entities.map((entity) => entity.name),
        levelValues: project.levelValues.map((value) => `${value.name}: ${value.definition}`),
    });
}

function handleLayers(project: Project): ToolResponse {
    return jsonResponse(
        project.layers.map((layer) => ({
            name: layer.name,
            definition: layer.definition,
            exportID: layer.exportID,
            gridSize: layer.gridSize,
        })),
    );
}

function handleTilesets(project: Project): ToolResponse {
    return jsonResponse(
        project.tilesets.map((tileset) => ({
            label: tileset.label,
            path: tileset.path,
            tileWidth: tileset.tileWidth,
            tileHeight: tileset.tileHeight,
        })),
    );
}
