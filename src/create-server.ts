import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerProjectTool } from './tools/project.js';
import { registerLevelTool } from './tools/level.js';

export const SERVER_NAME = 'ogmo-schema';
export const SERVER_VERSION = '1.0.0';

/**
 * Builds the inspection server with the `project` and `level` tools registered.
 * The caller connects a transport.
 */
export function createServer(): McpServer {
    const server = new McpServer({
        name: SERVER_NAME,
        version: SERVER_VERSION,
    });

    registerProjectTool(server);
    registerLevelTool(server);
    return server;
}
