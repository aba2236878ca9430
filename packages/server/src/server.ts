import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import type { AuroraContext } from './context.js';
import { callTool, createToolHandlers, toolDefinitions } from './tools.js';

export const SERVER_NAME = 'aurora-forecast';
export const SERVER_VERSION = '0.1.0';

/**
 * Build an MCP server exposing the aurora tools over `context`.
 */
export function createAuroraServer(context: AuroraContext): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );
  const handlers = createToolHandlers(context);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return await callTool(handlers, request.params.name, request.params.arguments ?? {});
  });

  return server;
}

/**
 * Serve on stdin/stdout until the client disconnects.
 */
export async function serveStdio(context: AuroraContext): Promise<void> {
  const server = createAuroraServer(context);
  await server.connect(new StdioServerTransport());
}
