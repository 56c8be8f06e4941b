import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { callTool, getToolDefinitions } from './tools/index.js';
import type { ExecutionEngine } from './tools/terminal/engine.js';
import type { Logger } from './utils/logger.js';
import { SERVER_VERSION } from './version.js';

/**
 * Expose the control surface as MCP tools, for controllers that speak MCP over stdio
 */
export function createMcpServer(engine: ExecutionEngine, logger: Logger): Server {
  const server = new Server(
    {
      name: 'shell-agent',
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    logger.debug('ListTools requested');
    return { tools: getToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(name, args, engine, logger);
  });

  return server;
}
