import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from './context.js';
import { registerTools } from './tools.js';

/** Builds the MCP server and registers every robot tool against `ctx`. */
export function createServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    { name: 'legbot-mcp', version: '0.1.0' },
    {
      capabilities: { tools: {} },
      instructions: 'MCP server driving an in-memory legged robot (pose and energy model).',
    },
  );
  registerTools(server, ctx);
  return server;
}
