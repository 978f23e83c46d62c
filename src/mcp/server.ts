/**
 * scantab — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerReportTool } from './tools/report.js';
import { registerClassifyTool } from './tools/classify.js';
import { registerResources } from './resources.js';

/**
 * Create a fully configured MCP server with all scantab tools and resources.
 *
 * @returns Configured McpServer instance
 */
export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: 'scantab',
    version: '0.1.0',
  });

  registerReportTool(server);
  registerClassifyTool(server);

  registerResources(server);

  return server;
}
