/**
 * scantab — OpenVAS report tables
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで LLM Agent と接続する。
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from './mcp/server.js';
import { logger } from './logger.js';

const server = createMcpServer();
const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('scantab MCP server connected on stdio');
