/**
 * Tool Registry — registers all MCP tools.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CoreApiClient } from '../core-client.js';
import type { ToolMiddleware } from './tool-utils.js';
import { registerSessionTools } from './session-tools.js';
import { registerJudgeTools } from './judge-tools.js';

export type { ToolMiddleware } from './tool-utils.js';

export function registerAllTools(server: McpServer, client: CoreApiClient, middleware: ToolMiddleware): void {
  registerSessionTools(server, client, middleware);
  registerJudgeTools(server, client, middleware);
}
