/**
 * MCP server assembly — the tool surface of the session engine.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServiceConfig } from '@termjudge/shared';
import { CoreApiClient } from './core-client.js';
import { createRateLimiter } from './middleware/rate-limiter.js';
import { registerAllTools } from './tools/index.js';

export const SERVER_NAME = 'termjudge-mcp';
export const SERVER_VERSION = '0.1.0';

export interface CreateMcpServerOptions {
  config: McpServiceConfig;
  /** Defaults to a client built from `config.coreUrl` and `config.coreToken`. */
  coreClient?: CoreApiClient;
  /** Clock for the per-tool rate limiter. */
  now?: () => number;
}

export function createMcpServer(opts: CreateMcpServerOptions): McpServer {
  const { config } = opts;
  const coreClient =
    opts.coreClient ?? new CoreApiClient({ coreUrl: config.coreUrl, coreToken: config.coreToken });

  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerAllTools(server, coreClient, {
    rateLimiter: createRateLimiter(config.rateLimitPerTool, opts.now),
  });
  return server;
}
