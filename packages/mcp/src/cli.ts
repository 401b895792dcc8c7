#!/usr/bin/env node

/**
 * CLI entry point for the termjudge MCP service.
 *
 * Serves the session and judge tools over stdio. stdout carries the protocol,
 * so diagnostics go to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServiceConfig } from '@termjudge/shared';
import { loadConfig } from './config/config.js';
import { createMcpServer } from './server.js';

/**
 * Start the MCP server and block until the transport closes. Returns an exit
 * code (0 = success).
 */
export async function runMcpServer(env: Record<string, string | undefined> = process.env): Promise<number> {
  let config: McpServiceConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    console.error('[termjudge-mcp] Invalid configuration:', err instanceof Error ? err.message : err);
    return 1;
  }

  if (!config.enabled) {
    console.error('[termjudge-mcp] MCP service is disabled (MCP_ENABLED=false)');
    return 0;
  }

  const server = createMcpServer({ config });
  const transport = new StdioServerTransport();
  const closed = new Promise<void>((resolve) => {
    transport.onclose = resolve;
  });

  await server.connect(transport);
  console.error(`[termjudge-mcp] stdio transport started, gateway ${config.coreUrl}`);

  await closed;
  return 0;
}

// Direct execution entry point
if (import.meta.url === `file://${process.argv[1] ?? ''}`) {
  runMcpServer()
    .then((code) => {
      if (code !== 0) process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('[termjudge-mcp] Fatal:', err);
      process.exit(1);
    });
}
