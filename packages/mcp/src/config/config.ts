/**
 * MCP Service Configuration — loads config from environment variables.
 */

import { McpServiceConfigSchema, type McpServiceConfig } from '@termjudge/shared';

export function loadConfig(env: Record<string, string | undefined> = process.env): McpServiceConfig {
  const raw = {
    enabled: parseBool(env['MCP_ENABLED'], true),
    coreUrl: env['TERMJUDGE_URL'] ?? 'http://127.0.0.1:18790',
    coreToken: env['TERMJUDGE_AUTH_TOKEN'] || undefined,
    rateLimitPerTool: parseIntSafe(env['MCP_RATE_LIMIT_PER_TOOL'], 30),
    logLevel: env['MCP_LOG_LEVEL'] ?? 'info',
  };

  return McpServiceConfigSchema.parse(raw);
}

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1';
}

function parseIntSafe(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}
