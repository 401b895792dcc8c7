/**
 * MCP Types — configuration of the stdio tool service (@termjudge/mcp).
 */

import { z } from 'zod';

// ─── MCP Service Config ──────────────────────────────────────

export const McpServiceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  coreUrl: z.string().url().default('http://127.0.0.1:18790'),
  coreToken: z.string().min(8).optional(),
  rateLimitPerTool: z.number().int().min(1).max(1000).default(30),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type McpServiceConfig = z.infer<typeof McpServiceConfigSchema>;
