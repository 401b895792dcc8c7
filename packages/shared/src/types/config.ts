/**
 * Configuration Types for termjudge
 *
 * Security considerations:
 * - The sandbox is cooperative: path prefixes and command fragments only
 * - Paths are validated to prevent traversal
 * - Timeouts and limits have upper bounds
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z
  .string()
  .min(1)
  .max(4096)
  .refine((path) => !path.includes('..') && !path.includes('\0'), {
    message: 'Path contains forbidden characters',
  });

export const DEFAULT_ALLOWED_COMMANDS = [
  'ls',
  'pwd',
  'echo',
  'cat',
  'head',
  'tail',
  'grep',
  'find',
  'python',
  'python3',
  'chmod',
  'cd',
  'pytest',
  'bash',
];

export const CommandMatcherSchema = z.enum(['substring', 'first-token']);
export type CommandMatcher = z.infer<typeof CommandMatcherSchema>;

// Sandbox configuration
export const SandboxConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    workspaceRoot: SafePathSchema.default('/tmp/code_agent_workspace'),
    scratchRoot: SafePathSchema.default('/tmp'),
    pathRestriction: z.boolean().default(true),
    maxReportSlots: z.number().int().positive().max(10_000).default(50),
    allowedCommands: z.array(z.string().min(1)).default(DEFAULT_ALLOWED_COMMANDS),
    commandMatcher: CommandMatcherSchema.default('substring'),
  })
  .default({});

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;

// Interactive session configuration
export const SessionConfigSchema = z
  .object({
    defaultCommand: z.string().min(1).default('bash'),
    maxConcurrent: z.number().int().positive().max(1024).default(16),
    idleTimeoutMs: z.number().int().nonnegative().max(86_400_000).default(1_800_000),
    spawnTimeoutMs: z.number().int().positive().max(86_400_000).default(3_600_000),
    quiescenceMs: z.number().int().positive().max(60_000).default(1000),
    pollIntervalMs: z.number().int().positive().max(10_000).default(100),
    maxDrainMs: z.number().int().positive().max(600_000).default(30_000),
    cols: z.number().int().positive().max(1000).default(120),
    rows: z.number().int().positive().max(1000).default(40),
    interpreterPrefixes: z.array(z.string().min(1)).default(['python']),
    exitCommands: z.array(z.string().min(1)).default(['exit']),
    /** Wait between SIGTERM and SIGKILL when sessions are torn down. */
    terminateGraceMs: z.number().int().nonnegative().max(60_000).default(1000),
  })
  .default({});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

// Scripted interaction harness configuration
export const JudgeConfigSchema = z
  .object({
    primaryTimeoutMs: z.number().int().positive().max(3_600_000).default(10_000),
    graceMs: z.number().int().positive().max(600_000).default(3000),
    initialDelayMs: z.number().int().nonnegative().max(60_000).default(200),
    interLineDelayMs: z.number().int().nonnegative().max(60_000).default(200),
    sendEof: z.boolean().default(false),
    gracefulMarkers: z.array(z.string().min(1)).default(['KeyboardInterrupt']),
    tailChars: z.number().int().positive().max(1_000_000).default(2000),
    logDir: SafePathSchema.default('.'),
  })
  .default({});

export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;

// Gateway configuration
export const GatewayConfigSchema = z
  .object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(1024).max(65535).default(18790),
    authToken: z.string().min(8).optional(),
    bodyLimit: z.number().int().positive().max(104_857_600).default(1_048_576),
  })
  .default({});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

// Logging configuration
export const LoggingConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    output: z
      .array(
        z.discriminatedUnion('type', [
          z.object({
            type: z.literal('file'),
            path: SafePathSchema,
          }),
          z.object({
            type: z.literal('stdout'),
            format: z.enum(['json', 'pretty']).default('pretty'),
          }),
        ])
      )
      .default([{ type: 'stdout', format: 'pretty' }]),
  })
  .default({});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Complete configuration
export const ConfigSchema = z.object({
  sandbox: SandboxConfigSchema,
  sessions: SessionConfigSchema,
  judge: JudgeConfigSchema,
  gateway: GatewayConfigSchema,
  logging: LoggingConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

// Partial config for merging (all fields optional)
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
