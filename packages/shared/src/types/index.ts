/**
 * Shared Types - Main Export
 */

// Configuration types
export {
  DEFAULT_ALLOWED_COMMANDS,
  CommandMatcherSchema,
  SandboxConfigSchema,
  SessionConfigSchema,
  JudgeConfigSchema,
  GatewayConfigSchema,
  LoggingConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type CommandMatcher,
  type SandboxConfig,
  type SessionConfig,
  type JudgeConfig,
  type GatewayConfig,
  type LoggingConfig,
  type Config,
  type PartialConfig,
} from './config.js';

// MCP service types
export { McpServiceConfigSchema, type McpServiceConfig } from './mcp.js';

// Session and judge wire types
export {
  StepResultSchema,
  KillResultSchema,
  SessionSummarySchema,
  SessionListSchema,
  JudgeResultSchema,
  HealthStatusSchema,
  ErrorBodySchema,
  type StepResult,
  type KillResult,
  type SessionSummary,
  type JudgeResult,
  type HealthStatus,
} from './session.js';
