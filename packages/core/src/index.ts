/**
 * @termjudge/core
 *
 * Sandboxed interactive session engine: pseudo-terminal sessions behind a
 * command policy, polled and pushed output relays, and a scripted judge
 * harness with interrupt/kill escalation.
 */

// Main entry point
export {
  SessionEngine,
  createSessionEngine,
  type SessionEngineOptions,
  type SessionEngineState,
} from './engine.js';
export { VERSION } from './version.js';

// Configuration
export { loadConfig, type LoadConfigOptions } from './config/loader.js';

// Logging
export {
  createLogger,
  initializeLogger,
  getLogger,
  createNoopLogger,
  type SecureLogger,
  type LogLevel,
  type LogContext,
} from './logging/logger.js';

// Security
export {
  createCommandPolicy,
  SubstringCommandPolicy,
  FirstTokenCommandPolicy,
  type CommandPolicy,
} from './security/command-policy.js';
export { PathPolicy, canonicalizePath, isWithin, type PathPolicyConfig } from './security/path-policy.js';

// Interactive sessions
export {
  PtyProcess,
  nodePtySpawner,
  parseCommand,
  INTERRUPT_CHAR,
  EOF_CHAR,
  type PtyHandle,
  type PtySpawner,
  type ExitStatus,
  type ReadResult,
  type SpawnOptions,
} from './interactive/pty-process.js';
export { SessionRegistry, type SessionRegistryConfig, type SessionRegistryDeps } from './interactive/registry.js';
export { InteractiveSessionManager } from './interactive/manager.js';
export {
  drainOutput,
  PushRelay,
  PROCESS_ENDED_SENTINEL,
  type DrainOptions,
  type RelaySink,
} from './interactive/output-relay.js';
export {
  EscalationPolicy,
  classifyOutcome,
  INTERRUPT_EXIT_CODE,
  type EscalationOptions,
  type EscalationResult,
} from './interactive/escalation.js';
export { attachPushSession, registerInteractiveRoutes, WS_CLOSE, type SocketChannel } from './interactive/interactive-routes.js';
export type {
  StepResult,
  KillResult,
  SessionSummary,
  DrainResult,
  EscalationState,
  Outcome,
} from './interactive/types.js';
export * from './interactive/errors.js';

// Judge
export { JudgeHarness, FORCED_INTERRUPT_MESSAGE, splitInputLines } from './judge/harness.js';
export { Transcript, type Speaker, type TranscriptEntry } from './judge/transcript.js';
export { registerJudgeRoutes } from './judge/judge-routes.js';

// Gateway
export { GatewayServer, createGatewayServer, type GatewayServerOptions } from './gateway/server.js';
