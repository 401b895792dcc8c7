/**
 * SessionRegistry — owns every live interactive session.
 *
 * Map mutations are synchronous; only spawning and draining suspend. Each
 * session has its own FIFO lock so concurrent steps on one id are queued
 * while independent sessions run in parallel.
 */

import type { SandboxConfig, SessionConfig } from '@termjudge/shared';
import type { SecureLogger } from '../logging/logger.js';
import type { CommandPolicy } from '../security/command-policy.js';
import { uuidv7 } from '../utils/crypto.js';
import { toErrorMessage } from '../utils/errors.js';
import { PtyProcess, type PtySpawner } from './pty-process.js';
import { drainOutput, type DrainOptions } from './output-relay.js';
import { Mutex } from './mutex.js';
import {
  SafetyViolationError,
  SessionExistsError,
  SessionLimitError,
  SessionNotFoundError,
} from './errors.js';
import type { SessionSummary, StepResult } from './types.js';

const SWEEP_INTERVAL_MS = 60_000;

interface Session {
  readonly id: string;
  readonly command: string;
  readonly createdAt: number;
  lastActivity: number;
  /** Set while the session is inside an interpreter launched from a step. */
  interpreterMode: boolean;
  readonly process: PtyProcess;
  readonly lock: Mutex;
}

export interface SessionRegistryDeps {
  logger: SecureLogger;
  commandPolicy: CommandPolicy;
  spawner?: PtySpawner;
  /** Working directory for spawned programs; defaults to process.cwd(). */
  cwd?: string;
}

export interface SessionRegistryConfig {
  sandbox: Pick<SandboxConfig, 'enabled'>;
  sessions: SessionConfig;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly starting = new Set<string>();
  private readonly config: SessionRegistryConfig;
  private readonly deps: SessionRegistryDeps;
  private readonly logger: SecureLogger;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(config: SessionRegistryConfig, deps: SessionRegistryDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'SessionRegistry' });
  }

  get size(): number {
    return this.sessions.size;
  }

  private get drainOptions(): DrainOptions {
    const { quiescenceMs, pollIntervalMs, maxDrainMs } = this.config.sessions;
    return { quiescenceMs, pollIntervalMs, maxDrainMs };
  }

  // ── Lifecycle ───────────────────────────────────────────────────

  /** Begin the periodic idle sweep. A zero idle timeout disables it. */
  startSweeper(): void {
    if (this.sweepTimer || this.config.sessions.idleTimeoutMs === 0) return;
    this.sweepTimer = setInterval(() => {
      this.expireIdleSessions().catch((err: unknown) => {
        this.logger.error('Idle sweep failed', { error: toErrorMessage(err) });
      });
    }, SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  async shutdown(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map((id) => this.remove(id, false)));
    this.logger.info('Session registry shut down', { terminated: ids.length });
  }

  // ── Operations ──────────────────────────────────────────────────

  async start(command?: string, requestedId?: string): Promise<StepResult> {
    const cmd = command?.trim() || this.config.sessions.defaultCommand;
    const id = requestedId ?? uuidv7();

    if (this.sessions.has(id) || this.starting.has(id)) {
      throw new SessionExistsError(id);
    }

    const policy = this.deps.commandPolicy;
    if (this.config.sandbox.enabled && !policy.isCommandAllowed(cmd)) {
      this.logger.warn('Start rejected by command policy', { sessionId: id, command: cmd });
      throw new SafetyViolationError(cmd, policy.name, policy.describe());
    }

    if (this.sessions.size + this.starting.size >= this.config.sessions.maxConcurrent) {
      throw new SessionLimitError(this.config.sessions.maxConcurrent);
    }

    this.starting.add(id);
    let proc: PtyProcess;
    try {
      proc = await this.spawn(cmd);
    } finally {
      this.starting.delete(id);
    }

    const now = Date.now();
    const session: Session = {
      id,
      command: cmd,
      createdAt: now,
      lastActivity: now,
      interpreterMode: false,
      process: proc,
      lock: new Mutex(),
    };
    this.sessions.set(id, session);
    this.logger.info('Session started', { sessionId: id, command: cmd, pid: proc.pid });

    return session.lock.runExclusive(() => this.drain(session));
  }

  /**
   * Spawn a process owned by the caller rather than the registry, after the
   * same command check start() applies. Used by push relays.
   */
  async openStream(command?: string): Promise<PtyProcess> {
    const cmd = command?.trim() || this.config.sessions.defaultCommand;
    const policy = this.deps.commandPolicy;
    if (this.config.sandbox.enabled && !policy.isCommandAllowed(cmd)) {
      this.logger.warn('Stream rejected by command policy', { command: cmd });
      throw new SafetyViolationError(cmd, policy.name, policy.describe());
    }
    const proc = await this.spawn(cmd);
    this.logger.info('Stream opened', { command: cmd, pid: proc.pid });
    return proc;
  }

  async step(id: string, input?: string): Promise<StepResult> {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }

    return session.lock.runExclusive(async () => {
      // Killed while this caller was queued
      if (this.sessions.get(id) !== session) {
        throw new SessionNotFoundError(id);
      }
      session.lastActivity = Date.now();

      if (input) {
        this.checkInput(session, input);
        if (session.process.isRunning) {
          session.process.sendLine(input);
          this.updateInterpreterMode(session, input);
        } else {
          this.logger.debug('Process already exited, input dropped', { sessionId: id });
        }
      }

      return this.drain(session);
    });
  }

  /** Force-terminate and forget a session. False when the id is not live. */
  async kill(id: string): Promise<boolean> {
    return this.remove(id, true);
  }

  get(id: string): SessionSummary | undefined {
    const session = this.sessions.get(id);
    return session ? summarize(session) : undefined;
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()].map(summarize);
  }

  /** Kill sessions idle for longer than `sessions.idleTimeoutMs`. Returns their ids. */
  async expireIdleSessions(now: number = Date.now()): Promise<string[]> {
    const timeout = this.config.sessions.idleTimeoutMs;
    if (timeout === 0) return [];

    const expired = [...this.sessions.values()]
      .filter((s) => !s.lock.isLocked && now - s.lastActivity > timeout)
      .map((s) => s.id);

    for (const id of expired) {
      this.logger.info('Session idle, expiring', { sessionId: id });
      await this.remove(id, false);
    }
    return expired;
  }

  // ── Private helpers ─────────────────────────────────────────────

  /**
   * Drop a session from the map, then stop its process: SIGKILL when
   * `force`, otherwise SIGTERM with SIGKILL after the grace period.
   */
  private async remove(id: string, force: boolean): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) return false;

    this.sessions.delete(id);
    await session.process.terminate(force);
    this.logger.info(force ? 'Session killed' : 'Session terminated', {
      sessionId: id,
      pid: session.process.pid,
    });
    return true;
  }

  private spawn(command: string): Promise<PtyProcess> {
    return PtyProcess.spawn(command, {
      cwd: this.deps.cwd,
      timeoutMs: this.config.sessions.spawnTimeoutMs,
      terminateGraceMs: this.config.sessions.terminateGraceMs,
      cols: this.config.sessions.cols,
      rows: this.config.sessions.rows,
      spawner: this.deps.spawner,
      logger: this.deps.logger,
    });
  }

  private checkInput(session: Session, input: string): void {
    if (!session.interpreterMode) return;
    // Leaving the interpreter is always permitted
    if (this.config.sessions.exitCommands.includes(input.trim())) return;
    const policy = this.deps.commandPolicy;
    if (!policy.isCommandAllowed(input)) {
      this.logger.warn('Input rejected by command policy', {
        sessionId: session.id,
        input,
        policy: policy.name,
      });
      throw new SafetyViolationError(input, policy.name, policy.describe());
    }
  }

  private updateInterpreterMode(session: Session, input: string): void {
    const trimmed = input.trim();
    const { interpreterPrefixes, exitCommands } = this.config.sessions;
    if (interpreterPrefixes.some((prefix) => trimmed.startsWith(prefix))) {
      session.interpreterMode = true;
    } else if (exitCommands.includes(trimmed)) {
      session.interpreterMode = false;
    }
  }

  private async drain(session: Session): Promise<StepResult> {
    const result = await drainOutput(session.process, this.drainOptions);
    session.lastActivity = Date.now();

    if (result.finished && this.sessions.get(session.id) === session) {
      this.sessions.delete(session.id);
      this.logger.info('Session finished', {
        sessionId: session.id,
        exitCode: result.exitStatus?.exitCode,
      });
    }

    return {
      sessionId: session.id,
      output: result.output,
      waiting: result.waiting,
      finished: result.finished,
    };
  }
}

function summarize(session: Session): SessionSummary {
  return {
    id: session.id,
    command: session.command,
    pid: session.process.pid,
    createdAt: session.createdAt,
    lastActivity: session.lastActivity,
    interpreterMode: session.interpreterMode,
  };
}
