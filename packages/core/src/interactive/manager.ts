/**
 * InteractiveSessionManager — the boundary over SessionRegistry.
 *
 * Every operation returns a structured result and never throws for ordinary
 * failures. A safety rejection leaves the session untouched, so it is
 * reported with `finished: false`; any other failure reports the session as
 * finished.
 */

import type { SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type { SessionRegistry } from './registry.js';
import type { PtyProcess } from './pty-process.js';
import { SafetyViolationError, SessionNotFoundError, isEngineError } from './errors.js';
import type { KillResult, SessionSummary, StepResult } from './types.js';

export class InteractiveSessionManager {
  private readonly logger: SecureLogger;

  constructor(
    private readonly registry: SessionRegistry,
    logger: SecureLogger
  ) {
    this.logger = logger.child({ component: 'InteractiveSessionManager' });
  }

  async startSession(cmd?: string, sessionId?: string): Promise<StepResult> {
    try {
      return await this.registry.start(cmd, sessionId);
    } catch (err) {
      return this.failure(sessionId ?? '', err);
    }
  }

  async stepSession(sessionId: string, userInput?: string): Promise<StepResult> {
    try {
      return await this.registry.step(sessionId, userInput);
    } catch (err) {
      return this.failure(sessionId, err);
    }
  }

  async killSession(sessionId: string): Promise<KillResult> {
    try {
      const killed = await this.registry.kill(sessionId);
      return {
        message: killed
          ? `Session ${sessionId} has been terminated`
          : `Session ${sessionId} not found or already finished`,
      };
    } catch (err) {
      this.logger.error('Kill failed', { sessionId, error: toErrorMessage(err) });
      return { message: `Session ${sessionId} could not be terminated: ${toErrorMessage(err)}` };
    }
  }

  /** Spawn a caller-owned process for a push relay. Throws on rejection. */
  openStream(cmd?: string): Promise<PtyProcess> {
    return this.registry.openStream(cmd);
  }

  listSessions(): SessionSummary[] {
    return this.registry.list();
  }

  getSession(sessionId: string): SessionSummary | undefined {
    return this.registry.get(sessionId);
  }

  private failure(sessionId: string, err: unknown): StepResult {
    const finished = !(err instanceof SafetyViolationError);
    if (err instanceof SafetyViolationError || err instanceof SessionNotFoundError) {
      this.logger.debug('Session request rejected', { sessionId, error: err.message });
    } else if (isEngineError(err)) {
      this.logger.warn('Session request failed', { sessionId, code: err.code, error: err.message });
    } else {
      this.logger.error('Unexpected session failure', { sessionId, error: toErrorMessage(err) });
    }
    return { error: toErrorMessage(err), sessionId, output: '', waiting: false, finished };
  }
}
