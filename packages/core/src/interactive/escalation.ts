/**
 * Timeout → interrupt → kill escalation for a process that should end by
 * itself.
 *
 *   RUNNING ──exit──────────────────────────▶ FINISHED
 *      │ primary timeout
 *      ▼
 *   INTERRUPTING ──exit within grace────────▶ FINISHED
 *      │ grace elapsed
 *      ▼
 *   KILLED
 */

import type { SecureLogger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { ProcessNotRunningError } from './errors.js';
import type { ExitStatus, PtyProcess } from './pty-process.js';
import type { EscalationState, Outcome, TimeoutEscalated } from './types.js';

/** 128 + SIGINT: the status of a program that died from ^C. */
export const INTERRUPT_EXIT_CODE = 130;

export interface EscalationOptions {
  primaryTimeoutMs: number;
  graceMs: number;
  /** Runs just before ^C is sent. */
  onInterrupt?: () => void;
  /** Runs just before the process is force-killed. */
  onKill?: () => void;
  logger?: SecureLogger;
}

export interface EscalationResult {
  state: Extract<EscalationState, 'FINISHED' | 'KILLED'>;
  interrupted: boolean;
  exitStatus: ExitStatus | null;
  events: TimeoutEscalated[];
}

export class EscalationPolicy {
  private readonly logger: SecureLogger;

  constructor(private readonly opts: EscalationOptions) {
    this.logger = (opts.logger ?? createNoopLogger()).child({ component: 'EscalationPolicy' });
  }

  async run(proc: PtyProcess): Promise<EscalationResult> {
    const events: TimeoutEscalated[] = [];
    let state: EscalationState = 'RUNNING';
    const transition = (to: EscalationState, reason: string) => {
      events.push({ from: state, to, at: Date.now(), reason });
      state = to;
    };

    let status = await proc.waitForExit(this.opts.primaryTimeoutMs);
    if (status) {
      transition('FINISHED', 'exited');
      return { state: 'FINISHED', interrupted: false, exitStatus: status, events };
    }

    transition('INTERRUPTING', `no exit within ${this.opts.primaryTimeoutMs}ms`);
    this.logger.warn('Process did not exit, sending interrupt', {
      pid: proc.pid,
      timeoutMs: this.opts.primaryTimeoutMs,
    });
    this.opts.onInterrupt?.();
    try {
      proc.signalInterrupt();
    } catch (err) {
      if (!(err instanceof ProcessNotRunningError)) throw err;
    }

    status = await proc.waitForExit(this.opts.graceMs);
    if (status) {
      transition('FINISHED', 'exited after interrupt');
      return { state: 'FINISHED', interrupted: true, exitStatus: status, events };
    }

    transition('KILLED', `no exit within ${this.opts.graceMs}ms of interrupt`);
    this.logger.warn('Process ignored interrupt, killing', { pid: proc.pid, graceMs: this.opts.graceMs });
    this.opts.onKill?.();
    await proc.terminate(true);
    return { state: 'KILLED', interrupted: true, exitStatus: proc.exitStatus, events };
  }
}

/**
 * Classify a finished run. Call only after all output has been captured:
 * the marker check looks at the trailing output.
 */
export function classifyOutcome(
  exitStatus: ExitStatus | null,
  trailingOutput: string,
  gracefulMarkers: readonly string[]
): Outcome {
  if (exitStatus && (exitStatus.exitCode === 0 || exitStatus.exitCode === INTERRUPT_EXIT_CODE)) {
    return 'SUCCESS';
  }
  const haystack = trailingOutput.toLowerCase();
  if (gracefulMarkers.some((marker) => haystack.includes(marker.toLowerCase()))) {
    return 'SUCCESS';
  }
  return 'FAILURE';
}
