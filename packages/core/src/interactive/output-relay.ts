/**
 * Output relays over a PtyProcess.
 *
 * drainOutput() is the per-call variant used by the session registry: it
 * collects whatever the process prints until it goes quiet. PushRelay is the
 * connection-owned variant: it forwards output as it arrives until the
 * process ends or the owner stops it.
 */

import type { SecureLogger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import type { PtyProcess } from './pty-process.js';
import type { DrainResult } from './types.js';

export interface DrainOptions {
  /** Silence that ends the drain. */
  quiescenceMs: number;
  /** Upper bound on a single read. */
  pollIntervalMs: number;
  /** Hard cap on the whole drain. */
  maxDrainMs: number;
}

export async function drainOutput(proc: PtyProcess, opts: DrainOptions): Promise<DrainResult> {
  const startedAt = Date.now();
  let lastDataAt = startedAt;
  let output = '';
  let sawEof = false;
  let quiescent = false;

  for (;;) {
    const now = Date.now();
    const quietLeft = opts.quiescenceMs - (now - lastDataAt);
    const capLeft = opts.maxDrainMs - (now - startedAt);
    if (quietLeft <= 0) {
      quiescent = true;
      break;
    }
    if (capLeft <= 0) break;

    const result = await proc.read(Math.min(opts.pollIntervalMs, quietLeft, capLeft));
    if (result.kind === 'data') {
      output += result.data;
      lastDataAt = Date.now();
    } else if (result.kind === 'eof') {
      sawEof = true;
      break;
    }
  }

  return {
    output,
    waiting: quiescent && proc.isRunning,
    finished: sawEof,
    exitStatus: proc.exitStatus,
  };
}

export interface RelaySink {
  send(chunk: string): void | Promise<void>;
  /** Called once, after the sentinel on EOF, or when the relay is stopped. */
  end(reason: 'eof' | 'stopped' | 'error'): void;
}

export interface PushRelayOptions {
  pollIntervalMs?: number;
  sentinel?: string;
  logger?: SecureLogger;
}

export const PROCESS_ENDED_SENTINEL = '[process ended]';

export class PushRelay {
  private readonly abort = new AbortController();
  private readonly pollIntervalMs: number;
  private readonly sentinel: string;
  private readonly logger: SecureLogger;
  private task: Promise<void> | null = null;
  private ended = false;

  constructor(
    private readonly proc: PtyProcess,
    private readonly sink: RelaySink,
    opts: PushRelayOptions = {}
  ) {
    this.pollIntervalMs = opts.pollIntervalMs ?? 100;
    this.sentinel = opts.sentinel ?? PROCESS_ENDED_SENTINEL;
    this.logger = (opts.logger ?? createNoopLogger()).child({ component: 'PushRelay', pid: proc.pid });
  }

  start(): void {
    if (this.task) return;
    this.task = this.pump().catch((err: unknown) => {
      this.logger.error('Relay failed', { error: err instanceof Error ? err.message : String(err) });
      this.finish('error');
      return this.proc.terminate(false).then(() => undefined);
    });
  }

  /** Resolves when the background task has finished. */
  get done(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  /** Cancel the task and terminate the process, SIGTERM first. */
  async stop(): Promise<void> {
    this.abort.abort();
    await this.done;
    await this.proc.terminate(false);
    this.finish('stopped');
  }

  private async pump(): Promise<void> {
    const { signal } = this.abort;
    while (!signal.aborted) {
      const result = await this.proc.read(this.pollIntervalMs);
      if (signal.aborted) return;
      if (result.kind === 'data') {
        await this.sink.send(result.data);
      } else if (result.kind === 'eof') {
        await this.sink.send(this.sentinel);
        this.finish('eof');
        return;
      }
    }
  }

  private finish(reason: 'eof' | 'stopped' | 'error'): void {
    if (this.ended) return;
    this.ended = true;
    this.logger.debug('Relay ended', { reason });
    this.sink.end(reason);
  }
}
