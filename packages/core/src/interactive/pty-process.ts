/**
 * PtyProcess — one program running behind a pseudo-terminal.
 *
 * Output is buffered FIFO as it arrives and handed out by read(). Only one
 * read may be pending at a time. Every wait is bounded by a caller-supplied
 * timeout.
 */

import { stat, access } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { delimiter, isAbsolute, join, resolve } from 'node:path';
import { parse as parseShellWords } from 'shell-quote';
import type { IPty } from 'node-pty';
import type { SecureLogger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { ProcessNotRunningError, SpawnError } from './errors.js';

export interface Disposable {
  dispose(): void;
}

/** The slice of node-pty's IPty this module relies on. */
export interface PtyHandle {
  readonly pid: number;
  onData(listener: (data: string) => void): Disposable;
  onExit(listener: (event: { exitCode: number; signal?: number }) => void): Disposable;
  write(data: string): void;
  kill(signal?: string): void;
}

export interface PtySpawnOptions {
  name: string;
  cwd: string;
  cols: number;
  rows: number;
  env: Record<string, string>;
}

export type PtySpawner = (
  file: string,
  args: string[],
  options: PtySpawnOptions
) => PtyHandle | Promise<PtyHandle>;

export interface ExitStatus {
  /** Exit code; a signal death is reported as 128 + signal. */
  exitCode: number;
  signal?: number;
}

export type ReadResult = { kind: 'data'; data: string } | { kind: 'empty' } | { kind: 'eof' };

export interface SpawnOptions {
  cwd?: string;
  /** Hard lifetime; the process is force-killed when it is still alive past it. 0 disables. */
  timeoutMs?: number;
  cols?: number;
  rows?: number;
  env?: Record<string, string | undefined>;
  /** Time terminate(false) waits after SIGTERM before escalating to SIGKILL. */
  terminateGraceMs?: number;
  spawner?: PtySpawner;
  logger?: SecureLogger;
}

const DEFAULT_COLS = 120;
const DEFAULT_ROWS = 40;
const DEFAULT_TERMINATE_GRACE_MS = 1000;
const KILL_WAIT_MS = 2000;
// Plain terminal type: keeps prompts free of colour and bracketed-paste escapes
const TERM_NAME = 'dumb';

export const INTERRUPT_CHAR = '\x03';
export const EOF_CHAR = '\x04';

const SIGNAL_NUMBERS: Record<string, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGKILL: 9,
  SIGTERM: 15,
};

export function signalNumber(signal: string): number | undefined {
  return SIGNAL_NUMBERS[signal];
}

/**
 * Split a command line into file + argv. Lines with shell operators, globs or
 * comments run through `/bin/sh -c` unchanged.
 */
export function parseCommand(command: string): { file: string; args: string[] } {
  const entries = parseShellWords(command, (name) => `$${name}`);
  const words: string[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'string') {
      return { file: '/bin/sh', args: ['-c', command] };
    }
    words.push(entry);
  }

  const [file, ...args] = words;
  if (file === undefined || file.length === 0) {
    throw new SpawnError('Command is empty', command);
  }
  // Unexpanded variables need the shell too
  if (words.some((w) => w.includes('$'))) {
    return { file: '/bin/sh', args: ['-c', command] };
  }
  return { file, args };
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    await access(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Locate `file` the way execvp would. Returns null when it is not found. */
export async function resolveExecutable(
  file: string,
  pathEnv: string | undefined,
  cwd: string
): Promise<string | null> {
  if (file.includes('/')) {
    const candidate = isAbsolute(file) ? file : resolve(cwd, file);
    return (await isExecutableFile(candidate)) ? candidate : null;
  }
  for (const dir of (pathEnv ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, file);
    if (await isExecutableFile(candidate)) return candidate;
  }
  return null;
}

/** Spawner backed by node-pty, loaded on first use. */
export const nodePtySpawner: PtySpawner = async (file, args, options) => {
  const executable = await resolveExecutable(file, options.env.PATH, options.cwd);
  if (!executable) {
    throw new SpawnError(`Executable not found on PATH: ${file}`, file);
  }
  const { spawn } = await import('node-pty');
  const pty: IPty = spawn(executable, args, {
    name: options.name,
    cols: options.cols,
    rows: options.rows,
    cwd: options.cwd,
    env: options.env,
  });
  return pty;
};

function cleanEnv(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function controlByte(char: string): string {
  if (char.length !== 1) {
    throw new Error(`Control character must be a single character, got '${char}'`);
  }
  const code = char.toLowerCase().charCodeAt(0);
  // Already a control byte
  if (code < 0x20) return char;
  if (code < 0x61 || code > 0x7a) {
    throw new Error(`Unsupported control character '${char}'`);
  }
  return String.fromCharCode(code - 0x60);
}

export class PtyProcess {
  readonly command: string;
  readonly pid: number;

  private readonly pty: PtyHandle;
  private readonly logger: SecureLogger;
  private readonly terminateGraceMs: number;
  private readonly chunks: string[] = [];
  private status: ExitStatus | null = null;
  private reading = false;
  private wakeReader: (() => void) | null = null;
  private readonly exitWaiters = new Set<() => void>();
  private lifetimeTimer: NodeJS.Timeout | null = null;

  private constructor(
    command: string,
    pty: PtyHandle,
    opts: { logger: SecureLogger; terminateGraceMs: number; timeoutMs: number }
  ) {
    this.command = command;
    this.pty = pty;
    this.pid = pty.pid;
    this.terminateGraceMs = opts.terminateGraceMs;
    this.logger = opts.logger.child({ component: 'PtyProcess', pid: pty.pid });

    pty.onData((data) => {
      this.chunks.push(data);
      this.wake();
    });
    pty.onExit(({ exitCode, signal }) => this.handleExit(exitCode, signal));

    if (opts.timeoutMs > 0) {
      this.lifetimeTimer = setTimeout(() => {
        this.logger.warn('Process exceeded its lifetime, killing', { timeoutMs: opts.timeoutMs });
        void this.terminate(true);
      }, opts.timeoutMs);
      this.lifetimeTimer.unref();
    }
  }

  static async spawn(command: string, opts: SpawnOptions = {}): Promise<PtyProcess> {
    const logger = opts.logger ?? createNoopLogger();
    const cwd = opts.cwd ?? process.cwd();

    let isDir = false;
    try {
      isDir = (await stat(cwd)).isDirectory();
    } catch {
      isDir = false;
    }
    if (!isDir) {
      throw new SpawnError(`Working directory is not a directory: ${cwd}`, command);
    }

    const { file, args } = parseCommand(command);
    const env = cleanEnv({ ...process.env, ...opts.env, TERM: TERM_NAME });
    const spawner = opts.spawner ?? nodePtySpawner;

    let pty: PtyHandle;
    try {
      pty = await spawner(file, args, {
        name: TERM_NAME,
        cwd,
        cols: opts.cols ?? DEFAULT_COLS,
        rows: opts.rows ?? DEFAULT_ROWS,
        env,
      });
    } catch (err) {
      if (err instanceof SpawnError) throw err;
      throw new SpawnError(
        `Failed to spawn '${command}': ${err instanceof Error ? err.message : String(err)}`,
        command
      );
    }

    logger.debug('Process spawned', { command, pid: pty.pid, cwd });
    return new PtyProcess(command, pty, {
      logger,
      terminateGraceMs: opts.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS,
      timeoutMs: opts.timeoutMs ?? 0,
    });
  }

  get isRunning(): boolean {
    return this.status === null;
  }

  get exitStatus(): ExitStatus | null {
    return this.status;
  }

  sendLine(text: string): void {
    this.write(`${text}\r`);
  }

  /** Write the control byte for `char` ('c' → ^C). */
  sendControl(char: string): void {
    this.write(controlByte(char));
  }

  signalInterrupt(): void {
    this.write(INTERRUPT_CHAR);
  }

  sendEof(): void {
    this.write(EOF_CHAR);
  }

  /**
   * Wait up to `maxTimeoutMs` for output. Returns everything buffered so far,
   * `empty` on timeout, or `eof` once the process has exited and the buffer
   * is drained.
   */
  async read(maxTimeoutMs: number): Promise<ReadResult> {
    if (this.reading) {
      throw new Error(`Concurrent read on process ${this.pid}`);
    }
    this.reading = true;
    try {
      if (this.chunks.length === 0 && this.status === null && maxTimeoutMs > 0) {
        await new Promise<void>((resolveWait) => {
          const timer = setTimeout(done, maxTimeoutMs);
          function done(): void {
            clearTimeout(timer);
            resolveWait();
          }
          this.wakeReader = done;
        });
        this.wakeReader = null;
      }
      return this.takeBuffered();
    } finally {
      this.reading = false;
    }
  }

  async waitForExit(timeoutMs: number): Promise<ExitStatus | null> {
    if (this.status) return this.status;
    await new Promise<void>((resolveWait) => {
      const done = (): void => {
        clearTimeout(timer);
        this.exitWaiters.delete(done);
        resolveWait();
      };
      const timer = setTimeout(done, timeoutMs);
      this.exitWaiters.add(done);
    });
    return this.status;
  }

  /**
   * Stop the process. `force` sends SIGKILL at once; otherwise SIGTERM, then
   * SIGKILL after the grace period. Resolves true once the process is gone.
   */
  async terminate(force: boolean): Promise<boolean> {
    if (this.status) return true;

    if (!force) {
      this.kill('SIGTERM');
      if (await this.waitForExit(this.terminateGraceMs)) return true;
      this.logger.debug('SIGTERM ignored, escalating to SIGKILL');
    }

    this.kill('SIGKILL');
    return (await this.waitForExit(KILL_WAIT_MS)) !== null;
  }

  private write(data: string): void {
    if (this.status) {
      throw new ProcessNotRunningError(this.pid);
    }
    this.pty.write(data);
  }

  private kill(signal: string): void {
    try {
      this.pty.kill(signal);
    } catch (err) {
      // The process can exit between the status check and the signal
      this.logger.debug('Signal delivery failed', {
        signal,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private takeBuffered(): ReadResult {
    if (this.chunks.length > 0) {
      const data = this.chunks.join('');
      this.chunks.length = 0;
      return { kind: 'data', data };
    }
    return this.status ? { kind: 'eof' } : { kind: 'empty' };
  }

  private wake(): void {
    this.wakeReader?.();
  }

  private handleExit(exitCode: number, signal?: number): void {
    if (this.status) return;
    this.status =
      signal !== undefined && signal > 0 ? { exitCode: 128 + signal, signal } : { exitCode };
    if (this.lifetimeTimer) {
      clearTimeout(this.lifetimeTimer);
      this.lifetimeTimer = null;
    }
    this.logger.debug('Process exited', { exitCode: this.status.exitCode, signal });
    this.wake();
    for (const waiter of [...this.exitWaiters]) waiter();
  }
}
