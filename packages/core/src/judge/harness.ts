/**
 * JudgeHarness — drives a program through a fixed list of input lines and
 * decides whether it ended well.
 *
 * A run spawns the entry command, types each line with a pause in between,
 * then waits under the escalation policy (timeout, ^C, kill). Output is
 * collected in the background for the whole run so the transcript keeps
 * arrival order, and the outcome is classified only after the last byte has
 * been read.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { JudgeConfig, JudgeResult } from '@termjudge/shared';
import type { SecureLogger } from '../logging/logger.js';
import type { PathPolicy } from '../security/path-policy.js';
import { uuidv7 } from '../utils/crypto.js';
import { toErrorMessage } from '../utils/errors.js';
import { PtyProcess, type PtySpawner } from '../interactive/pty-process.js';
import { EscalationPolicy, classifyOutcome } from '../interactive/escalation.js';
import {
  JudgeInputFileMissingError,
  PathNotAllowedError,
  ProcessNotRunningError,
} from '../interactive/errors.js';
import { Transcript } from './transcript.js';

const COLLECT_POLL_MS = 50;

export const FORCED_INTERRUPT_MESSAGE =
  'The program did not end normally, Ctrl+C was sent to force interrupt.';

export interface JudgeHarnessConfig {
  judge: JudgeConfig;
  /** Working directory for judge() runs and base for relative input files. */
  workspaceRoot: string;
  cols?: number;
  rows?: number;
}

export interface JudgeHarnessDeps {
  logger: SecureLogger;
  pathPolicy: PathPolicy;
  spawner?: PtySpawner;
}

interface Capture {
  /** Output received since the last input line, bounded to `tailChars`. */
  trailing: string;
}

/** Lines of an input file, without their newline terminators. */
export function splitInputLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export class JudgeHarness {
  private readonly logger: SecureLogger;

  constructor(
    private readonly config: JudgeHarnessConfig,
    private readonly deps: JudgeHarnessDeps
  ) {
    this.logger = deps.logger.child({ component: 'JudgeHarness' });
  }

  /**
   * Run `entryCommand` in the workspace, feeding it the lines of `inputFile`.
   * `context` describes the run for the log only.
   */
  async judge(entryCommand: string, inputFile?: string, context?: string): Promise<JudgeResult> {
    if (context) {
      this.logger.debug('Judge requested', { entryCommand, inputFile, context });
    }

    let lines: string[] = [];
    if (inputFile) {
      const path = isAbsolute(inputFile) ? inputFile : resolve(this.config.workspaceRoot, inputFile);
      if (!this.deps.pathPolicy.isPathAllowedForRead(path)) {
        this.logger.warn('Judge input file rejected by path policy', { inputFile, path });
        return { success: false, log: '', error: new PathNotAllowedError(inputFile, 'read').message };
      }

      try {
        lines = splitInputLines(await readFile(path, 'utf-8'));
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
          return { success: false, log: '', error: new JudgeInputFileMissingError(inputFile).message };
        }
        this.logger.warn('Failed to read judge input file', { path, error: toErrorMessage(err) });
        return { success: false, log: '', error: `Failed to read input file ${inputFile}: ${toErrorMessage(err)}` };
      }
    }

    return this.run(entryCommand, lines, this.config.workspaceRoot);
  }

  async run(
    entryCommand: string,
    inputLines: readonly string[],
    workingDir: string = this.config.workspaceRoot
  ): Promise<JudgeResult> {
    const runId = uuidv7();
    const logger = this.logger.child({ runId });
    const settings = this.config.judge;

    let proc: PtyProcess;
    try {
      proc = await PtyProcess.spawn(entryCommand, {
        cwd: workingDir,
        cols: this.config.cols,
        rows: this.config.rows,
        spawner: this.deps.spawner,
        logger: this.deps.logger,
      });
    } catch (err) {
      const error = toErrorMessage(err);
      logger.warn('Judge spawn failed', { entryCommand, error });
      return { runId, success: false, log: '', error };
    }

    logger.info('Judge run started', { entryCommand, pid: proc.pid, lines: inputLines.length });

    const transcript = new Transcript();
    const capture: Capture = { trailing: '' };
    const stopCollecting = new AbortController();
    const collector = this.collect(proc, transcript, capture, stopCollecting.signal).catch(
      (err: unknown) => {
        logger.error('Output collection failed', { error: toErrorMessage(err) });
      }
    );

    try {
      await delay(settings.initialDelayMs);

      for (const [index, line] of inputLines.entries()) {
        if (!this.typeLine(proc, line)) {
          logger.debug('Program exited before all input was sent', {
            remaining: inputLines.length - index,
          });
          break;
        }
        transcript.user(line);
        capture.trailing = '';
        await delay(settings.interLineDelayMs);
      }

      if (settings.sendEof && proc.isRunning) {
        this.sendEof(proc);
      }

      const escalation = new EscalationPolicy({
        primaryTimeoutMs: settings.primaryTimeoutMs,
        graceMs: settings.graceMs,
        onInterrupt: () => transcript.userControl('Ctrl+C'),
        logger,
      });
      const outcome = await escalation.run(proc);

      if (proc.isRunning) stopCollecting.abort();
      await collector;

      const tail = capture.trailing.slice(-settings.tailChars);
      const verdict = classifyOutcome(outcome.exitStatus, tail, settings.gracefulMarkers);
      const exitCode = outcome.exitStatus?.exitCode;

      let error: string | undefined;
      if (verdict === 'FAILURE') {
        error =
          outcome.state === 'KILLED'
            ? FORCED_INTERRUPT_MESSAGE
            : `Program exit status code: ${exitCode ?? 'unknown'}\nLast output: ${tail.replace(/\r/g, '').trim()}`;
      }

      const { log, logPath } = await this.persist(transcript, runId, logger);
      logger.info('Judge run finished', {
        success: verdict === 'SUCCESS',
        state: outcome.state,
        exitCode,
        transitions: outcome.events.map((e) => `${e.from}->${e.to}`),
      });

      return { runId, success: verdict === 'SUCCESS', log, error, exitCode, logPath };
    } catch (err) {
      logger.error('Judge run failed', { entryCommand, error: toErrorMessage(err) });
      return { runId, success: false, log: transcript.render(), error: toErrorMessage(err) };
    } finally {
      stopCollecting.abort();
      await proc.terminate(true);
      await collector;
    }
  }

  // ── Private helpers ─────────────────────────────────────────────

  private typeLine(proc: PtyProcess, line: string): boolean {
    try {
      proc.sendLine(line);
      return true;
    } catch (err) {
      if (err instanceof ProcessNotRunningError) return false;
      throw err;
    }
  }

  private sendEof(proc: PtyProcess): void {
    try {
      proc.sendEof();
    } catch (err) {
      if (!(err instanceof ProcessNotRunningError)) throw err;
    }
  }

  private async collect(
    proc: PtyProcess,
    transcript: Transcript,
    capture: Capture,
    signal: AbortSignal
  ): Promise<void> {
    const limit = this.config.judge.tailChars;
    while (!signal.aborted) {
      const result = await proc.read(COLLECT_POLL_MS);
      if (result.kind === 'eof') return;
      if (result.kind === 'data') {
        transcript.program(result.data);
        capture.trailing = (capture.trailing + result.data).slice(-limit);
      }
    }
  }

  private async persist(
    transcript: Transcript,
    runId: string,
    logger: SecureLogger
  ): Promise<{ log: string; logPath?: string }> {
    const logPath = resolve(this.config.judge.logDir, `judge-${runId}.log`);
    try {
      return { log: await transcript.writeTo(logPath), logPath };
    } catch (err) {
      logger.error('Failed to write judge log', { logPath, error: toErrorMessage(err) });
      return { log: transcript.render() };
    }
  }
}
