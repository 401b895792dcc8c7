/**
 * Judge Command — run the scripted-interaction harness locally.
 */

import type { PartialConfig } from '@termjudge/shared';
import { createSessionEngine, type SessionEngine } from '../../engine.js';
import { createNoopLogger, type SecureLogger } from '../../logging/logger.js';
import type { PtySpawner } from '../../interactive/pty-process.js';
import type { Command, CommandContext, OutputStream } from '../router.js';
import { extractFlag, extractBoolFlag, colorContext, Spinner } from '../utils.js';

function printHelp(stream: OutputStream): void {
  stream.write(`
Usage: termjudge judge --entry <command> [options]

Run a program against the lines of an input file and report whether it
ended normally. The transcript is printed and written to the log directory.

Options:
  -e, --entry <command>     Command that starts the program (required)
  -i, --input <file>        Input file, relative to the workspace
      --context <text>      Free-form description recorded in the log
  -w, --workspace <dir>     Workspace directory (working directory of the run)
  -c, --config <path>       Config file path (YAML)
      --eof                 Send EOF after the last line
      --json                Output raw JSON
  -h, --help                Show this help
\n`);
}

export interface JudgeCommandDeps {
  spawner?: PtySpawner;
  logger?: SecureLogger;
}

export function createJudgeCommand(deps: JudgeCommandDeps = {}): Command {
  return {
    name: 'judge',
    description: 'Run a program against scripted input and classify the outcome',
    usage: 'termjudge judge --entry <command> [--input <file>]',

    async run(ctx: CommandContext): Promise<number> {
      let argv = ctx.argv;

      const helpResult = extractBoolFlag(argv, 'help', 'h');
      if (helpResult.value) {
        printHelp(ctx.stdout);
        return 0;
      }
      argv = helpResult.rest;

      const entryResult = extractFlag(argv, 'entry', 'e');
      argv = entryResult.rest;
      const inputResult = extractFlag(argv, 'input', 'i');
      argv = inputResult.rest;
      const contextResult = extractFlag(argv, 'context');
      argv = contextResult.rest;
      const workspaceResult = extractFlag(argv, 'workspace', 'w');
      argv = workspaceResult.rest;
      const configResult = extractFlag(argv, 'config', 'c');
      argv = configResult.rest;
      const eofResult = extractBoolFlag(argv, 'eof');
      argv = eofResult.rest;
      const jsonResult = extractBoolFlag(argv, 'json');

      const entry = entryResult.value;
      if (!entry) {
        ctx.stderr.write('Error: --entry is required\n');
        printHelp(ctx.stderr);
        return 1;
      }

      const overrides: PartialConfig = {};
      if (workspaceResult.value) overrides.sandbox = { workspaceRoot: workspaceResult.value };
      if (eofResult.value) overrides.judge = { sendEof: true };

      let engine: SessionEngine;
      try {
        engine = createSessionEngine({
          config: {
            configPath: configResult.value,
            overrides: Object.keys(overrides).length > 0 ? overrides : undefined,
          },
          logger: deps.logger ?? createNoopLogger(),
          spawner: deps.spawner,
        });
      } catch (err) {
        ctx.stderr.write(`Failed to load configuration: ${err instanceof Error ? err.message : String(err)}\n`);
        return 1;
      }

      const spinner = new Spinner(ctx.stderr);
      try {
        spinner.start(`Judging ${entry}`);
        const result = await engine.getJudgeHarness().judge(entry, inputResult.value, contextResult.value);
        spinner.stop(result.success ? 'Program ended normally' : 'Program failed', result.success);

        if (jsonResult.value) {
          ctx.stdout.write(JSON.stringify(result, null, 2) + '\n');
          return result.success ? 0 : 1;
        }

        const c = colorContext(ctx.stdout);
        if (result.log) ctx.stdout.write(result.log);
        ctx.stdout.write(`\n  Result:  ${result.success ? c.green('SUCCESS') : c.red('FAILURE')}\n`);
        if (result.exitCode !== undefined) ctx.stdout.write(`  Exit:    ${String(result.exitCode)}\n`);
        if (result.logPath) ctx.stdout.write(`  Log:     ${result.logPath}\n`);
        if (result.error) ctx.stdout.write(`  Error:   ${result.error}\n`);
        ctx.stdout.write('\n');
        return result.success ? 0 : 1;
      } finally {
        await engine.shutdown();
      }
    },
  };
}

export const judgeCommand = createJudgeCommand();
