/**
 * Session Command — drive interactive sessions on a running gateway.
 */

import {
  KillResultSchema,
  SessionListSchema,
  StepResultSchema,
  type StepResult,
} from '@termjudge/shared';
import type { Command, CommandContext, OutputStream } from '../router.js';
import {
  DEFAULT_GATEWAY_URL,
  extractFlag,
  extractBoolFlag,
  apiCall,
  colorContext,
  expectBody,
  formatTable,
} from '../utils.js';

function printHelp(stream: OutputStream): void {
  stream.write(`
Usage:
  termjudge session start [--cmd <command>] [--id <session-id>]
  termjudge session step <session-id> [--input <text>]
  termjudge session kill <session-id>
  termjudge session list

Options:
      --url <url>      Gateway URL (default: ${DEFAULT_GATEWAY_URL})
      --token <token>  Bearer token (default: $TERMJUDGE_AUTH_TOKEN)
      --json           Output raw JSON
  -h, --help           Show this help
\n`);
}

function printStep(ctx: CommandContext, result: StepResult): number {
  const c = colorContext(ctx.stdout);
  if (result.output) {
    ctx.stdout.write(result.output.endsWith('\n') ? result.output : `${result.output}\n`);
  }
  if (result.error) {
    ctx.stderr.write(`${c.red('Error:')} ${result.error}\n`);
    return 1;
  }
  const state = result.finished ? 'finished' : result.waiting ? 'waiting for input' : 'running';
  ctx.stdout.write(c.dim(`[session ${result.sessionId}: ${state}]`) + '\n');
  return 0;
}

export const sessionCommand: Command = {
  name: 'session',
  aliases: ['sess'],
  description: 'Start, step, kill or list interactive sessions',
  usage: 'termjudge session <start|step|kill|list> [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      printHelp(ctx.stdout);
      return 0;
    }
    argv = helpResult.rest;

    const urlResult = extractFlag(argv, 'url');
    argv = urlResult.rest;
    const tokenResult = extractFlag(argv, 'token');
    argv = tokenResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');
    argv = jsonResult.rest;
    const cmdResult = extractFlag(argv, 'cmd');
    argv = cmdResult.rest;
    const idResult = extractFlag(argv, 'id');
    argv = idResult.rest;
    const inputResult = extractFlag(argv, 'input');
    argv = inputResult.rest;

    const baseUrl = urlResult.value ?? DEFAULT_GATEWAY_URL;
    const token = tokenResult.value ?? process.env.TERMJUDGE_AUTH_TOKEN;
    const [action, sessionId] = argv;

    const emitJson = (value: unknown): void => {
      ctx.stdout.write(JSON.stringify(value, null, 2) + '\n');
    };

    try {
      switch (action) {
        case 'start': {
          const body: { cmd?: string; sessionId?: string } = {};
          if (cmdResult.value) body.cmd = cmdResult.value;
          if (idResult.value) body.sessionId = idResult.value;
          const result = expectBody(
            await apiCall(baseUrl, '/api/v1/interactive/sessions', { method: 'POST', body, token }),
            StepResultSchema
          );
          if (jsonResult.value) {
            emitJson(result);
            return result.error ? 1 : 0;
          }
          return printStep(ctx, result);
        }

        case 'step': {
          if (!sessionId) {
            ctx.stderr.write('Usage: termjudge session step <session-id> [--input <text>]\n');
            return 1;
          }
          const body = inputResult.value !== undefined ? { userInput: inputResult.value } : {};
          const result = expectBody(
            await apiCall(baseUrl, `/api/v1/interactive/sessions/${encodeURIComponent(sessionId)}/step`, {
              method: 'POST',
              body,
              token,
            }),
            StepResultSchema
          );
          if (jsonResult.value) {
            emitJson(result);
            return result.error ? 1 : 0;
          }
          return printStep(ctx, result);
        }

        case 'kill': {
          if (!sessionId) {
            ctx.stderr.write('Usage: termjudge session kill <session-id>\n');
            return 1;
          }
          const result = expectBody(
            await apiCall(baseUrl, `/api/v1/interactive/sessions/${encodeURIComponent(sessionId)}`, {
              method: 'DELETE',
              token,
            }),
            KillResultSchema
          );
          if (jsonResult.value) emitJson(result);
          else ctx.stdout.write(`${result.message}\n`);
          return 0;
        }

        case 'list': {
          const { sessions } = expectBody(
            await apiCall(baseUrl, '/api/v1/interactive/sessions', { token }),
            SessionListSchema
          );
          if (jsonResult.value) {
            emitJson(sessions);
            return 0;
          }
          ctx.stdout.write(
            formatTable(
              sessions.map((s) => ({
                id: s.id,
                command: s.command,
                pid: String(s.pid),
                mode: s.interpreterMode ? 'interpreter' : 'shell',
                idle: `${String(Math.round((Date.now() - s.lastActivity) / 1000))}s`,
              }))
            ) + '\n'
          );
          return 0;
        }

        default:
          ctx.stderr.write(`Unknown session action: ${action ?? '(none)'}\n`);
          printHelp(ctx.stderr);
          return 1;
      }
    } catch (err) {
      ctx.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
  },
};
