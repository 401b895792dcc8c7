/**
 * Session Tools — start, step and kill interactive terminal sessions.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { KillResultSchema, StepResultSchema, type StepResult } from '@termjudge/shared';
import type { CoreApiClient } from '../core-client.js';
import { wrapToolHandler, textResult, errorResult, type ToolMiddleware, type ToolResult } from './tool-utils.js';

const SESSIONS_PATH = '/api/v1/interactive/sessions';

export function formatStep(result: StepResult): ToolResult {
  if (result.error) {
    return errorResult(result.output ? `${result.output}\n${result.error}` : result.error);
  }
  const state = result.finished
    ? 'process finished'
    : result.waiting
      ? 'waiting for input'
      : 'still running, call interactive_shell_step without input to read more output';
  return textResult(`${result.output}\n[session ${result.sessionId}: ${state}]`);
}

export function registerSessionTools(server: McpServer, client: CoreApiClient, middleware: ToolMiddleware): void {
  server.tool(
    'interactive_shell_start',
    'Start an interactive terminal session. Returns the initial output and the session id to use in later steps.',
    {
      cmd: z.string().max(4096).optional().describe('Command to run; the configured shell when omitted'),
      sessionId: z.string().min(1).max(128).optional().describe('Session id to use; generated when omitted'),
    },
    wrapToolHandler('interactive_shell_start', middleware, async (args: { cmd?: string; sessionId?: string }) => {
      const result = await client.post(SESSIONS_PATH, StepResultSchema, {
        cmd: args.cmd,
        sessionId: args.sessionId,
      });
      return formatStep(result);
    }),
  );

  server.tool(
    'interactive_shell_step',
    'Send one line of input to a session and return the output it produced. Omit userInput to only read pending output.',
    {
      sessionId: z.string().min(1).max(128),
      userInput: z.string().max(65_536).optional(),
    },
    wrapToolHandler('interactive_shell_step', middleware, async (args: { sessionId: string; userInput?: string }) => {
      const result = await client.post(
        `${SESSIONS_PATH}/${encodeURIComponent(args.sessionId)}/step`,
        StepResultSchema,
        { userInput: args.userInput },
      );
      return formatStep(result);
    }),
  );

  server.tool(
    'interactive_shell_kill',
    'Terminate a session and release its process.',
    {
      sessionId: z.string().min(1).max(128),
    },
    wrapToolHandler('interactive_shell_kill', middleware, async (args: { sessionId: string }) => {
      const result = await client.delete(`${SESSIONS_PATH}/${encodeURIComponent(args.sessionId)}`, KillResultSchema);
      return textResult(result.message);
    }),
  );
}
