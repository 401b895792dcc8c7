/**
 * Judge Tools — run a program against scripted input.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JudgeResultSchema, type JudgeResult } from '@termjudge/shared';
import type { CoreApiClient } from '../core-client.js';
import { wrapToolHandler, textResult, type ToolMiddleware, type ToolResult } from './tool-utils.js';

export function formatJudge(result: JudgeResult): ToolResult {
  const lines = [`Result: ${result.success ? 'SUCCESS' : 'FAILURE'}`];
  if (result.error) lines.push(`Error: ${result.error}`);
  if (result.logPath) lines.push(`Log file: ${result.logPath}`);
  if (result.log) lines.push('', 'Transcript:', result.log.trimEnd());
  return textResult(lines.join('\n'));
}

export function registerJudgeTools(server: McpServer, client: CoreApiClient, middleware: ToolMiddleware): void {
  server.tool(
    'judge',
    'Run a program, type each line of an input file into it, and report whether it ended normally. ' +
      'Returns the transcript of the run.',
    {
      entryCommand: z.string().min(1).max(4096).describe('Command that starts the program'),
      inputFile: z.string().max(4096).optional().describe('Input file, relative to the workspace'),
      context: z.string().max(65_536).optional().describe('What the run is checking; recorded in the log'),
    },
    wrapToolHandler(
      'judge',
      middleware,
      async (args: { entryCommand: string; inputFile?: string; context?: string }) => {
        const result = await client.post('/api/v1/judge', JudgeResultSchema, {
          entryCommand: args.entryCommand,
          inputFile: args.inputFile,
          context: args.context,
        });
        return formatJudge(result);
      },
    ),
  );
}
