/**
 * Health Command — Check the health of a running gateway.
 */

import { HealthStatusSchema } from '@termjudge/shared';
import type { Command, CommandContext } from '../router.js';
import {
  DEFAULT_GATEWAY_URL,
  extractFlag,
  extractBoolFlag,
  formatUptime,
  apiCall,
  colorContext,
  expectBody,
} from '../utils.js';

export const healthCommand: Command = {
  name: 'health',
  description: 'Check health of a running gateway',
  usage: 'termjudge health [--url URL] [--json]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(`
Usage: ${this.usage}

Options:
      --url <url>    Gateway URL (default: ${DEFAULT_GATEWAY_URL})
      --json         Output raw JSON
  -h, --help         Show this help
\n`);
      return 0;
    }
    argv = helpResult.rest;

    const urlResult = extractFlag(argv, 'url');
    argv = urlResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');

    const baseUrl = urlResult.value ?? DEFAULT_GATEWAY_URL;

    try {
      const result = await apiCall(baseUrl, '/health');

      if (!result.ok) {
        ctx.stderr.write(`Health check failed (HTTP ${String(result.status)})\n`);
        return 1;
      }

      const health = expectBody(result, HealthStatusSchema);

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(health, null, 2) + '\n');
        return health.status === 'ok' ? 0 : 1;
      }

      const c = colorContext(ctx.stdout);
      const statusLabel = health.status === 'ok' ? c.green('OK') : c.red('ERROR');
      ctx.stdout.write(`\n  Status:    ${statusLabel}\n`);
      ctx.stdout.write(`  Version:   ${health.version}\n`);
      ctx.stdout.write(`  Uptime:    ${formatUptime(health.uptime)}\n`);
      ctx.stdout.write(`  Sessions:  ${String(health.sessions)}\n`);
      ctx.stdout.write(`  Gateway:   ${baseUrl}\n\n`);

      return health.status === 'ok' ? 0 : 1;
    } catch (err) {
      ctx.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
  },
};
