#!/usr/bin/env node
/**
 * termjudge CLI — command router entry point.
 *
 * Usage:
 *   termjudge                          # Start the gateway with defaults
 *   termjudge start --port 18791       # Custom port
 *   termjudge session start --cmd bash # Drive a session on a running gateway
 *   termjudge judge -e "python app.py" -i input.txt
 *   termjudge health                   # Gateway health check
 */

import { createRouter } from './cli/router.js';
import { startCommand } from './cli/commands/start.js';
import { sessionCommand } from './cli/commands/session.js';
import { judgeCommand } from './cli/commands/judge.js';
import { healthCommand } from './cli/commands/health.js';

const router = createRouter('start');

router.register(startCommand);
router.register(sessionCommand);
router.register(judgeCommand);
router.register(healthCommand);

router.register({
  name: 'help',
  description: 'Show available commands',
  usage: 'termjudge help',
  async run() {
    router.printHelp(process.stdout);
    return 0;
  },
});

const { command, rest } = router.resolve(process.argv);

command
  .run({ argv: rest, stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
