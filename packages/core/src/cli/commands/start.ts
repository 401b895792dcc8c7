/**
 * Start Command — Starts the session engine and its gateway.
 */

import type { PartialConfig } from '@termjudge/shared';
import { createSessionEngine, type SessionEngine } from '../../engine.js';
import type { Command, CommandContext, OutputStream } from '../router.js';
import { extractFlag, extractBoolFlag } from '../utils.js';
import { VERSION } from '../../version.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function printBanner(stream: OutputStream, url: string, workspace: string, sandbox: boolean): void {
  stream.write(`
  termjudge v${VERSION}

  Gateway:    ${url}
  Health:     ${url}/health
  Sessions:   ${url}/api/v1/interactive/sessions
  Judge:      ${url}/api/v1/judge
  Stream:     ${url.replace(/^http/, 'ws')}/ws/interactive
  Workspace:  ${workspace}
  Sandbox:    ${sandbox ? 'on' : 'off'}
\n`);
}

function printHelp(stream: OutputStream): void {
  stream.write(`
Usage: termjudge [start] [options]

Start the gateway server.

Options:
  -p, --port <number>      Gateway port (default: 18790)
  -H, --host <string>      Gateway host (default: 127.0.0.1)
  -c, --config <path>      Config file path (YAML)
  -w, --workspace <dir>    Workspace directory
  -l, --log-level <level>  Log level: trace|debug|info|warn|error|fatal
      --no-sandbox         Disable command and path checks
  -v, --version            Show version
  -h, --help               Show this help

Environment Variables:
  TERMJUDGE_WORKSPACE_DIR       Workspace directory
  TERMJUDGE_PATH_RESTRICTION    Confine writes to report slots (true/false)
  TERMJUDGE_SANDBOX             Enable command and path checks (true/false)
  TERMJUDGE_AUTH_TOKEN          Bearer token required by the gateway
\n`);
}

/** Source of the shutdown signals; `process` outside tests. */
export type SignalSource = Pick<NodeJS.EventEmitter, 'once'>;

export interface StartCommandDeps {
  signals?: SignalSource;
}

export function createStartCommand(deps: StartCommandDeps = {}): Command {
  const signals = deps.signals ?? process;
  return {
    name: 'start',
    description: 'Start the gateway server (default)',
    usage: 'termjudge [start] [options]',

    async run(ctx: CommandContext): Promise<number> {
      let argv = ctx.argv;

      const helpResult = extractBoolFlag(argv, 'help', 'h');
      if (helpResult.value) {
        printHelp(ctx.stdout);
        return 0;
      }
      argv = helpResult.rest;

      const versionResult = extractBoolFlag(argv, 'version', 'v');
      if (versionResult.value) {
        ctx.stdout.write(`termjudge v${VERSION}\n`);
        return 0;
      }
      argv = versionResult.rest;

      const portResult = extractFlag(argv, 'port', 'p');
      argv = portResult.rest;
      const hostResult = extractFlag(argv, 'host', 'H');
      argv = hostResult.rest;
      const configResult = extractFlag(argv, 'config', 'c');
      argv = configResult.rest;
      const workspaceResult = extractFlag(argv, 'workspace', 'w');
      argv = workspaceResult.rest;
      const logLevelResult = extractFlag(argv, 'log-level', 'l');
      argv = logLevelResult.rest;
      const noSandboxResult = extractBoolFlag(argv, 'no-sandbox');

      const overrides: PartialConfig = {};
      if (portResult.value || hostResult.value) {
        const port = portResult.value ? Number(portResult.value) : undefined;
        if (port !== undefined && !Number.isInteger(port)) {
          ctx.stderr.write(`Error: invalid port '${String(portResult.value)}'\n`);
          return 1;
        }
        overrides.gateway = {
          ...(port !== undefined ? { port } : {}),
          ...(hostResult.value ? { host: hostResult.value } : {}),
        };
      }
      if (logLevelResult.value) {
        if (!isLogLevel(logLevelResult.value)) {
          ctx.stderr.write(`Error: invalid log level '${logLevelResult.value}'\n`);
          return 1;
        }
        overrides.logging = { level: logLevelResult.value };
      }
      if (workspaceResult.value || noSandboxResult.value) {
        overrides.sandbox = {
          ...(workspaceResult.value ? { workspaceRoot: workspaceResult.value } : {}),
          ...(noSandboxResult.value ? { enabled: false } : {}),
        };
      }

      let engine: SessionEngine;
      try {
        engine = createSessionEngine({
          config: {
            configPath: configResult.value,
            overrides: Object.keys(overrides).length > 0 ? overrides : undefined,
          },
        });
      } catch (error) {
        ctx.stderr.write(
          `Failed to start termjudge: ${error instanceof Error ? error.message : String(error)}\n`
        );
        return 1;
      }

      try {
        const gateway = await engine.startGateway();
        const config = engine.getConfig();
        printBanner(
          ctx.stdout,
          gateway.url() ?? `http://${config.gateway.host}:${String(config.gateway.port)}`,
          config.sandbox.workspaceRoot,
          config.sandbox.enabled
        );
      } catch (error) {
        ctx.stderr.write(
          `Failed to start termjudge: ${error instanceof Error ? error.message : String(error)}\n`
        );
        await engine.shutdown();
        return 1;
      }

      // Block until shutdown signal
      return new Promise<number>((resolve) => {
        const shutdown = async (signal: string): Promise<void> => {
          ctx.stdout.write(`\nReceived ${signal}, shutting down...\n`);
          try {
            await engine.shutdown();
            ctx.stdout.write('Shutdown complete.\n');
            resolve(0);
          } catch (err) {
            ctx.stderr.write(`Error during shutdown: ${String(err)}\n`);
            resolve(1);
          }
        };

        signals.once('SIGINT', () => void shutdown('SIGINT'));
        signals.once('SIGTERM', () => void shutdown('SIGTERM'));
      });
    },
  };
}

export const startCommand = createStartCommand();
