/**
 * Logger for termjudge
 *
 * - Structured JSON (or pino-pretty) output
 * - Secret-looking values redacted before they reach a transport
 * - Child loggers carry a component/session context
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LoggingConfig } from '@termjudge/shared';
import { sanitizeForLogging } from '../utils/crypto.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component?: string;
  sessionId?: string;
  runId?: string;
  [key: string]: unknown;
}

export interface SecureLogger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): SecureLogger;
  level: LogLevel;
}

function createPinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        name: 'termjudge',
      }),
    },
    redact: {
      paths: ['token', 'authToken', 'authorization', '*.token', '*.authToken', 'headers.authorization'],
      censor: '[REDACTED]',
    },
  };
}

/**
 * JSON stdout needs no transport: pino(options) writes to fd 1 directly and
 * avoids the worker thread a transport spawns.
 */
function createTransport(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];

  for (const output of config.output) {
    if (output.type === 'stdout') {
      if (output.format === 'pretty') {
        targets.push({
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            // stdout belongs to the MCP stdio transport and the CLI
            destination: 2,
          },
          level: config.level,
        });
      }
    } else {
      targets.push({
        target: 'pino/file',
        options: { destination: output.path, mkdir: true },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) return undefined;
  if (targets.length === 1) return targets[0];
  return { targets };
}

function isLogLevel(value: string): value is LogLevel {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal'].includes(value);
}

class SecureLoggerImpl implements SecureLogger {
  private readonly pino: PinoLogger;
  private readonly defaultContext: LogContext;

  constructor(pino: PinoLogger, defaultContext: LogContext = {}) {
    this.pino = pino;
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    return isLogLevel(this.pino.level) ? this.pino.level : 'info';
  }

  private sanitizeContext(context?: LogContext): Record<string, unknown> {
    return sanitizeForLogging({ ...this.defaultContext, ...context });
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.sanitizeContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.sanitizeContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.sanitizeContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.sanitizeContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.sanitizeContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.sanitizeContext(context), msg);
  }

  child(context: LogContext): SecureLogger {
    return new SecureLoggerImpl(this.pino, { ...this.defaultContext, ...context });
  }
}

export function createLogger(config: LoggingConfig): SecureLogger {
  const options = createPinoOptions(config);
  const transport = createTransport(config);
  const pinoLogger = transport ? pino(options, pino.transport(transport)) : pino(options);
  return new SecureLoggerImpl(pinoLogger);
}

let globalLogger: SecureLogger | null = null;

export function initializeLogger(config: LoggingConfig): SecureLogger {
  globalLogger = createLogger(config);
  return globalLogger;
}

/**
 * Get the global logger instance, falling back to a no-op logger before
 * initializeLogger() has run.
 */
export function getLogger(): SecureLogger {
  return globalLogger ?? createNoopLogger();
}

export function createNoopLogger(): SecureLogger {
  const noop: SecureLogger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
