/**
 * Interactive Routes — REST API for polled sessions and a WebSocket endpoint
 * for pushed output.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { WebSocket, type RawData } from 'ws';
import { z } from 'zod';
import type { SecureLogger } from '../logging/logger.js';
import { sendError, toErrorMessage } from '../utils/errors.js';
import type { InteractiveSessionManager } from './manager.js';
import { PushRelay } from './output-relay.js';
import { ProcessNotRunningError, SafetyViolationError } from './errors.js';
import type { PtyProcess } from './pty-process.js';

const StartBodySchema = z
  .object({
    cmd: z.string().max(4096).optional(),
    sessionId: z.string().min(1).max(128).optional(),
  })
  .strict();

const StepBodySchema = z
  .object({
    userInput: z.string().max(65_536).optional(),
  })
  .strict();

const StreamQuerySchema = z.object({
  cmd: z.string().max(4096).optional(),
});

/** Close codes sent to WebSocket clients. */
export const WS_CLOSE = {
  NORMAL: 1000,
  INTERNAL_ERROR: 1011,
  NOT_ALLOWED: 4403,
} as const;

/** Transport-neutral view of one WebSocket connection. */
export interface SocketChannel {
  readonly isOpen: boolean;
  send(text: string): void;
  close(code: number, reason: string): void;
  onMessage(listener: (text: string) => void): void;
  onClose(listener: () => void): void;
}

export interface PushSessionOptions {
  pollIntervalMs?: number;
  logger: SecureLogger;
  /** Lines the client sent before the process was ready, in arrival order. */
  pendingInput?: string[];
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export function wsChannel(socket: WebSocket): SocketChannel {
  return {
    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    send: (text) => socket.send(text),
    close: (code, reason) => socket.close(code, reason),
    onMessage: (listener) => {
      socket.on('message', (data: RawData) => listener(rawToString(data)));
    },
    onClose: (listener) => {
      socket.on('close', () => listener());
    },
  };
}

/**
 * Wire a caller-owned process to a socket: every text frame is typed as a
 * line, output is pushed as it arrives, and closing the socket tears the
 * process down.
 */
export function attachPushSession(
  channel: SocketChannel,
  proc: PtyProcess,
  opts: PushSessionOptions
): PushRelay {
  const logger = opts.logger.child({ component: 'PushSession', pid: proc.pid });

  const relay = new PushRelay(
    proc,
    {
      send: (chunk) => {
        if (channel.isOpen) channel.send(chunk);
      },
      end: (reason) => {
        if (reason !== 'stopped' && channel.isOpen) {
          channel.close(
            reason === 'eof' ? WS_CLOSE.NORMAL : WS_CLOSE.INTERNAL_ERROR,
            reason === 'eof' ? 'Process ended' : 'Relay failed'
          );
        }
      },
    },
    { pollIntervalMs: opts.pollIntervalMs, logger: opts.logger }
  );

  const forward = (text: string): void => {
    try {
      proc.sendLine(text);
    } catch (err) {
      if (err instanceof ProcessNotRunningError) {
        logger.debug('Input after process exit dropped');
      } else {
        logger.error('Failed to forward input', { error: toErrorMessage(err) });
      }
    }
  };
  for (const text of opts.pendingInput ?? []) forward(text);
  channel.onMessage(forward);

  channel.onClose(() => {
    relay.stop().catch((err: unknown) => {
      logger.error('Failed to stop relay', { error: toErrorMessage(err) });
    });
  });

  relay.start();
  return relay;
}

export function registerInteractiveRoutes(
  app: FastifyInstance,
  opts: { manager: InteractiveSessionManager; logger: SecureLogger; pollIntervalMs?: number }
): void {
  const { manager } = opts;
  const logger = opts.logger.child({ component: 'InteractiveRoutes' });

  // ── Polled sessions ───────────────────────────────────────────

  app.post('/api/v1/interactive/sessions', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = StartBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(reply, 400, parsed.error.errors.map((e) => e.message).join('; '));
    }
    return manager.startSession(parsed.data.cmd, parsed.data.sessionId);
  });

  app.get('/api/v1/interactive/sessions', async () => {
    return { sessions: manager.listSessions() };
  });

  app.get(
    '/api/v1/interactive/sessions/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const session = manager.getSession(request.params.id);
      if (!session) {
        return sendError(reply, 404, 'Session not found');
      }
      return session;
    }
  );

  app.post(
    '/api/v1/interactive/sessions/:id/step',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const parsed = StepBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return sendError(reply, 400, parsed.error.errors.map((e) => e.message).join('; '));
      }
      return manager.stepSession(request.params.id, parsed.data.userInput);
    }
  );

  app.delete(
    '/api/v1/interactive/sessions/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>) => {
      return manager.killSession(request.params.id);
    }
  );

  // ── Pushed output ─────────────────────────────────────────────

  app.get(
    '/ws/interactive',
    { websocket: true },
    async (socket, request) => {
      const channel = wsChannel(socket);
      socket.on('error', (error: Error) => {
        logger.error('WebSocket error', { error: error.message });
      });

      // Frames that arrive while the process is spawning are held until it is ready
      const pendingInput: string[] = [];
      const holdInput = (data: RawData): void => {
        pendingInput.push(rawToString(data));
      };
      socket.on('message', holdInput);

      const query = StreamQuerySchema.safeParse(request.query);
      const cmd = query.success ? query.data.cmd : undefined;

      let proc: PtyProcess;
      try {
        proc = await manager.openStream(cmd);
      } catch (err) {
        const notAllowed = err instanceof SafetyViolationError;
        logger.warn('Push session refused', { cmd, error: toErrorMessage(err) });
        channel.send(JSON.stringify({ error: toErrorMessage(err) }));
        channel.close(
          notAllowed ? WS_CLOSE.NOT_ALLOWED : WS_CLOSE.INTERNAL_ERROR,
          notAllowed ? 'Command not allowed' : 'Spawn failed'
        );
        return;
      }

      socket.off('message', holdInput);
      if (!channel.isOpen) {
        // Client left while the process was starting
        await proc.terminate(false);
        return;
      }

      attachPushSession(channel, proc, { pollIntervalMs: opts.pollIntervalMs, logger, pendingInput });
    }
  );
}
