/**
 * Gateway Server for termjudge
 *
 * REST endpoints for polled sessions and judge runs, plus a WebSocket
 * endpoint for pushed session output.
 *
 * Security considerations:
 * - Binds to loopback by default
 * - Optional bearer token, compared in constant time
 * - Request bodies are size-limited and validated per route
 */

import type { AddressInfo } from 'node:net';
import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import fastifyWebsocket from '@fastify/websocket';
import type { GatewayConfig } from '@termjudge/shared';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { secureCompare } from '../utils/crypto.js';
import { sendError, toErrorMessage } from '../utils/errors.js';
import type { InteractiveSessionManager } from '../interactive/manager.js';
import type { JudgeHarness } from '../judge/harness.js';
import { registerInteractiveRoutes } from '../interactive/interactive-routes.js';
import { registerJudgeRoutes } from '../judge/judge-routes.js';
import { VERSION } from '../version.js';

/** Paths reachable without a token. */
const PUBLIC_PATHS = new Set(['/health']);

export interface GatewayState {
  healthy: boolean;
  startedAt?: number;
}

export interface GatewayServerOptions {
  config: GatewayConfig;
  manager: InteractiveSessionManager;
  harness: JudgeHarness;
  logger?: SecureLogger;
  /** Poll interval of push relays. */
  pollIntervalMs?: number;
  getState?: () => GatewayState;
}

export class GatewayServer {
  private readonly config: GatewayConfig;
  private readonly options: GatewayServerOptions;
  private readonly app: FastifyInstance;
  private readonly logger: SecureLogger;
  private initPromise: Promise<void> | null = null;

  constructor(options: GatewayServerOptions) {
    this.config = options.config;
    this.options = options;
    this.logger = (options.logger ?? createNoopLogger()).child({ component: 'Gateway' });

    this.app = Fastify({
      logger: false,
      trustProxy: false,
      bodyLimit: this.config.bodyLimit,
    });
  }

  /** Register plugins and routes once. Returns the app for in-process requests. */
  async ready(): Promise<FastifyInstance> {
    this.initPromise ??= this.init();
    await this.initPromise;
    return this.app;
  }

  private async init(): Promise<void> {
    await this.setupMiddleware();
    this.setupRoutes();
  }

  private async setupMiddleware(): Promise<void> {
    await this.app.register(fastifyCompress);

    await this.app.register(fastifyWebsocket, {
      options: {
        maxPayload: this.config.bodyLimit,
      },
    });

    this.app.addHook('onRequest', async (_request, reply) => {
      reply.header('X-Content-Type-Options', 'nosniff');
      reply.header('X-Frame-Options', 'DENY');
      reply.header('Referrer-Policy', 'no-referrer');
    });

    const token = this.config.authToken;
    if (token) {
      this.app.addHook('onRequest', async (request, reply) => {
        if (PUBLIC_PATHS.has(request.url.split('?')[0] ?? '')) return;
        const header = request.headers.authorization ?? '';
        const presented = header.startsWith('Bearer ') ? header.slice('Bearer '.length) : '';
        if (!presented || !secureCompare(presented, token)) {
          this.logger.warn('Rejected request without a valid token', {
            method: request.method,
            url: request.url,
          });
          return sendError(reply, 401, 'Missing or invalid bearer token');
        }
      });
    }

    this.app.addHook('onResponse', async (request, reply) => {
      this.logger.debug('Request completed', {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      });
    });

    this.app.setErrorHandler((error, request, reply) => {
      const statusCode = error.statusCode ?? 500;
      if (statusCode >= 500) {
        this.logger.error('Request failed', { url: request.url, error: toErrorMessage(error) });
        return sendError(reply, statusCode, 'Internal server error');
      }
      return sendError(reply, statusCode, error.message);
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', async () => {
      const state = this.options.getState?.() ?? { healthy: true };
      return {
        status: state.healthy ? 'ok' : 'error',
        version: VERSION,
        uptime: state.startedAt ? Date.now() - state.startedAt : 0,
        sessions: this.options.manager.listSessions().length,
      };
    });

    registerInteractiveRoutes(this.app, {
      manager: this.options.manager,
      logger: this.logger,
      pollIntervalMs: this.options.pollIntervalMs,
    });
    registerJudgeRoutes(this.app, { harness: this.options.harness, logger: this.logger });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    await this.ready();

    const { host, port } = this.config;
    try {
      await this.app.listen({ host, port });
      this.logger.info('Gateway server started', { host, port, url: this.url() });
    } catch (error) {
      this.logger.error('Failed to start gateway server', { error: toErrorMessage(error) });
      throw error;
    }
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    await this.app.close();
    this.logger.info('Gateway server stopped');
  }

  /** Base URL once listening, with the port actually bound. */
  url(): string | null {
    const address: AddressInfo | string | null = this.app.server.address();
    if (!address || typeof address === 'string') return null;
    return `http://${this.config.host}:${address.port}`;
  }
}

export function createGatewayServer(options: GatewayServerOptions): GatewayServer {
  return new GatewayServer(options);
}
