/**
 * SessionEngine - Main Entry Point
 *
 * Builds the policies, session registry and judge harness from one
 * configuration and owns their lifetime.
 *
 * Security considerations:
 * - Policies are built before anything can spawn
 * - Shutdown terminates every live process
 */

import type { Config } from '@termjudge/shared';
import { loadConfig, type LoadConfigOptions } from './config/loader.js';
import { initializeLogger, type SecureLogger } from './logging/logger.js';
import { createCommandPolicy, type CommandPolicy } from './security/command-policy.js';
import { PathPolicy } from './security/path-policy.js';
import { SessionRegistry } from './interactive/registry.js';
import { InteractiveSessionManager } from './interactive/manager.js';
import type { PtySpawner } from './interactive/pty-process.js';
import { JudgeHarness } from './judge/harness.js';
import { GatewayServer, createGatewayServer } from './gateway/server.js';
import { toErrorMessage } from './utils/errors.js';

export interface SessionEngineOptions {
  /** Configuration options */
  config?: LoadConfigOptions;
  /** Logger to use instead of one built from `config.logging` */
  logger?: SecureLogger;
  /** Terminal backend; node-pty when omitted */
  spawner?: PtySpawner;
}

export interface SessionEngineState {
  initialized: boolean;
  healthy: boolean;
  startedAt?: number;
  activeSessions: number;
}

interface Components {
  config: Config;
  logger: SecureLogger;
  commandPolicy: CommandPolicy;
  pathPolicy: PathPolicy;
  registry: SessionRegistry;
  manager: InteractiveSessionManager;
  harness: JudgeHarness;
}

export class SessionEngine {
  private components: Components | null = null;
  private gateway: GatewayServer | null = null;
  private startedAt: number | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(private readonly options: SessionEngineOptions = {}) {}

  /**
   * Load configuration and build every component.
   * Must be called before any other operations.
   */
  initialize(): void {
    if (this.components) {
      throw new Error('SessionEngine is already initialized');
    }

    const config = loadConfig(this.options.config);
    const logger = this.options.logger ?? initializeLogger(config.logging);
    logger.info('Session engine initializing', {
      sandbox: config.sandbox.enabled,
      workspaceRoot: config.sandbox.workspaceRoot,
      commandMatcher: config.sandbox.commandMatcher,
    });

    const commandPolicy = createCommandPolicy(config.sandbox, logger);
    const pathPolicy = new PathPolicy(config.sandbox, logger);
    const registry = new SessionRegistry(config, {
      logger,
      commandPolicy,
      spawner: this.options.spawner,
    });
    const manager = new InteractiveSessionManager(registry, logger);
    const harness = new JudgeHarness(
      {
        judge: config.judge,
        workspaceRoot: config.sandbox.workspaceRoot,
        cols: config.sessions.cols,
        rows: config.sessions.rows,
      },
      { logger, pathPolicy, spawner: this.options.spawner }
    );

    registry.startSweeper();
    this.components = { config, logger, commandPolicy, pathPolicy, registry, manager, harness };
    this.startedAt = Date.now();
    this.shutdownPromise = null;
    logger.info('Session engine initialized');
  }

  isInitialized(): boolean {
    return this.components !== null;
  }

  getState(): SessionEngineState {
    return {
      initialized: this.components !== null,
      healthy: this.components !== null,
      startedAt: this.startedAt ?? undefined,
      activeSessions: this.components?.registry.size ?? 0,
    };
  }

  getConfig(): Config {
    return this.ensureInitialized().config;
  }

  getLogger(): SecureLogger {
    return this.ensureInitialized().logger;
  }

  getCommandPolicy(): CommandPolicy {
    return this.ensureInitialized().commandPolicy;
  }

  getPathPolicy(): PathPolicy {
    return this.ensureInitialized().pathPolicy;
  }

  getSessionManager(): InteractiveSessionManager {
    return this.ensureInitialized().manager;
  }

  getJudgeHarness(): JudgeHarness {
    return this.ensureInitialized().harness;
  }

  getGateway(): GatewayServer | null {
    return this.gateway;
  }

  /**
   * Start the gateway server
   */
  async startGateway(): Promise<GatewayServer> {
    const { config, logger, manager, harness } = this.ensureInitialized();
    if (this.gateway) {
      throw new Error('Gateway is already running');
    }

    const gateway = createGatewayServer({
      config: config.gateway,
      manager,
      harness,
      logger,
      pollIntervalMs: config.sessions.pollIntervalMs,
      getState: () => this.getState(),
    });
    await gateway.start();
    this.gateway = gateway;
    return gateway;
  }

  async stopGateway(): Promise<void> {
    if (!this.gateway) return;
    await this.gateway.stop();
    this.gateway = null;
  }

  /**
   * Graceful shutdown
   */
  async shutdown(): Promise<void> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    const components = this.components;
    if (!components) return;

    const { logger, registry } = components;
    logger.info('Session engine shutting down', {
      uptime: this.startedAt ? Date.now() - this.startedAt : 0,
      activeSessions: registry.size,
    });

    try {
      await this.stopGateway();
      await registry.shutdown();
      logger.info('Session engine shutdown complete');
    } catch (error) {
      logger.error('Error during shutdown', { error: toErrorMessage(error) });
    } finally {
      this.components = null;
      this.startedAt = null;
    }
  }

  private ensureInitialized(): Components {
    if (!this.components) {
      throw new Error('SessionEngine is not initialized. Call initialize() first.');
    }
    return this.components;
  }
}

/**
 * Create and initialize a SessionEngine instance
 */
export function createSessionEngine(options?: SessionEngineOptions): SessionEngine {
  const engine = new SessionEngine(options);
  engine.initialize();
  return engine;
}
