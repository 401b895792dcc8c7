/**
 * Configuration loader.
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from '@termjudge/shared';

// Default config file locations (checked in order)
const DEFAULT_CONFIG_PATHS = [
  './termjudge.yaml',
  './termjudge.yml',
  '~/.termjudge/config.yaml',
];

type ConfigTree = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

function loadConfigFile(path: string): PartialConfig | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to load config from ${expandedPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  // An empty file parses to null
  const result = PartialConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }
  return result.data;
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Collect settings from TERMJUDGE_* variables. Values are left raw and
 * validated together with everything else by ConfigSchema.
 */
function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const config: ConfigTree = {};

  const sandbox: ConfigTree = {};
  if (env.TERMJUDGE_WORKSPACE_DIR) {
    sandbox.workspaceRoot = env.TERMJUDGE_WORKSPACE_DIR;
  }
  const pathRestriction = parseBoolEnv(env.TERMJUDGE_PATH_RESTRICTION);
  if (pathRestriction !== undefined) {
    sandbox.pathRestriction = pathRestriction;
  }
  const sandboxEnabled = parseBoolEnv(env.TERMJUDGE_SANDBOX);
  if (sandboxEnabled !== undefined) {
    sandbox.enabled = sandboxEnabled;
  }
  if (Object.keys(sandbox).length > 0) {
    config.sandbox = sandbox;
  }

  if (env.TERMJUDGE_DEFAULT_COMMAND) {
    config.sessions = { defaultCommand: env.TERMJUDGE_DEFAULT_COMMAND };
  }

  if (env.TERMJUDGE_LOG_LEVEL) {
    config.logging = { level: env.TERMJUDGE_LOG_LEVEL };
  }

  const gateway: ConfigTree = {};
  if (env.TERMJUDGE_HOST) {
    gateway.host = env.TERMJUDGE_HOST;
  }
  if (env.TERMJUDGE_PORT) {
    const port = parseInt(env.TERMJUDGE_PORT, 10);
    if (!isNaN(port)) {
      gateway.port = port;
    }
  }
  if (env.TERMJUDGE_AUTH_TOKEN) {
    gateway.authToken = env.TERMJUDGE_AUTH_TOKEN;
  }
  if (Object.keys(gateway).length > 0) {
    config.gateway = gateway;
  }

  return config;
}

/**
 * Deep merge two config trees. Arrays are replaced, not concatenated.
 */
function mergeConfigs(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] = isPlainObject(value) && isPlainObject(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Skip config file auto-discovery (an explicit configPath is still read) */
  skipDiscovery?: boolean;
  /** Base for relative paths; defaults to process.cwd() */
  cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: ConfigTree = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else if (!options.skipDiscovery) {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig();

  let merged = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return absolutizePaths(result.data, options.cwd ?? process.cwd());
}

function absolutizePaths(config: Config, cwd: string): Config {
  const toAbsolute = (p: string) => (isAbsolute(p) ? p : resolve(cwd, p));
  return {
    ...config,
    sandbox: {
      ...config.sandbox,
      workspaceRoot: toAbsolute(config.sandbox.workspaceRoot),
      scratchRoot: toAbsolute(config.sandbox.scratchRoot),
    },
    judge: { ...config.judge, logDir: toAbsolute(config.judge.logDir) },
  };
}
