import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import { loadConfig } from './loader.js';

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('loads defaults when no file or env vars are set', () => {
    const config = loadConfig({ skipEnv: true, skipDiscovery: true });

    expect(config.sandbox.enabled).toBe(true);
    expect(config.sandbox.workspaceRoot).toBe('/tmp/code_agent_workspace');
    expect(config.sandbox.maxReportSlots).toBe(50);
    expect(config.sandbox.commandMatcher).toBe('substring');
    expect(config.sessions.defaultCommand).toBe('bash');
    expect(config.sessions.interpreterPrefixes).toEqual(['python']);
    expect(config.judge.primaryTimeoutMs).toBe(10_000);
    expect(config.judge.graceMs).toBe(3000);
    expect(config.judge.gracefulMarkers).toEqual(['KeyboardInterrupt']);
    expect(config.gateway.port).toBe(18790);
  });

  it('applies programmatic overrides', () => {
    const config = loadConfig({
      skipEnv: true,
      skipDiscovery: true,
      overrides: { gateway: { port: 9000 }, sessions: { maxConcurrent: 2 } },
    });

    expect(config.gateway.port).toBe(9000);
    expect(config.gateway.host).toBe('127.0.0.1');
    expect(config.sessions.maxConcurrent).toBe(2);
  });

  it('reads TERMJUDGE_* environment variables', () => {
    process.env.TERMJUDGE_WORKSPACE_DIR = '/srv/agent-ws';
    process.env.TERMJUDGE_PATH_RESTRICTION = 'false';
    process.env.TERMJUDGE_SANDBOX = '0';
    process.env.TERMJUDGE_PORT = '4000';
    process.env.TERMJUDGE_LOG_LEVEL = 'debug';
    process.env.TERMJUDGE_DEFAULT_COMMAND = 'sh';

    const config = loadConfig({ skipDiscovery: true });

    expect(config.sandbox.workspaceRoot).toBe('/srv/agent-ws');
    expect(config.sandbox.pathRestriction).toBe(false);
    expect(config.sandbox.enabled).toBe(false);
    expect(config.gateway.port).toBe(4000);
    expect(config.logging.level).toBe('debug');
    expect(config.sessions.defaultCommand).toBe('sh');
  });

  it('ignores an unparseable boolean env value', () => {
    process.env.TERMJUDGE_PATH_RESTRICTION = 'maybe';
    const config = loadConfig({ skipDiscovery: true });
    expect(config.sandbox.pathRestriction).toBe(true);
  });

  it('lets overrides win over environment variables', () => {
    process.env.TERMJUDGE_PORT = '4000';
    const config = loadConfig({ skipDiscovery: true, overrides: { gateway: { port: 5000 } } });
    expect(config.gateway.port).toBe(5000);
  });

  it('resolves relative paths against cwd', () => {
    const config = loadConfig({
      skipEnv: true,
      skipDiscovery: true,
      cwd: '/srv/project',
      overrides: { sandbox: { workspaceRoot: 'ws' }, judge: { logDir: 'logs' } },
    });

    expect(config.sandbox.workspaceRoot).toBe('/srv/project/ws');
    expect(config.judge.logDir).toBe('/srv/project/logs');
  });

  it('rejects invalid values', () => {
    expect(() =>
      loadConfig({ skipEnv: true, skipDiscovery: true, overrides: { gateway: { port: 80 } } })
    ).toThrow(/Invalid configuration/);
  });

  it('rejects a workspace path with traversal segments', () => {
    expect(() =>
      loadConfig({
        skipEnv: true,
        skipDiscovery: true,
        overrides: { sandbox: { workspaceRoot: '/tmp/../etc' } },
      })
    ).toThrow(/forbidden characters/);
  });

  describe('config files', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'termjudge-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('loads an explicit YAML file', () => {
      const path = join(dir, 'termjudge.yaml');
      writeFileSync(
        path,
        stringifyYaml({
          sandbox: { allowedCommands: ['ls', 'node'], commandMatcher: 'first-token' },
          judge: { primaryTimeoutMs: 500 },
        })
      );

      const config = loadConfig({ configPath: path, skipEnv: true });

      expect(config.sandbox.allowedCommands).toEqual(['ls', 'node']);
      expect(config.sandbox.commandMatcher).toBe('first-token');
      expect(config.judge.primaryTimeoutMs).toBe(500);
      expect(config.judge.graceMs).toBe(3000);
    });

    it('treats an empty file as all defaults', () => {
      const path = join(dir, 'empty.yaml');
      writeFileSync(path, '');
      const config = loadConfig({ configPath: path, skipEnv: true });
      expect(config.sessions.maxConcurrent).toBe(16);
    });

    it('throws for a missing explicit file', () => {
      expect(() => loadConfig({ configPath: join(dir, 'missing.yaml'), skipEnv: true })).toThrow(
        /Config file not found/
      );
    });

    it('throws for a schema violation in the file', () => {
      const path = join(dir, 'bad.yaml');
      writeFileSync(path, stringifyYaml({ sessions: { maxConcurrent: -1 } }));
      expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(/Invalid configuration in/);
    });
  });
});
