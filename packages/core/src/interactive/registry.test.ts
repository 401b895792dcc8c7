import { describe, it, expect, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import type { CommandMatcher, SessionConfig } from '@termjudge/shared';
import { SessionRegistry, type SessionRegistryConfig } from './registry.js';
import { createCommandPolicy } from '../security/command-policy.js';
import {
  SafetyViolationError,
  SessionExistsError,
  SessionLimitError,
  SessionNotFoundError,
} from './errors.js';
import {
  fakeSpawner,
  catProgram,
  hangingProgram,
  replProgram,
  shellProgram,
  makeMockLogger,
  type FakeProgram,
} from './test-helpers.js';

const SESSIONS: SessionConfig = {
  defaultCommand: 'bash',
  maxConcurrent: 4,
  idleTimeoutMs: 60_000,
  spawnTimeoutMs: 60_000,
  quiescenceMs: 40,
  pollIntervalMs: 10,
  maxDrainMs: 2000,
  cols: 120,
  rows: 40,
  interpreterPrefixes: ['python'],
  exitCommands: ['exit'],
  terminateGraceMs: 50,
};

const ALLOWED = ['ls', 'cat', 'python', 'bash', 'echo', 'print'];

let registry: SessionRegistry | null = null;

function buildRegistry(
  programFor: (file: string) => FakeProgram,
  overrides: { sessions?: Partial<SessionConfig>; sandboxEnabled?: boolean; commandMatcher?: CommandMatcher } = {}
) {
  const { spawner, spawned } = fakeSpawner((file) => programFor(file));
  const config: SessionRegistryConfig = {
    sandbox: { enabled: overrides.sandboxEnabled ?? true },
    sessions: { ...SESSIONS, ...overrides.sessions },
  };
  const reg = new SessionRegistry(config, {
    logger: makeMockLogger(),
    commandPolicy: createCommandPolicy({
      allowedCommands: ALLOWED,
      commandMatcher: overrides.commandMatcher ?? 'substring',
    }),
    spawner,
    cwd: tmpdir(),
  });
  registry = reg;
  return { registry: reg, spawned };
}

function programByName(file: string): FakeProgram {
  if (file === 'python') return replProgram();
  if (file === 'bash') return shellProgram();
  if (file === 'cat') return catProgram();
  return hangingProgram();
}

afterEach(async () => {
  await registry?.shutdown();
  registry = null;
});

describe('SessionRegistry', () => {
  describe('start', () => {
    it('spawns the default command and drains the banner', async () => {
      const { registry, spawned } = buildRegistry(programByName);
      const result = await registry.start(undefined, 'sess-1');

      expect(spawned[0]?.file).toBe('bash');
      expect(result).toEqual({ sessionId: 'sess-1', output: '$ ', waiting: true, finished: false });
      expect(registry.get('sess-1')?.command).toBe('bash');
      expect(registry.get('sess-1')?.interpreterMode).toBe(false);
    });

    it('generates an id when none is given', async () => {
      const { registry } = buildRegistry(programByName);
      const result = await registry.start('cat');
      expect(result.sessionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(registry.list().map((s) => s.id)).toEqual([result.sessionId]);
    });

    it('rejects a live session id', async () => {
      const { registry } = buildRegistry(programByName);
      await registry.start('cat', 'dup');
      await expect(registry.start('cat', 'dup')).rejects.toBeInstanceOf(SessionExistsError);
    });

    it('rejects a disallowed command before spawning', async () => {
      const { registry, spawned } = buildRegistry(programByName);
      await expect(registry.start('rm -rf /', 's')).rejects.toBeInstanceOf(SafetyViolationError);
      expect(spawned).toHaveLength(0);
      expect(registry.size).toBe(0);
    });

    it('names the rule of the configured policy in the violation', async () => {
      const { registry } = buildRegistry(programByName, { commandMatcher: 'first-token' });
      await expect(registry.start('rm -rf / && ls', 's')).rejects.toThrow(
        "Command 'rm -rf / && ls' is not allowed by the first-token policy: first word of the command must be one of: ls, cat, python, bash, echo, print"
      );
    });

    it('skips the command check with the sandbox disabled', async () => {
      const { registry, spawned } = buildRegistry(programByName, { sandboxEnabled: false });
      await registry.start('vim notes.txt', 's');
      expect(spawned[0]?.file).toBe('vim');
    });

    it('enforces the concurrent session limit', async () => {
      const { registry } = buildRegistry(programByName, { sessions: { maxConcurrent: 1 } });
      await registry.start('cat', 'a');
      await expect(registry.start('cat', 'b')).rejects.toBeInstanceOf(SessionLimitError);
    });

    it('removes a session whose program exits at once', async () => {
      const { registry } = buildRegistry(() => ({ banner: 'a.txt\r\n', exitOnStart: 0 }));
      const result = await registry.start('ls', 'quick');
      expect(result).toEqual({ sessionId: 'quick', output: 'a.txt\r\n', waiting: false, finished: true });
      expect(registry.get('quick')).toBeUndefined();
    });
  });

  describe('step', () => {
    it('runs an interpreter session to completion', async () => {
      const { registry } = buildRegistry(programByName);
      await registry.start('python', 'py');

      const assign = await registry.step('py', 'x = 10');
      expect(assign).toEqual({ sessionId: 'py', output: 'x = 10\r\n>>> ', waiting: true, finished: false });

      const print = await registry.step('py', 'print(x * 2)');
      expect(print.output).toContain('20');
      expect(print.finished).toBe(false);

      const exit = await registry.step('py', 'exit()');
      expect(exit).toEqual({ sessionId: 'py', output: 'exit()\r\n', waiting: false, finished: true });
      expect(registry.get('py')).toBeUndefined();
    });

    it('reassembles the full output stream across steps', async () => {
      const { registry } = buildRegistry(programByName);
      const parts = [(await registry.start('cat', 'c')).output];
      for (const line of ['alpha', 'beta', 'gamma']) {
        parts.push((await registry.step('c', line)).output);
      }
      expect(parts.join('')).toBe('alpha\r\nalpha\r\nbeta\r\nbeta\r\ngamma\r\ngamma\r\n');
    });

    it('queues concurrent steps on one session', async () => {
      const { registry } = buildRegistry(programByName);
      await registry.start('cat', 'c');
      const [first, second] = await Promise.all([registry.step('c', 'one'), registry.step('c', 'two')]);
      expect(first.output).toBe('one\r\none\r\n');
      expect(second.output).toBe('two\r\ntwo\r\n');
    });

    it('drains without sending when input is absent', async () => {
      const { registry, spawned } = buildRegistry(programByName);
      await registry.start('cat', 'c');
      const result = await registry.step('c');
      expect(result.output).toBe('');
      expect(result.waiting).toBe(true);
      expect(spawned[0]?.written).toEqual([]);
    });

    it('throws SessionNotFoundError for an unknown id', async () => {
      const { registry } = buildRegistry(programByName);
      await expect(registry.step('nope', 'ls')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('checks input against the policy only inside an interpreter', async () => {
      const { registry, spawned } = buildRegistry(programByName);
      await registry.start('bash', 'sh');

      // Shell mode: arbitrary input is sent
      const plain = await registry.step('sh', 'touch x');
      expect(plain.output).toBe('touch x\r\n$ ');

      await registry.step('sh', 'python');
      expect(registry.get('sh')?.interpreterMode).toBe(true);

      const written = spawned[0]?.written.length;
      await expect(registry.step('sh', 'import os')).rejects.toThrow(
        "Command 'import os' is not allowed by the substring policy: command must contain one of: ls, cat, python, bash, echo, print"
      );
      expect(spawned[0]?.written.length).toBe(written);
      expect(registry.get('sh')).toBeDefined();

      const allowed = await registry.step('sh', 'print(1 * 1)');
      expect(allowed.output).toContain('print(1 * 1)');
    });

    it('leaves interpreter mode on an exit command', async () => {
      const { registry } = buildRegistry(programByName);
      await registry.start('bash', 'sh');
      await registry.step('sh', 'python3');
      expect(registry.get('sh')?.interpreterMode).toBe(true);
      await registry.step('sh', 'exit');
      expect(registry.get('sh')?.interpreterMode).toBe(false);
    });

    it('reports finished when the program exited between steps', async () => {
      const { registry, spawned } = buildRegistry(programByName);
      await registry.start('cat', 'c');
      spawned[0]?.exit(0);
      await new Promise((r) => setTimeout(r, 10));
      const result = await registry.step('c', 'late');
      expect(result).toEqual({ sessionId: 'c', output: '', waiting: false, finished: true });
      expect(spawned[0]?.written).toEqual([]);
    });
  });

  describe('kill', () => {
    it('terminates and removes a live session', async () => {
      const { registry, spawned } = buildRegistry(programByName);
      await registry.start('cat', 'c');
      expect(await registry.kill('c')).toBe(true);
      expect(spawned[0]?.signals).toEqual(['SIGKILL']);
      expect(registry.get('c')).toBeUndefined();
    });

    it('is idempotent for unknown and finished ids', async () => {
      const { registry } = buildRegistry(programByName);
      expect(await registry.kill('never-existed')).toBe(false);
      await registry.start('python', 'py');
      await registry.step('py', 'exit()');
      expect(await registry.kill('py')).toBe(false);
      expect(await registry.kill('py')).toBe(false);
    });

    it('fails steps still waiting for the lock', async () => {
      const { registry } = buildRegistry(programByName);
      await registry.start('cat', 'c');
      const settled = Promise.allSettled([registry.step('c', 'one'), registry.step('c', 'two')]);
      await registry.kill('c');
      const results = await settled;
      for (const result of results) {
        expect(result.status).toBe('rejected');
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(SessionNotFoundError);
        }
      }
    });
  });

  describe('idle expiry', () => {
    it('kills sessions idle past the timeout', async () => {
      const { registry } = buildRegistry(programByName, { sessions: { idleTimeoutMs: 1000 } });
      await registry.start('cat', 'old');
      const lastActivity = registry.get('old')?.lastActivity ?? 0;

      expect(await registry.expireIdleSessions(lastActivity + 500)).toEqual([]);
      expect(await registry.expireIdleSessions(lastActivity + 1001)).toEqual(['old']);
      expect(registry.size).toBe(0);
    });

    it('stops idle programs with SIGTERM before SIGKILL', async () => {
      const { registry, spawned } = buildRegistry(() => hangingProgram({ ignoreInterrupt: true }), {
        sandboxEnabled: false,
        sessions: { idleTimeoutMs: 1000 },
      });
      await registry.start('stubborn', 'old');
      const lastActivity = registry.get('old')?.lastActivity ?? 0;

      expect(await registry.expireIdleSessions(lastActivity + 1001)).toEqual(['old']);
      expect(spawned[0]?.signals).toEqual(['SIGTERM', 'SIGKILL']);
      expect(spawned[0]?.hasExited).toBe(true);
    });

    it('does nothing when the idle timeout is zero', async () => {
      const { registry } = buildRegistry(programByName, { sessions: { idleTimeoutMs: 0 } });
      await registry.start('cat', 'c');
      expect(await registry.expireIdleSessions(Date.now() + 10_000_000)).toEqual([]);
    });
  });

  describe('shutdown', () => {
    it('terminates every session', async () => {
      const { registry, spawned } = buildRegistry(programByName);
      await registry.start('cat', 'a');
      await registry.start('bash', 'b');
      await registry.shutdown();
      expect(registry.size).toBe(0);
      expect(spawned.every((p) => p.hasExited)).toBe(true);
      expect(spawned.map((p) => p.signals)).toEqual([['SIGTERM'], ['SIGTERM']]);
    });

    it('escalates to SIGKILL for programs that ignore SIGTERM', async () => {
      const { registry, spawned } = buildRegistry(() => hangingProgram({ ignoreInterrupt: true }), {
        sandboxEnabled: false,
      });
      await registry.start('stubborn', 'a');
      await registry.start('stubborn', 'b');
      await registry.shutdown();
      expect(spawned.map((p) => p.signals)).toEqual([
        ['SIGTERM', 'SIGKILL'],
        ['SIGTERM', 'SIGKILL'],
      ]);
      expect(spawned.every((p) => p.hasExited)).toBe(true);
    });
  });
});

describe('SessionRegistry.openStream', () => {
  it('spawns a process the registry does not track', async () => {
    const { registry, spawned } = buildRegistry(programByName);
    const proc = await registry.openStream('cat');
    expect(spawned[0]?.file).toBe('cat');
    expect(registry.size).toBe(0);
    await proc.terminate(true);
  });

  it('applies the command policy', async () => {
    const { registry, spawned } = buildRegistry(programByName);
    await expect(registry.openStream('rm -rf /')).rejects.toBeInstanceOf(SafetyViolationError);
    expect(spawned).toHaveLength(0);
  });
});
