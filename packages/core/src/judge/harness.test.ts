import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { JudgeConfig } from '@termjudge/shared';
import { JudgeHarness, FORCED_INTERRUPT_MESSAGE, splitInputLines } from './harness.js';
import { PathPolicy } from '../security/path-policy.js';
import type { PtySpawner } from '../interactive/pty-process.js';
import {
  fakeSpawner,
  catProgram,
  hangingProgram,
  oneShotProgram,
  makeMockLogger,
  type FakePty,
  type FakeProgram,
} from '../interactive/test-helpers.js';

const JUDGE: Omit<JudgeConfig, 'logDir'> = {
  primaryTimeoutMs: 150,
  graceMs: 100,
  initialDelayMs: 0,
  interLineDelayMs: 0,
  sendEof: false,
  gracefulMarkers: ['KeyboardInterrupt'],
  tailChars: 2000,
};

let root: string;
let workspace: string;
let scratch: string;
let logDir: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'termjudge-judge-'));
  workspace = join(root, 'workspace');
  scratch = join(root, 'scratch');
  logDir = join(root, 'logs');
  mkdirSync(workspace);
  mkdirSync(scratch);
  mkdirSync(join(root, 'elsewhere'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

function buildHarness(
  program: FakeProgram,
  judge: Partial<JudgeConfig> = {},
  spawnerOverride?: PtySpawner
): { harness: JudgeHarness; spawned: FakePty[] } {
  const fake = fakeSpawner(() => program);
  const spawner = spawnerOverride ?? fake.spawner;
  const spawned = fake.spawned;
  const harness = new JudgeHarness(
    { judge: { ...JUDGE, logDir, ...judge }, workspaceRoot: workspace },
    {
      logger: makeMockLogger(),
      pathPolicy: new PathPolicy({
        enabled: true,
        workspaceRoot: workspace,
        scratchRoot: scratch,
        pathRestriction: true,
        maxReportSlots: 50,
      }),
      spawner,
    }
  );
  return { harness, spawned };
}

describe('splitInputLines', () => {
  it('drops only the final newline', () => {
    expect(splitInputLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitInputLines('a\nb')).toEqual(['a', 'b']);
    expect(splitInputLines('a\n\nb\n')).toEqual(['a', '', 'b']);
  });

  it('returns no lines for an empty file', () => {
    expect(splitInputLines('')).toEqual([]);
  });
});

describe('JudgeHarness.run', () => {
  it('succeeds when the program exits on EOF', async () => {
    const { harness } = buildHarness(catProgram(), { sendEof: true });
    const result = await harness.run('cat', ['alpha', 'beta'], workspace);

    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.exitCode).toBe(0);
    expect(result.log).toBe(
      'user: alpha\nprogram: alpha\nprogram: alpha\nuser: beta\nprogram: beta\nprogram: beta\n'
    );
  });

  it('writes the transcript to the log directory', async () => {
    const { harness } = buildHarness(catProgram(), { sendEof: true });
    const result = await harness.run('cat', ['one'], workspace);

    expect(result.logPath).toBe(join(logDir, `judge-${result.runId}.log`));
    expect(readFileSync(join(logDir, `judge-${result.runId}.log`), 'utf-8')).toBe(result.log);
  });

  it('interrupts a program that outlives the timeout and counts ^C death as success', async () => {
    const { harness, spawned } = buildHarness(catProgram());
    const result = await harness.run('cat', ['hi'], workspace);

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(130);
    expect(spawned[0]?.written).toEqual(['hi\r', '\x03']);
    expect(result.log).toBe('user: hi\nprogram: hi\nprogram: hi\nuser: <Ctrl+C>\nprogram: ^C\n');
  });

  it('reports a forced kill when the interrupt is ignored', async () => {
    const { harness, spawned } = buildHarness(hangingProgram({ ignoreInterrupt: true }));
    const result = await harness.run('server', [], workspace);

    expect(result.success).toBe(false);
    expect(result.error).toBe(FORCED_INTERRUPT_MESSAGE);
    expect(result.exitCode).toBe(137);
    expect(spawned[0]?.signals).toEqual(['SIGKILL']);
    expect(result.log).toBe('user: <Ctrl+C>\n');
  });

  it('accepts a graceful marker in the output after a forced kill', async () => {
    const { harness } = buildHarness(
      hangingProgram({ interruptOutput: 'Traceback\r\nKeyboardInterrupt\r\n', ignoreInterrupt: true })
    );
    const result = await harness.run('server', [], workspace);

    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.exitCode).toBe(137);
  });

  it('describes a non-zero exit with the trailing output', async () => {
    const { harness } = buildHarness(oneShotProgram('boom\r\n', 2));
    const result = await harness.run('calc', ['go'], workspace);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(2);
    expect(result.error).toBe('Program exit status code: 2\nLast output: go\nboom');
  });

  it('stops typing once the program has exited', async () => {
    const { harness, spawned } = buildHarness(oneShotProgram('done\r\n', 0), { interLineDelayMs: 20 });
    const result = await harness.run('calc', ['a', 'b', 'c'], workspace);

    expect(result.success).toBe(true);
    expect(spawned[0]?.written).toEqual(['a\r']);
    expect(result.log).toBe('user: a\nprogram: a\nprogram: done\n');
  });

  it('returns spawn failures as errors', async () => {
    const failing: PtySpawner = () => {
      throw new Error('no such program');
    };
    const { harness } = buildHarness(catProgram(), {}, failing);
    const result = await harness.run('missing-prog', ['x'], workspace);

    expect(result.success).toBe(false);
    expect(result.log).toBe('');
    expect(result.error).toBe("Failed to spawn 'missing-prog': no such program");
  });

  it('rejects a working directory that does not exist', async () => {
    const { harness, spawned } = buildHarness(catProgram());
    const missing = join(root, 'nope');
    const result = await harness.run('cat', [], missing);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Working directory is not a directory: ${missing}`);
    expect(spawned).toHaveLength(0);
  });
});

describe('JudgeHarness.judge', () => {
  it('reads input lines from a file relative to the workspace', async () => {
    writeFileSync(join(workspace, 'input.txt'), 'alpha\nbeta\n');
    const { harness, spawned } = buildHarness(catProgram(), { sendEof: true });
    const result = await harness.judge('cat', 'input.txt', 'echo test');

    expect(result.success).toBe(true);
    expect(spawned[0]?.written).toEqual(['alpha\r', 'beta\r', '\x04']);
  });

  it('runs without input when no file is given', async () => {
    const { harness, spawned } = buildHarness(catProgram(), { sendEof: true });
    const result = await harness.judge('cat');

    expect(result.success).toBe(true);
    expect(result.log).toBe('');
    expect(spawned[0]?.written).toEqual(['\x04']);
  });

  it('reports a missing input file without spawning', async () => {
    const { harness, spawned } = buildHarness(catProgram());
    const result = await harness.judge('cat', 'missing.txt', '');

    expect(result).toEqual({
      success: false,
      log: '',
      error: 'Input file missing.txt does not exist, please check the path and call again.',
    });
    expect(spawned).toHaveLength(0);
  });

  it('refuses input files outside the readable area', async () => {
    const outside = join(root, 'elsewhere', 'input.txt');
    writeFileSync(outside, 'x\n');
    const { harness, spawned } = buildHarness(catProgram());
    const result = await harness.judge('cat', outside);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Path ${outside} is not allowed for read by the sandbox`);
    expect(spawned).toHaveLength(0);
  });

  it('accepts absolute input files under the scratch root', async () => {
    const inScratch = join(scratch, 'input.txt');
    writeFileSync(inScratch, 'x\n');
    const { harness, spawned } = buildHarness(catProgram(), { sendEof: true });
    const result = await harness.judge('cat', inScratch);

    expect(result.success).toBe(true);
    expect(spawned[0]?.written).toEqual(['x\r', '\x04']);
  });
});
