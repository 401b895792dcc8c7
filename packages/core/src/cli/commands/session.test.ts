import { describe, it, expect, vi, afterEach } from 'vitest';
import { sessionCommand } from './session.js';
import type { OutputStream } from '../router.js';

function createStreams() {
  let stdoutBuf = '';
  let stderrBuf = '';
  const stdout: OutputStream = {
    write: (s: string) => {
      stdoutBuf += s;
      return true;
    },
  };
  const stderr: OutputStream = {
    write: (s: string) => {
      stderrBuf += s;
      return true;
    },
  };
  return { stdout, stderr, getStdout: () => stdoutBuf, getStderr: () => stderrBuf };
}

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: () => 'application/json' },
    json: async () => body,
  };
}

describe('session command', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should print help with --help', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await sessionCommand.run({ argv: ['--help'], stdout, stderr });
    expect(code).toBe(0);
    expect(getStdout()).toContain('termjudge session step <session-id> [--input <text>]');
  });

  it('should start a session and print its output', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ sessionId: 'py', output: '>>> ', waiting: true, finished: false }));
    vi.stubGlobal('fetch', fetchMock);

    const { stdout, stderr, getStdout } = createStreams();
    const code = await sessionCommand.run({
      argv: ['start', '--cmd', 'python3', '--id', 'py', '--token', 'test-secret'],
      stdout,
      stderr,
    });

    expect(code).toBe(0);
    expect(getStdout()).toBe('>>> \n[session py: waiting for input]\n');
    expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:18790/api/v1/interactive/sessions', {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        Authorization: 'Bearer test-secret',
        'Content-Type': 'application/json',
      },
      body: '{"cmd":"python3","sessionId":"py"}',
    });
  });

  it('should send step input to the session', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ sessionId: 'py', output: '20\r\n>>> ', waiting: true, finished: false }));
    vi.stubGlobal('fetch', fetchMock);

    const { stdout, stderr } = createStreams();
    const code = await sessionCommand.run({
      argv: ['step', 'py', '--input', 'print(x * 2)', '--url', 'http://localhost:9000'],
      stdout,
      stderr,
    });

    expect(code).toBe(0);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://localhost:9000/api/v1/interactive/sessions/py/step');
    expect(init).toMatchObject({ method: 'POST', body: '{"userInput":"print(x * 2)"}' });
  });

  it('should return 1 and print the error of a refused step', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse({
          sessionId: 'py',
          output: '',
          waiting: false,
          finished: false,
          error: "Command 'import os' is not allowed by the substring policy: command must contain one of: python",
        })
      )
    );

    const { stdout, stderr, getStderr } = createStreams();
    const code = await sessionCommand.run({ argv: ['step', 'py', '--input', 'import os'], stdout, stderr });
    expect(code).toBe(1);
    expect(getStderr()).toBe(
      "Error: Command 'import os' is not allowed by the substring policy: command must contain one of: python\n"
    );
  });

  it('should require a session id for step and kill', async () => {
    const { stdout, stderr, getStderr } = createStreams();
    expect(await sessionCommand.run({ argv: ['kill'], stdout, stderr })).toBe(1);
    expect(getStderr()).toBe('Usage: termjudge session kill <session-id>\n');
  });

  it('should kill a session', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ message: 'Session py has been terminated' }));
    vi.stubGlobal('fetch', fetchMock);

    const { stdout, stderr, getStdout } = createStreams();
    const code = await sessionCommand.run({ argv: ['kill', 'py'], stdout, stderr });
    expect(code).toBe(0);
    expect(getStdout()).toBe('Session py has been terminated\n');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://127.0.0.1:18790/api/v1/interactive/sessions/py');
    expect(init).toMatchObject({ method: 'DELETE' });
  });

  it('should list sessions as JSON', async () => {
    const session = {
      id: 'py',
      command: 'python3',
      pid: 4242,
      createdAt: 1,
      lastActivity: 2,
      interpreterMode: false,
    };
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ sessions: [session] })));

    const { stdout, stderr, getStdout } = createStreams();
    const code = await sessionCommand.run({ argv: ['list', '--json'], stdout, stderr });
    expect(code).toBe(0);
    expect(JSON.parse(getStdout())).toEqual([session]);
  });

  it('should report HTTP errors with the server message', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse({ error: 'Unauthorized', message: 'Missing or invalid bearer token', statusCode: 401 }, 401)
      )
    );

    const { stdout, stderr, getStderr } = createStreams();
    const code = await sessionCommand.run({ argv: ['list'], stdout, stderr });
    expect(code).toBe(1);
    expect(getStderr()).toBe('Request failed (HTTP 401): Missing or invalid bearer token\n');
  });

  it('should reject an unknown action', async () => {
    const { stdout, stderr, getStderr } = createStreams();
    const code = await sessionCommand.run({ argv: ['restart'], stdout, stderr });
    expect(code).toBe(1);
    expect(getStderr()).toContain('Unknown session action: restart');
  });
});
