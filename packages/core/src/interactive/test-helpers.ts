/**
 * In-process stand-ins for node-pty used by the interactive and judge suites.
 * Nothing here spawns a real process.
 */

import { vi } from 'vitest';
import type { SecureLogger } from '../logging/logger.js';
import { signalNumber, type Disposable, type PtyHandle, type PtySpawner } from './pty-process.js';

type DataListener = (data: string) => void;
type ExitListener = (event: { exitCode: number; signal?: number }) => void;

export interface FakeProgram {
  /** Output written right after spawn. */
  banner?: string;
  /** Echo typed characters back, as a terminal in cooked mode does. */
  echo?: boolean;
  onLine?(line: string, pty: FakePty): void;
  onInterrupt?(pty: FakePty): void;
  onEof?(pty: FakePty): void;
  /** Signals the program survives. */
  ignoreSignals?: string[];
  /** Exit with this code right after the banner. */
  exitOnStart?: number;
}

let nextPid = 4000;

export class FakePty implements PtyHandle {
  readonly pid = nextPid++;
  readonly written: string[] = [];
  readonly signals: string[] = [];
  private readonly dataListeners = new Set<DataListener>();
  private readonly exitListeners = new Set<ExitListener>();
  private lineBuffer = '';
  private exited = false;

  constructor(
    readonly file: string,
    readonly args: string[],
    private readonly program: FakeProgram = {}
  ) {
    if (program.banner) this.emit(program.banner);
    if (program.exitOnStart !== undefined) this.exit(program.exitOnStart);
  }

  get hasExited(): boolean {
    return this.exited;
  }

  onData(listener: DataListener): Disposable {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  }

  onExit(listener: ExitListener): Disposable {
    this.exitListeners.add(listener);
    return { dispose: () => this.exitListeners.delete(listener) };
  }

  write(data: string): void {
    this.written.push(data);
    for (const ch of data) {
      if (ch === '\x03') {
        if (this.program.echo) this.emit('^C\r\n');
        this.lineBuffer = '';
        if (this.program.onInterrupt) this.program.onInterrupt(this);
        else this.exit(0, signalNumber('SIGINT'));
      } else if (ch === '\x04') {
        if (this.program.onEof) this.program.onEof(this);
      } else if (ch === '\r') {
        const line = this.lineBuffer;
        this.lineBuffer = '';
        if (this.program.echo) this.emit(`${line}\r\n`);
        this.program.onLine?.(line, this);
      } else {
        this.lineBuffer += ch;
      }
    }
  }

  kill(signal = 'SIGHUP'): void {
    this.signals.push(signal);
    if (this.exited || this.program.ignoreSignals?.includes(signal)) return;
    this.exit(0, signalNumber(signal));
  }

  /** Emit output asynchronously, in call order. */
  emit(data: string): void {
    setTimeout(() => {
      for (const listener of this.dataListeners) listener(data);
    }, 0);
  }

  /** Exit after any output already emitted. */
  exit(exitCode: number, signal?: number): void {
    if (this.exited) return;
    this.exited = true;
    setTimeout(() => {
      for (const listener of this.exitListeners) listener({ exitCode, signal });
    }, 0);
  }
}

/** Spawner that builds a FakePty from the program factory and records it. */
export function fakeSpawner(programFor: (file: string, args: string[]) => FakeProgram): {
  spawner: PtySpawner;
  spawned: FakePty[];
} {
  const spawned: FakePty[] = [];
  const spawner: PtySpawner = (file, args) => {
    const pty = new FakePty(file, args, programFor(file, args));
    spawned.push(pty);
    return pty;
  };
  return { spawner, spawned };
}

/** `cat`: echoes each line, exits on EOF. */
export function catProgram(): FakeProgram {
  return {
    echo: true,
    onLine: (line, pty) => pty.emit(`${line}\r\n`),
    onEof: (pty) => pty.exit(0),
  };
}

/** Reads nothing, prints nothing and never exits by itself. */
export function hangingProgram(opts: { interruptOutput?: string; ignoreInterrupt?: boolean } = {}): FakeProgram {
  return {
    onInterrupt: (pty) => {
      if (opts.interruptOutput) pty.emit(opts.interruptOutput);
      if (!opts.ignoreInterrupt) pty.exit(1);
    },
    ignoreSignals: opts.ignoreInterrupt ? ['SIGTERM'] : [],
  };
}

/** Prints `output` and exits with `exitCode` once the first line arrives. */
export function oneShotProgram(output: string, exitCode: number): FakeProgram {
  return {
    echo: true,
    onLine: (_line, pty) => {
      pty.emit(output);
      pty.exit(exitCode);
    },
  };
}

/**
 * A tiny REPL: `name = <int>` assigns, `print(<name> * <int>)` prints,
 * `exit()` quits.
 */
export function replProgram(prompt = '>>> '): FakeProgram {
  const vars = new Map<string, number>();
  return {
    banner: prompt,
    echo: true,
    onLine: (line, pty) => {
      const assign = /^(\w+)\s*=\s*(-?\d+)$/.exec(line.trim());
      const print = /^print\((\w+)\s*\*\s*(-?\d+)\)$/.exec(line.trim());
      if (line.trim() === 'exit()') {
        pty.exit(0);
        return;
      }
      if (assign?.[1] !== undefined && assign[2] !== undefined) {
        vars.set(assign[1], Number(assign[2]));
      } else if (print?.[1] !== undefined && print[2] !== undefined) {
        const value = vars.get(print[1]);
        pty.emit(value === undefined ? `NameError: name '${print[1]}' is not defined\r\n` : `${value * Number(print[2])}\r\n`);
      }
      pty.emit(prompt);
    },
    onInterrupt: (pty) => pty.emit(`\r\nKeyboardInterrupt\r\n${prompt}`),
    onEof: (pty) => pty.exit(0),
  };
}

/**
 * A shell: prints `$ ` prompts, runs `python` as a nested REPL, `echo`
 * prints its arguments, `exit` quits.
 */
export function shellProgram(): FakeProgram {
  let nested: FakeProgram | null = null;
  const prompt = '$ ';
  return {
    banner: prompt,
    echo: true,
    onLine: (line, pty) => {
      if (nested) {
        if (line.trim() === 'exit()') {
          nested = null;
          pty.emit(prompt);
          return;
        }
        nested.onLine?.(line, pty);
        return;
      }
      const trimmed = line.trim();
      if (trimmed === 'exit') {
        pty.exit(0);
      } else if (trimmed.startsWith('python')) {
        nested = replProgram();
        pty.emit('>>> ');
      } else if (trimmed.startsWith('echo ')) {
        pty.emit(`${trimmed.slice(5)}\r\n${prompt}`);
      } else {
        pty.emit(prompt);
      }
    },
  };
}

export function makeMockLogger(): SecureLogger {
  const logger: SecureLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
    level: 'debug',
  };
  return logger;
}
