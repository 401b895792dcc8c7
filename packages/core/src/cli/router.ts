/**
 * CLI Router — maps argv[2] to a registered command, falling back to the
 * default command when no name (or a flag) is given.
 */

/** The part of a writable stream the CLI uses; process.stdout fits. */
export interface OutputStream {
  write(text: string): unknown;
  isTTY?: boolean;
}

export interface CommandContext {
  argv: string[];
  stdout: OutputStream;
  stderr: OutputStream;
}

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  run(ctx: CommandContext): Promise<number>;
}

export interface Router {
  register(command: Command): void;
  resolve(argv: string[]): { command: Command; rest: string[] };
  getCommands(): Command[];
  printHelp(stream: OutputStream): void;
}

export function createRouter(defaultName?: string): Router {
  const commands: Command[] = [];
  const byName = new Map<string, Command>();

  function defaultCommand(): Command {
    const command = defaultName ? byName.get(defaultName) : undefined;
    if (!command) {
      throw new Error(`Default command "${defaultName ?? ''}" not registered`);
    }
    return command;
  }

  return {
    register(command) {
      commands.push(command);
      byName.set(command.name, command);
      for (const alias of command.aliases ?? []) {
        byName.set(alias, command);
      }
    },

    resolve(argv) {
      const args = argv.slice(2);
      const [first, ...rest] = args;
      if (first === undefined || first.startsWith('-')) {
        return { command: defaultCommand(), rest: args };
      }
      const named = byName.get(first);
      if (named) {
        return { command: named, rest };
      }
      return { command: defaultCommand(), rest: args };
    },

    getCommands() {
      return [...commands];
    },

    printHelp(stream) {
      const width = Math.max(...commands.map((c) => c.name.length), 4);
      const lines = commands.map((c) => {
        const aliases = c.aliases?.length ? ` (${c.aliases.join(', ')})` : '';
        return `  ${c.name.padEnd(width)}  ${c.description}${aliases}`;
      });
      stream.write(`
Usage: termjudge <command> [options]

Commands:
${lines.join('\n')}

Run 'termjudge <command> --help' for command options.
\n`);
    },
  };
}
