/**
 * Command allow-listing.
 *
 * The default policy is a substring match over the whole command text. It
 * both over-permits ("rm -rf / && ls" contains "ls") and under-permits, so it
 * sits behind CommandPolicy and can be replaced by FirstTokenCommandPolicy
 * through `sandbox.commandMatcher`.
 */

import { basename } from 'node:path';
import { parse as parseShellWords } from 'shell-quote';
import type { CommandMatcher, SandboxConfig } from '@termjudge/shared';
import type { SecureLogger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';

export interface CommandPolicy {
  readonly name: CommandMatcher;
  readonly allowed: readonly string[];
  isCommandAllowed(commandText: string): boolean;
  /** One-line description used in safety violation messages. */
  describe(): string;
}

export class SubstringCommandPolicy implements CommandPolicy {
  readonly name = 'substring' as const;

  constructor(readonly allowed: readonly string[]) {}

  isCommandAllowed(commandText: string): boolean {
    return this.allowed.some((fragment) => commandText.includes(fragment));
  }

  describe(): string {
    return `command must contain one of: ${this.allowed.join(', ')}`;
  }
}

export class FirstTokenCommandPolicy implements CommandPolicy {
  readonly name = 'first-token' as const;

  constructor(readonly allowed: readonly string[]) {}

  isCommandAllowed(commandText: string): boolean {
    const first = firstWord(commandText);
    if (!first) return false;
    return this.allowed.includes(basename(first));
  }

  describe(): string {
    return `first word of the command must be one of: ${this.allowed.join(', ')}`;
  }
}

/**
 * First plain word of a command line; null when the line is empty or starts
 * with a shell operator.
 */
function firstWord(commandText: string): string | null {
  const [first] = parseShellWords(commandText);
  return typeof first === 'string' && first.length > 0 ? first : null;
}

/** Logs every decision at debug. */
class LoggedCommandPolicy implements CommandPolicy {
  constructor(
    private readonly inner: CommandPolicy,
    private readonly logger: SecureLogger
  ) {}

  get name(): CommandMatcher {
    return this.inner.name;
  }

  get allowed(): readonly string[] {
    return this.inner.allowed;
  }

  isCommandAllowed(commandText: string): boolean {
    const allowed = this.inner.isCommandAllowed(commandText);
    this.logger.debug('Command policy decision', {
      policy: this.inner.name,
      command: commandText,
      allowed,
    });
    return allowed;
  }

  describe(): string {
    return this.inner.describe();
  }
}

export function createCommandPolicy(
  config: Pick<SandboxConfig, 'allowedCommands' | 'commandMatcher'>,
  logger: SecureLogger = createNoopLogger()
): CommandPolicy {
  const inner =
    config.commandMatcher === 'first-token'
      ? new FirstTokenCommandPolicy(config.allowedCommands)
      : new SubstringCommandPolicy(config.allowedCommands);
  return new LoggedCommandPolicy(inner, logger.child({ component: 'CommandPolicy' }));
}
