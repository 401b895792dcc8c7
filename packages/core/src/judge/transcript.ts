/**
 * Append-only record of a scripted run, rendered one entry per line as
 * `user: <line>` or `program: <line>`. Once written it can no longer change.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export type Speaker = 'user' | 'program';

export interface TranscriptEntry {
  speaker: Speaker;
  text: string;
}

export class Transcript {
  private readonly items: TranscriptEntry[] = [];
  private pendingOutput = '';
  private sealed = false;

  get entries(): readonly TranscriptEntry[] {
    return this.items;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  user(line: string): void {
    this.flushOutput();
    this.append('user', line);
  }

  /** Record a control key the harness pressed, e.g. `<Ctrl+C>`. */
  userControl(key: string): void {
    this.user(`<${key}>`);
  }

  /**
   * Record program output. Chunks need not end on a line boundary; a partial
   * line is held until it completes or until the next user entry.
   */
  program(chunk: string): void {
    this.assertOpen();
    const text = this.pendingOutput + chunk;
    const lines = text.split(/\r?\n/);
    this.pendingOutput = lines.pop() ?? '';
    for (const line of lines) {
      this.append('program', line.replace(/\r/g, ''));
    }
  }

  render(): string {
    this.flushOutput();
    return this.items.map((e) => `${e.speaker}: ${e.text}\n`).join('');
  }

  /** Render, seal and write to `path`. Returns the rendered text. */
  async writeTo(path: string): Promise<string> {
    const text = this.render();
    this.sealed = true;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, text, 'utf-8');
    return text;
  }

  private flushOutput(): void {
    if (this.pendingOutput.length === 0 || this.sealed) return;
    const line = this.pendingOutput.replace(/\r/g, '');
    this.pendingOutput = '';
    this.append('program', line);
  }

  private append(speaker: Speaker, text: string): void {
    this.assertOpen();
    this.items.push({ speaker, text });
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error('Transcript has been written and can no longer change');
    }
  }
}
