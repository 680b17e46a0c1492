/**
 * Line-oriented feed renderer for plain terminals and pipes.
 */

import type { Writable } from 'node:stream';
import type { FeedEntry, FeedRenderer } from './types.js';

/**
 * Console renderer options.
 */
export interface ConsoleRendererOptions {
  /** Destination stream. @default process.stdout */
  readonly output?: Writable;
}

/**
 * Writes every entry line by line to a stream.
 *
 * Each entry is written with a single `write` call so lines from one
 * entry are never split by output from elsewhere.
 */
export class ConsoleRenderer implements FeedRenderer {
  private readonly output: Writable;
  private closed = false;

  constructor(options: ConsoleRendererOptions = {}) {
    this.output = options.output ?? process.stdout;
  }

  render(entry: FeedEntry): void {
    if (this.closed || entry.lines.length === 0) return;
    this.output.write(`${entry.lines.join('\n')}\n`);
  }

  close(): void {
    this.closed = true;
  }
}
