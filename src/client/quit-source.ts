/**
 * Quit triggers for a monitoring session.
 */

import readline from 'node:readline';
import type { Readable } from 'node:stream';

export type QuitListener = (reason: string) => void;

/**
 * Something that can ask the session to end.
 */
export interface QuitSource {
  /**
   * Registers a listener fired once when quitting is requested.
   *
   * @returns Unsubscribe function
   */
  onQuit(listener: QuitListener): () => void;

  /**
   * Stops watching for quit requests.
   */
  close(): void;
}

/**
 * Base class tracking listeners and firing at most once.
 */
export abstract class BaseQuitSource implements QuitSource {
  private readonly listeners: Set<QuitListener> = new Set();
  private fired = false;

  onQuit(listener: QuitListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  abstract close(): void;

  protected fire(reason: string): void {
    if (this.fired) return;
    this.fired = true;
    for (const listener of [...this.listeners]) {
      listener(reason);
    }
  }
}

/**
 * Quit source triggered from code.
 */
export class ManualQuitSource extends BaseQuitSource {
  trigger(reason = 'quit requested'): void {
    this.fire(reason);
  }

  close(): void {
    // Nothing to release
  }
}

export interface KeyboardQuitOptions {
  /** @default process.stdin */
  readonly input?: Readable;
  /** Line that requests quit, compared case-insensitively. @default 'q' */
  readonly quitKey?: string;
  /** Also quit on SIGINT and SIGTERM. @default true */
  readonly handleSignals?: boolean;
}

/**
 * Quits when the user types `q` followed by Enter, or on SIGINT/SIGTERM.
 */
export class KeyboardQuitSource extends BaseQuitSource {
  private readonly rl: readline.Interface;
  private readonly quitKey: string;
  private readonly handleSignals: boolean;
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.fire(`received ${signal}`);
  };

  constructor(options: KeyboardQuitOptions = {}) {
    super();
    this.quitKey = (options.quitKey ?? 'q').toLowerCase();
    this.handleSignals = options.handleSignals ?? true;

    this.rl = readline.createInterface({ input: options.input ?? process.stdin, terminal: false });
    this.rl.on('line', (line) => {
      if (line.trim().toLowerCase() === this.quitKey) {
        this.fire('quit requested');
      }
    });

    if (this.handleSignals) {
      process.on('SIGINT', this.onSignal);
      process.on('SIGTERM', this.onSignal);
    }
  }

  close(): void {
    this.rl.close();
    if (this.handleSignals) {
      process.off('SIGINT', this.onSignal);
      process.off('SIGTERM', this.onSignal);
    }
  }
}
