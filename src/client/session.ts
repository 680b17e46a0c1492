/**
 * Monitoring session driver.
 *
 * Owns one connection for its lifetime:
 *
 * ```
 * disconnected -> connected -> receiving -> terminating -> disconnected
 * ```
 *
 * The receive path (connection events -> parser -> router) is the only
 * writer of the aggregate store. Quit requests, peer close and read
 * errors all set the stop flag and lead to a single termination that
 * prints the summary and releases the connection.
 */

import type { MonitorConnection, ConnectionEvent } from './connection.js';
import type { QuitSource } from './quit-source.js';
import { parseFrame } from '../protocol/parser.js';
import { ConnectError, DecodeError, toError } from '../protocol/errors.js';
import type { AggregateSnapshot } from '../state/aggregate-store.js';
import { AggregateStore } from '../state/aggregate-store.js';
import { MessageRouter } from '../router/message-router.js';
import type { HandlerTable } from '../router/handlers.js';
import type { FeedEntry, FeedRenderer, FeedSeverity } from '../feed/types.js';
import { Glyphs, INDENT, rule } from '../feed/formatters.js';
import { summaryEntry } from '../feed/summary.js';
import { createSilentLogger, type Logger } from '../logging.js';

// =============================================================================
// Types
// =============================================================================

export type SessionState = 'disconnected' | 'connected' | 'receiving' | 'terminating';

/**
 * Why the receive loop ended.
 */
export type TerminationReason = 'peer_closed' | 'read_error' | 'quit';

export type SessionResult =
  | { readonly status: 'connect_failed'; readonly error: ConnectError }
  | {
      readonly status: 'completed';
      readonly reason: TerminationReason;
      readonly detail: string;
      readonly snapshot: AggregateSnapshot;
    };

export interface MonitorSessionOptions {
  readonly connection: MonitorConnection;
  readonly renderer: FeedRenderer;
  /** Ends the session when fired. */
  readonly quitSource?: QuitSource;
  /** @default a store with the default window size */
  readonly store?: AggregateStore;
  /** @default a silent logger */
  readonly logger?: Logger;
  /** Clock used for messages without a timestamp. */
  readonly now?: () => Date;
  /** Replacements for individual message handlers. */
  readonly handlers?: Partial<HandlerTable>;
}

// =============================================================================
// MonitorSession Class
// =============================================================================

/**
 * Drives one monitoring session from connect to summary.
 *
 * @example
 * ```typescript
 * const session = new MonitorSession({
 *   connection: new MonitorConnection({ host: 'localhost', port: 52417 }),
 *   renderer: new ConsoleRenderer(),
 *   quitSource: new KeyboardQuitSource(),
 * });
 *
 * const result = await session.run();
 * ```
 */
export class MonitorSession {
  private readonly connection: MonitorConnection;
  private readonly renderer: FeedRenderer;
  private readonly quitSource: QuitSource | undefined;
  private readonly store: AggregateStore;
  private readonly router: MessageRouter;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private state: SessionState = 'disconnected';
  private started = false;
  private stopRequested = false;
  private pendingStop: { reason: TerminationReason; detail: string } | null = null;
  private finish: ((reason: TerminationReason, detail: string) => void) | null = null;
  private unsubscribers: (() => void)[] = [];

  constructor(options: MonitorSessionOptions) {
    this.connection = options.connection;
    this.renderer = options.renderer;
    this.quitSource = options.quitSource;
    this.store = options.store ?? new AggregateStore();
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.router = new MessageRouter({
      store: this.store,
      handlers: options.handlers,
      now: () => this.now().getTime(),
      onFault: (fault) => this.logger.warn({ err: fault }, 'Handler fault'),
    });
  }

  getState(): SessionState {
    return this.state;
  }

  getStore(): AggregateStore {
    return this.store;
  }

  /**
   * Whether the stop flag has been set.
   */
  isStopRequested(): boolean {
    return this.stopRequested;
  }

  /**
   * Connects, receives until the session ends, then prints the summary.
   *
   * Resolves with `connect_failed` without entering the receive loop
   * when the handshake fails.
   *
   * @throws Error if the session has already been run
   */
  async run(): Promise<SessionResult> {
    if (this.started) {
      throw new Error('MonitorSession can only be run once');
    }
    this.started = true;

    this.subscribe();

    const host = this.connection.getHost();
    const port = this.connection.getPort();
    this.logger.info({ host, port }, 'Connecting to management server');

    try {
      await this.connection.connect();
    } catch (error) {
      const connectError =
        error instanceof ConnectError ? error : new ConnectError(host, port, toError(error));
      this.logger.error({ err: connectError }, 'Connect failed');
      this.show(notice('error', [`${Glyphs.ERROR} Failed to connect to management server: ${connectError.message}`]));
      this.releaseResources();
      return { status: 'connect_failed', error: connectError };
    }

    this.state = 'connected';
    this.logger.info({ host, port }, 'Connected');
    this.show(
      notice('success', [
        `${Glyphs.WELCOME} Connected to management server at ${host}:${port}`,
        `${Glyphs.RECEIVING} Receiving real-time debug information...`,
        rule('='),
      ]),
    );

    return new Promise<SessionResult>((resolve) => {
      this.finish = (reason, detail) => resolve(this.terminate(reason, detail));
      this.state = 'receiving';

      if (this.pendingStop) {
        this.finish(this.pendingStop.reason, this.pendingStop.detail);
      }
    });
  }

  /**
   * Sets the stop flag and ends the session.
   */
  requestStop(detail = 'quit requested'): void {
    this.requestTermination('quit', detail);
  }

  // ===========================================================================
  // Receive Path
  // ===========================================================================

  private subscribe(): void {
    this.unsubscribers.push(this.connection.onEvent((event) => this.handleConnectionEvent(event)));

    if (this.quitSource) {
      this.unsubscribers.push(this.quitSource.onQuit((reason) => this.requestTermination('quit', reason)));
    }
  }

  private handleConnectionEvent(event: ConnectionEvent): void {
    switch (event.type) {
      case 'connected':
        break;

      case 'frame':
        if (!this.stopRequested) {
          this.handleFrame(event.frame);
        }
        break;

      case 'frame_error':
        this.logger.warn({ err: event.error }, 'Dropped oversize frame');
        this.show(notice('error', [`${Glyphs.ERROR} Dropped frame: ${event.error.message}`], 'diagnostic'));
        break;

      case 'closed':
        this.logger.info({ reason: event.reason }, 'Connection closed');
        this.requestTermination('peer_closed', event.reason);
        break;

      case 'error':
        this.logger.error({ err: event.error }, 'Read failed');
        if (!this.stopRequested) {
          this.show(notice('error', [`${Glyphs.ERROR} Error receiving message: ${event.error.message}`], 'diagnostic'));
        }
        this.requestTermination('read_error', event.error.message);
        break;
    }
  }

  private handleFrame(frame: string): void {
    let entry: FeedEntry;
    try {
      entry = this.router.dispatch(parseFrame(frame, { now: this.now }));
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      this.logger.debug({ err: error }, 'Dropped undecodable frame');
      entry = decodeErrorEntry(error);
    }

    this.show(entry);
    this.publishStats();
  }

  private publishStats(): void {
    if (!this.renderer.updateStats) return;
    try {
      this.renderer.updateStats(this.store.snapshot());
    } catch (error) {
      this.logger.error({ err: toError(error) }, 'Renderer failed to update stats');
    }
  }

  // ===========================================================================
  // Termination
  // ===========================================================================

  private requestTermination(reason: TerminationReason, detail: string): void {
    if (this.stopRequested) return;
    this.stopRequested = true;

    if (this.finish) {
      this.finish(reason, detail);
    } else {
      this.pendingStop = { reason, detail };
    }
  }

  private terminate(reason: TerminationReason, detail: string): SessionResult {
    this.state = 'terminating';
    this.logger.info({ reason, detail }, 'Session terminating');

    if (reason === 'peer_closed') {
      this.show(notice('warning', [`${Glyphs.DISCONNECTED} Connection closed by server`]));
    }

    const snapshot = this.store.snapshot();
    this.show(summaryEntry(snapshot));

    this.releaseResources();
    this.show(notice('info', ['', `${Glyphs.DISCONNECTED} Disconnected from management server`]));

    return { status: 'completed', reason, detail, snapshot };
  }

  private releaseResources(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.connection.close();
    this.quitSource?.close();
    this.finish = null;
    this.state = 'disconnected';
  }

  private show(entry: FeedEntry): void {
    try {
      this.renderer.render(entry);
    } catch (error) {
      this.logger.error({ err: toError(error), kind: entry.kind }, 'Renderer failed');
    }
  }
}

// =============================================================================
// Feed Entries
// =============================================================================

function notice(
  severity: FeedSeverity,
  lines: readonly string[],
  kind: 'session' | 'diagnostic' = 'session',
): FeedEntry {
  return { kind, severity, lines };
}

/**
 * Feed entry reporting a frame that could not be decoded.
 */
export function decodeErrorEntry(error: DecodeError): FeedEntry {
  return {
    kind: 'diagnostic',
    severity: 'error',
    lines: [`${Glyphs.ERROR} ${error.message}`, `${INDENT}Raw message: ${error.preview}...`],
  };
}
