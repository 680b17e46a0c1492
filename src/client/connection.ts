/**
 * TCP connection to the management server.
 *
 * Handles:
 * - Connection handshake with an optional timeout
 * - Newline framing of the incoming stream
 * - Type-safe event emission
 * - Clean resource management
 *
 * The stream is read-only: nothing is ever written to the server.
 */

import net from 'node:net';
import { FrameDecoder } from '../protocol/frame-decoder.js';
import {
  ConnectError,
  FrameTooLargeError,
  TransportReadError,
} from '../protocol/errors.js';

// =============================================================================
// Configuration
// =============================================================================

export interface ConnectionConfig {
  /** Server host address. @default 'localhost' */
  readonly host: string;
  /** Server TCP port. @default 52417 */
  readonly port: number;
  /** Connect timeout in milliseconds, `null` for none. @default null */
  readonly connectTimeoutMs: number | null;
  /** Largest accepted frame in bytes, `null` for unbounded. @default null */
  readonly maxFrameBytes: number | null;
}

export const DEFAULT_CONNECTION_CONFIG: ConnectionConfig = {
  host: 'localhost',
  port: 52417,
  connectTimeoutMs: null,
  maxFrameBytes: null,
};

// =============================================================================
// Connection State
// =============================================================================

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/**
 * Connection event types.
 */
export type ConnectionEvent =
  | { readonly type: 'connected' }
  | { readonly type: 'frame'; readonly frame: string }
  | { readonly type: 'frame_error'; readonly error: FrameTooLargeError }
  | { readonly type: 'closed'; readonly reason: string }
  | { readonly type: 'error'; readonly error: TransportReadError };

export type ConnectionEventHandler = (event: ConnectionEvent) => void;

// =============================================================================
// Connection Class
// =============================================================================

/**
 * One read-only TCP stream to the management server.
 *
 * @example
 * ```typescript
 * const connection = new MonitorConnection({ host: 'localhost', port: 52417 });
 *
 * connection.onEvent((event) => {
 *   if (event.type === 'frame') {
 *     console.log('Received:', event.frame);
 *   }
 * });
 *
 * await connection.connect();
 * ```
 */
export class MonitorConnection {
  private readonly config: ConnectionConfig;
  private readonly handlers: Set<ConnectionEventHandler> = new Set();
  private readonly decoder: FrameDecoder;

  private socket: net.Socket | null = null;
  private state: ConnectionState = 'disconnected';
  private connectionTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<ConnectionConfig> = {}) {
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...config };
    this.decoder = new FrameDecoder({
      maxFrameBytes: this.config.maxFrameBytes,
      onOverflow: (error) => this.emit({ type: 'frame_error', error }),
    });
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getHost(): string {
    return this.config.host;
  }

  getPort(): number {
    return this.config.port;
  }

  /**
   * Registers an event handler.
   *
   * @returns Unsubscribe function
   */
  onEvent(handler: ConnectionEventHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  /**
   * Opens the connection.
   *
   * @throws ConnectError if the handshake fails or times out
   */
  connect(): Promise<void> {
    if (this.state !== 'disconnected') {
      return Promise.reject(
        new ConnectError(this.config.host, this.config.port, new Error(`Connection is already ${this.state}`)),
      );
    }

    return new Promise((resolve, reject) => {
      this.state = 'connecting';
      this.decoder.reset();

      const socket = new net.Socket();
      this.socket = socket;

      const fail = (cause: Error): void => {
        this.cleanup();
        reject(new ConnectError(this.config.host, this.config.port, cause));
      };

      if (this.config.connectTimeoutMs !== null) {
        const timeoutMs = this.config.connectTimeoutMs;
        this.connectionTimer = setTimeout(() => {
          fail(new Error(`Connection timeout after ${timeoutMs}ms`));
        }, timeoutMs);
      }

      socket.once('error', fail);

      socket.once('connect', () => {
        this.clearConnectionTimeout();
        socket.off('error', fail);
        this.attachStreamHandlers(socket);
        this.state = 'connected';
        this.emit({ type: 'connected' });
        resolve();
      });

      socket.connect(this.config.port, this.config.host);
    });
  }

  /**
   * Closes the connection. Safe to call more than once.
   */
  close(): void {
    this.cleanup();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private attachStreamHandlers(socket: net.Socket): void {
    socket.on('data', (chunk: Buffer) => {
      for (const frame of this.decoder.push(chunk)) {
        // A handler may have closed the connection mid-chunk
        if (this.socket !== socket) break;
        this.emit({ type: 'frame', frame });
      }
    });

    socket.on('error', (error) => {
      this.cleanup();
      this.emit({ type: 'error', error: new TransportReadError(error) });
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.cleanup();
      this.emit({ type: 'closed', reason: 'connection closed by server' });
    });
  }

  private cleanup(): void {
    this.clearConnectionTimeout();

    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.destroy();
      this.socket = null;
    }

    this.decoder.reset();
    this.state = 'disconnected';
  }

  private clearConnectionTimeout(): void {
    if (this.connectionTimer) {
      clearTimeout(this.connectionTimer);
      this.connectionTimer = null;
    }
  }

  private emit(event: ConnectionEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }
}
