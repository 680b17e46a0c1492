/**
 * Error classes for the monitoring client.
 *
 * Connection-level errors end a session. Frame-level errors
 * (decode, oversize frame, handler fault) are reported in the feed
 * and the session keeps receiving.
 */

/**
 * Maximum number of characters of an offending frame kept for diagnostics.
 */
export const PREVIEW_LENGTH = 100;

/**
 * Thrown when the TCP handshake with the management server fails.
 */
export class ConnectError extends Error {
  override readonly name = 'ConnectError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly host: string,
    readonly port: number,
    cause?: Error,
  ) {
    super(`Failed to connect to ${host}:${port}${cause ? `: ${cause.message}` : ''}`);
    this.cause = cause;
  }
}

/**
 * Thrown when a frame is not valid JSON or lacks the envelope shape.
 */
export class DecodeError extends Error {
  override readonly name = 'DecodeError' as const;
  override readonly cause: Error | undefined;

  /** The offending frame, cut to {@link PREVIEW_LENGTH} characters. */
  readonly preview: string;

  constructor(message: string, frame: string, cause?: Error) {
    super(message);
    this.preview = frame.slice(0, PREVIEW_LENGTH);
    this.cause = cause;
  }
}

/**
 * Raised when reading from an established connection fails.
 */
export class TransportReadError extends Error {
  override readonly name = 'TransportReadError' as const;
  override readonly cause: Error | undefined;

  constructor(cause: Error) {
    super(`Connection read failed: ${cause.message}`);
    this.cause = cause;
  }
}

/**
 * Wraps an unexpected failure inside a message handler.
 */
export class HandlerFault extends Error {
  override readonly name = 'HandlerFault' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly messageType: string,
    cause: Error,
  ) {
    super(`Handler for '${messageType}' failed: ${cause.message}`);
    this.cause = cause;
  }
}

/**
 * Raised when a single frame grows past the configured size limit.
 */
export class FrameTooLargeError extends Error {
  override readonly name = 'FrameTooLargeError' as const;

  constructor(
    readonly limit: number,
    readonly size: number,
  ) {
    super(`Frame of at least ${size} bytes exceeds limit of ${limit} bytes`);
  }
}

/**
 * Thrown when client configuration fails validation.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError' as const;

  constructor(readonly problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
