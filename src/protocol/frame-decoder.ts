/**
 * Newline-delimited frame decoder.
 *
 * Accumulates raw socket data and returns complete frames. A frame is
 * only decoded to text once its terminating newline has arrived, so
 * multi-byte UTF-8 sequences split across reads decode intact.
 */

import { FrameTooLargeError } from './errors.js';

/**
 * Frame delimiter byte (`\n`).
 */
export const FRAME_DELIMITER = 0x0a;

const CARRIAGE_RETURN = 0x0d;

/**
 * Decoder options.
 */
export interface FrameDecoderOptions {
  /**
   * Largest partial frame kept in the buffer, in bytes.
   * `null` leaves frames unbounded. @default null
   */
  readonly maxFrameBytes?: number | null;

  /** Called when a partial frame is dropped for exceeding `maxFrameBytes`. */
  readonly onOverflow?: (error: FrameTooLargeError) => void;
}

/**
 * Splits a byte stream into newline-terminated text frames.
 *
 * @example
 * ```typescript
 * const decoder = new FrameDecoder();
 * decoder.push('{"type":"wel');           // []
 * decoder.push('come"}\n{"type":"x"}\n'); // ['{"type":"welcome"}', '{"type":"x"}']
 * ```
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private discarding = false;
  private readonly maxFrameBytes: number | null;
  private readonly onOverflow: ((error: FrameTooLargeError) => void) | undefined;

  constructor(options: FrameDecoderOptions = {}) {
    this.maxFrameBytes = options.maxFrameBytes ?? null;
    this.onOverflow = options.onOverflow;
  }

  /**
   * Appends a chunk and drains every complete frame it completes.
   * Blank frames are skipped.
   */
  push(chunk: Buffer | string): string[] {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    const frames: string[] = [];
    let start = 0;
    let newlineIndex: number;

    while ((newlineIndex = this.buffer.indexOf(FRAME_DELIMITER, start)) !== -1) {
      if (this.discarding) {
        // Tail of an oversize frame
        this.discarding = false;
      } else if (this.exceedsLimit(newlineIndex - start)) {
        this.reportOverflow(newlineIndex - start);
      } else {
        const frame = this.decodeFrame(this.buffer.subarray(start, newlineIndex));
        if (frame !== null) {
          frames.push(frame);
        }
      }
      start = newlineIndex + 1;
    }

    this.buffer = start === 0 ? this.buffer : this.buffer.subarray(start);
    this.enforceLimit();

    return frames;
  }

  /**
   * Number of bytes held for an incomplete frame.
   */
  pending(): number {
    return this.buffer.length;
  }

  /**
   * Drops any buffered partial frame.
   */
  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.discarding = false;
  }

  private decodeFrame(bytes: Buffer): string | null {
    const end = bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN
      ? bytes.length - 1
      : bytes.length;
    const text = bytes.toString('utf-8', 0, end);
    return text.trim().length === 0 ? null : text;
  }

  private exceedsLimit(length: number): boolean {
    return this.maxFrameBytes !== null && length > this.maxFrameBytes;
  }

  private enforceLimit(): void {
    if (!this.exceedsLimit(this.buffer.length)) {
      return;
    }

    const size = this.buffer.length;
    const wasDiscarding = this.discarding;
    this.buffer = Buffer.alloc(0);
    this.discarding = true;

    if (!wasDiscarding) {
      this.reportOverflow(size);
    }
  }

  private reportOverflow(size: number): void {
    if (this.maxFrameBytes !== null) {
      this.onOverflow?.(new FrameTooLargeError(this.maxFrameBytes, size));
    }
  }
}
