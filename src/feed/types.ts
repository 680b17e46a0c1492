/**
 * Feed type definitions.
 *
 * Handlers describe what to show as {@link FeedEntry} values; a
 * {@link FeedRenderer} decides where and how it appears.
 */

import type { MessageType } from '../protocol/messages.js';
import type { AggregateSnapshot } from '../state/aggregate-store.js';

/**
 * Severity used for coloring feed entries.
 */
export type FeedSeverity = 'info' | 'success' | 'warning' | 'error';

/**
 * What produced a feed entry.
 *
 * - message types: output of a message handler
 * - `'diagnostic'`: a frame that could not be decoded or handled
 * - `'session'`: connection lifecycle notices
 * - `'summary'`: end-of-session statistics
 */
export type FeedKind = MessageType | 'diagnostic' | 'session' | 'summary';

/**
 * One block of feed output.
 */
export interface FeedEntry {
  readonly kind: FeedKind;
  readonly severity: FeedSeverity;
  /** Display lines, first line carries the glyph and time. */
  readonly lines: readonly string[];
}

/**
 * Output surface for the live feed.
 */
export interface FeedRenderer {
  /**
   * Shows one entry. Must not block.
   */
  render(entry: FeedEntry): void;

  /**
   * Receives fresh statistics after each handled message.
   * Renderers without a statistics view leave this out.
   */
  updateStats?(snapshot: AggregateSnapshot): void;

  /**
   * Releases the output surface.
   */
  close(): void;
}
