/**
 * Feed Log Widget showing the live message feed.
 *
 * Shows a scrollable log with:
 * - Receive time and feed line
 * - Color-coded severity levels
 * - Automatic scrolling to newest entries
 */

import blessed from 'blessed';
import contrib from 'blessed-contrib';
import type { FeedEntry } from '../../feed/types.js';
import { formatClock } from '../../protocol/timestamp.js';
import { escapeTags, severityColor, type FeedLogEntry } from '../types.js';
import { BaseWidget, type DashboardGrid, type GridPosition, type WidgetConfig } from './base-widget.js';

/**
 * Widget configuration including buffer size.
 */
export interface FeedLogConfig extends WidgetConfig {
  /** Maximum number of lines to keep */
  readonly maxEntries: number;
  /** Clock for receive times. @default Date.now */
  readonly now?: () => number;
}

/**
 * Widget that displays every feed line, newest at the bottom.
 *
 * @example
 * ```
 * 12:34:56 ❌ [12:34:55] [ERROR] disk full
 * 12:34:58 📊 [12:34:58] CPU: 55.2% | Memory: 70.0% | Disk: 0.0% | GPU: 0.0%
 * ```
 */
export class FeedLogWidget extends BaseWidget<FeedEntry> {
  private logElement: ReturnType<typeof contrib.log> | null = null;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly entries: FeedLogEntry[] = [];

  constructor(config: FeedLogConfig) {
    super(config);
    this.maxEntries = config.maxEntries;
    this.now = config.now ?? Date.now;
  }

  create(grid: DashboardGrid, position: GridPosition): void {
    this.logElement = grid.set(
      position.row,
      position.col,
      position.rowSpan,
      position.colSpan,
      contrib.log,
      {
        label: ' Live Feed ',
        tags: true,
        fg: this.theme.text,
        selectedFg: this.theme.background,
        border: this.borderStyle(),
        bufferLength: this.maxEntries,
      },
    );

    this.element = this.logElement as unknown as blessed.Widgets.BlessedElement;
  }

  /**
   * Appends every line of an entry.
   */
  update(entry: FeedEntry): void {
    const timestamp = this.now();
    for (const text of entry.lines) {
      const line: FeedLogEntry = { timestamp, severity: entry.severity, text };
      this.entries.push(line);
      this.appendToWidget(line);
    }
    this.pruneEntries();
  }

  /**
   * Returns all retained lines.
   */
  getEntries(): readonly FeedLogEntry[] {
    return this.entries;
  }

  /**
   * Removes oldest lines if the buffer is full.
   */
  private pruneEntries(): void {
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  private appendToWidget(entry: FeedLogEntry): void {
    if (!this.logElement) return;

    const muted = this.theme.textMuted;
    const color = severityColor(this.theme, entry.severity);

    this.logElement.log(
      `{${muted}-fg}${formatClock(new Date(entry.timestamp))}{/${muted}-fg} ` +
        `{${color}-fg}${escapeTags(entry.text)}{/${color}-fg}`,
    );
  }
}
