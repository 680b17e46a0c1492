/**
 * Terminal dashboard renderer.
 *
 * Shows the live feed next to CPU and memory gauges and the session
 * counters, using blessed and blessed-contrib.
 *
 * @example
 * ```typescript
 * const tui = new TuiRenderer({ host: 'localhost', port: 52417 });
 * tui.start();
 *
 * const session = new MonitorSession({
 *   connection,
 *   renderer: tui,
 *   quitSource: tui.quitSource,
 * });
 * await session.run();
 * tui.close();
 * ```
 */

import blessed from 'blessed';
import contrib from 'blessed-contrib';
import type { ThemeName } from '../config.js';
import type { FeedEntry, FeedRenderer } from '../feed/types.js';
import type { AggregateSnapshot } from '../state/aggregate-store.js';
import { BaseQuitSource } from '../client/quit-source.js';
import { getTheme, type DashboardTheme } from './types.js';
import {
  CountersTableWidget,
  FeedLogWidget,
  UsageGaugeWidget,
  type DashboardGrid,
  type GridPosition,
} from './widgets/index.js';

// =============================================================================
// Configuration
// =============================================================================

export interface TuiRendererConfig {
  /** Server host shown in the status bar. */
  readonly host: string;
  /** Server port shown in the status bar. */
  readonly port: number;
  /** @default 'dark' */
  readonly theme: ThemeName;
  /** Maximum number of feed lines kept. @default 500 */
  readonly maxFeedLines: number;
}

export const DEFAULT_TUI_CONFIG: TuiRendererConfig = {
  host: 'localhost',
  port: 52417,
  theme: 'dark',
  maxFeedLines: 500,
};

/**
 * Keys that end the session.
 */
export const QUIT_KEYS = ['q', 'escape', 'C-c'];

const LAYOUT = {
  feed: { row: 0, col: 0, rowSpan: 10, colSpan: 8 },
  cpuGauge: { row: 0, col: 8, rowSpan: 2, colSpan: 4 },
  memoryGauge: { row: 2, col: 8, rowSpan: 2, colSpan: 4 },
  counters: { row: 4, col: 8, rowSpan: 6, colSpan: 4 },
  statusBar: { row: 10, col: 0, rowSpan: 2, colSpan: 12 },
} as const satisfies Record<string, GridPosition>;

// =============================================================================
// Quit Source
// =============================================================================

/**
 * Fires when a quit key is pressed on the dashboard screen.
 */
export class ScreenQuitSource extends BaseQuitSource {
  private screen: blessed.Widgets.Screen | null = null;
  private readonly onKey = (): void => this.fire('quit requested');

  attach(screen: blessed.Widgets.Screen): void {
    this.screen = screen;
    screen.key(QUIT_KEYS, this.onKey);
  }

  close(): void {
    if (this.screen) {
      this.screen.unkey(QUIT_KEYS.join(','), this.onKey);
      this.screen = null;
    }
  }
}

// =============================================================================
// TuiRenderer Class
// =============================================================================

export class TuiRenderer implements FeedRenderer {
  readonly quitSource = new ScreenQuitSource();

  private readonly config: TuiRendererConfig;
  private readonly theme: DashboardTheme;

  private screen: blessed.Widgets.Screen | null = null;
  private grid: DashboardGrid | null = null;
  private statusBar: blessed.Widgets.BoxElement | null = null;

  private readonly feedWidget: FeedLogWidget;
  private readonly cpuGauge: UsageGaugeWidget;
  private readonly memoryGauge: UsageGaugeWidget;
  private readonly countersTable: CountersTableWidget;

  private lastSnapshot: AggregateSnapshot | null = null;

  constructor(config: Partial<TuiRendererConfig> = {}) {
    this.config = { ...DEFAULT_TUI_CONFIG, ...config };
    this.theme = getTheme(this.config.theme);

    const widgetConfig = { theme: this.theme };
    this.feedWidget = new FeedLogWidget({ ...widgetConfig, maxEntries: this.config.maxFeedLines });
    this.cpuGauge = new UsageGaugeWidget({ ...widgetConfig, title: 'CPU' });
    this.memoryGauge = new UsageGaugeWidget({ ...widgetConfig, title: 'Memory' });
    this.countersTable = new CountersTableWidget(widgetConfig);
  }

  /**
   * Takes over the terminal and draws the layout.
   */
  start(): void {
    if (this.screen) return;

    this.initializeScreen();
    this.createLayout();
    this.draw();
  }

  isStarted(): boolean {
    return this.screen !== null;
  }

  render(entry: FeedEntry): void {
    this.feedWidget.update(entry);
    this.draw();
  }

  updateStats(snapshot: AggregateSnapshot): void {
    this.lastSnapshot = snapshot;
    const latest = snapshot.samples[snapshot.samples.length - 1];

    this.cpuGauge.update({ percent: latest ? latest.cpu : null });
    this.memoryGauge.update({ percent: latest ? latest.memory : null });
    this.countersTable.update(snapshot);
    this.updateStatusBar();
    this.draw();
  }

  /**
   * Feed lines retained by the log widget.
   */
  getFeedLines(): readonly string[] {
    return this.feedWidget.getEntries().map((entry) => entry.text);
  }

  /**
   * Restores the terminal. Safe to call more than once.
   */
  close(): void {
    this.quitSource.close();

    this.feedWidget.destroy();
    this.cpuGauge.destroy();
    this.memoryGauge.destroy();
    this.countersTable.destroy();

    if (this.statusBar) {
      this.statusBar.destroy();
      this.statusBar = null;
    }

    if (this.screen) {
      this.screen.destroy();
      this.screen = null;
    }
    this.grid = null;
  }

  // ===========================================================================
  // Screen Initialization
  // ===========================================================================

  private initializeScreen(): void {
    // Suppress blessed terminfo warnings
    const originalStderr = process.stderr.write.bind(process.stderr);
    const suppressedWrite = function (
      this: NodeJS.WriteStream,
      chunk: string | Uint8Array,
      encodingOrCb?: BufferEncoding | ((err?: Error | null) => void),
      cb?: (err?: Error | null) => void,
    ): boolean {
      const str = typeof chunk === 'string' ? chunk : chunk.toString();
      if (str.includes('Setulc') || str.includes('stack.push')) {
        return true;
      }
      if (typeof encodingOrCb === 'function') {
        return originalStderr(chunk, encodingOrCb);
      }
      return originalStderr(chunk, encodingOrCb, cb);
    };
    process.stderr.write = suppressedWrite as typeof process.stderr.write;

    this.screen = blessed.screen({
      smartCSR: true,
      title: 'exo-feed',
      fullUnicode: true,
      autoPadding: true,
      warnings: false,
    });

    process.stderr.write = originalStderr;

    this.quitSource.attach(this.screen);
  }

  private createLayout(): void {
    if (!this.screen) return;

    this.grid = new contrib.grid({ rows: 12, cols: 12, screen: this.screen });

    this.feedWidget.create(this.grid, LAYOUT.feed);
    this.cpuGauge.create(this.grid, LAYOUT.cpuGauge);
    this.memoryGauge.create(this.grid, LAYOUT.memoryGauge);
    this.countersTable.create(this.grid, LAYOUT.counters);
    this.createStatusBar();

    if (this.lastSnapshot) {
      this.countersTable.update(this.lastSnapshot);
    }
  }

  private createStatusBar(): void {
    if (!this.grid) return;

    const pos = LAYOUT.statusBar;
    this.statusBar = this.grid.set(pos.row, pos.col, pos.rowSpan, pos.colSpan, blessed.box, {
      tags: true,
      border: { type: 'line' },
      style: {
        fg: this.theme.text,
        bg: this.theme.background,
        border: { fg: this.theme.primary },
      },
    });
    this.updateStatusBar();
  }

  private updateStatusBar(): void {
    if (!this.statusBar) return;

    const { primary, textMuted } = this.theme;
    const total = this.lastSnapshot?.counters.total ?? 0;
    this.statusBar.setContent(
      ` {${primary}-fg}${this.config.host}:${this.config.port}{/${primary}-fg}` +
        ` | Messages: ${total}` +
        ` | {${textMuted}-fg}q/Esc: quit{/${textMuted}-fg}`,
    );
  }

  private draw(): void {
    if (this.screen) {
      this.screen.render();
    }
  }
}
