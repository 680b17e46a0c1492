/**
 * Shared base for the dashboard widgets.
 */

import type blessed from 'blessed';
import type contrib from 'blessed-contrib';
import type { DashboardTheme } from '../types.js';

export type DashboardGrid = InstanceType<typeof contrib.grid>;

/**
 * Cell range on the 12x12 dashboard grid.
 */
export interface GridPosition {
  readonly row: number;
  readonly col: number;
  readonly rowSpan: number;
  readonly colSpan: number;
}

export interface WidgetConfig {
  readonly theme: DashboardTheme;
}

/**
 * A widget owns one grid cell and renders one kind of data into it.
 */
export abstract class BaseWidget<TData> {
  protected readonly theme: DashboardTheme;
  protected element: blessed.Widgets.BlessedElement | null = null;

  constructor(config: WidgetConfig) {
    this.theme = config.theme;
  }

  /** Places the widget's element in a grid cell. */
  abstract create(grid: DashboardGrid, position: GridPosition): void;

  abstract update(data: TData): void;

  /** Removes the element from the screen. Safe before `create`. */
  destroy(): void {
    this.element?.destroy();
    this.element = null;
  }

  protected borderStyle(): Record<string, unknown> {
    return { type: 'line', fg: this.theme.primary };
  }
}
