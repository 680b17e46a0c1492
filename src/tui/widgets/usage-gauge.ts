/**
 * Usage Gauge Widget for a utilization percentage.
 *
 * Shows a visual gauge with color-coded thresholds (green/yellow/red)
 * and the value in its label.
 */

import blessed from 'blessed';
import contrib from 'blessed-contrib';
import { BaseWidget, type DashboardGrid, type GridPosition, type WidgetConfig } from './base-widget.js';
import { clampPercent, formatPercent } from '../../feed/formatters.js';

export interface UsageGaugeData {
  /** Utilization percentage, `null` before the first sample */
  readonly percent: number | null;
}

export interface UsageGaugeConfig extends WidgetConfig {
  /** Resource name shown in the label, e.g. 'CPU' */
  readonly title: string;
}

/**
 * Usage threshold levels for color coding.
 */
const THRESHOLDS = {
  /** Below this percentage: green (healthy) */
  HEALTHY: 60,
  /** Below this percentage: yellow (warning) */
  WARNING: 80,
  /** Above WARNING: red (critical) */
} as const;

/**
 * Widget that displays one resource's utilization as a gauge.
 *
 * @example
 * ```
 * ┌─ CPU (55.2%) ───────────────┐
 * │ ███████████░░░░░░░░░ 55%    │
 * └─────────────────────────────┘
 * ```
 */
export class UsageGaugeWidget extends BaseWidget<UsageGaugeData> {
  private gaugeElement: ReturnType<typeof contrib.gauge> | null = null;
  private readonly title: string;

  constructor(config: UsageGaugeConfig) {
    super(config);
    this.title = config.title;
  }

  create(grid: DashboardGrid, position: GridPosition): void {
    this.gaugeElement = grid.set(
      position.row,
      position.col,
      position.rowSpan,
      position.colSpan,
      contrib.gauge,
      {
        label: this.buildLabel(null),
        stroke: this.theme.success,
        fill: this.theme.background,
        border: this.borderStyle(),
      },
    );

    this.element = this.gaugeElement as unknown as blessed.Widgets.BlessedElement;
  }

  update(data: UsageGaugeData): void {
    if (!this.gaugeElement) return;

    const percent = data.percent === null ? 0 : clampPercent(data.percent);

    // Access options directly (blessed-contrib types don't expose setOptions)
    (this.gaugeElement.options as { stroke?: string }).stroke = getColorForPercent(this.theme, percent);
    this.gaugeElement.setPercent(percent);
    this.gaugeElement.setLabel(this.buildLabel(data.percent));
  }

  /**
   * Label text for a value.
   */
  buildLabel(percent: number | null): string {
    return percent === null ? ` ${this.title} (-) ` : ` ${this.title} (${formatPercent(percent)}) `;
  }
}

/**
 * Gauge color for a given percentage.
 */
export function getColorForPercent(theme: WidgetConfig['theme'], percent: number): string {
  if (percent >= THRESHOLDS.WARNING) {
    return theme.error;
  }
  if (percent >= THRESHOLDS.HEALTHY) {
    return theme.warning;
  }
  return theme.success;
}
