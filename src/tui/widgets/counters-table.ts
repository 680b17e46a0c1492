/**
 * Counters Table Widget showing session statistics.
 */

import blessed from 'blessed';
import contrib from 'blessed-contrib';
import type { AggregateSnapshot } from '../../state/aggregate-store.js';
import { formatPercent } from '../../feed/formatters.js';
import { BaseWidget, type DashboardGrid, type GridPosition, type WidgetConfig } from './base-widget.js';

/**
 * Row definitions with their extraction logic.
 */
const TABLE_ROWS: readonly { readonly label: string; readonly getValue: (s: AggregateSnapshot) => string }[] = [
  { label: 'Total Messages', getValue: (s) => String(s.counters.total) },
  { label: 'Errors', getValue: (s) => String(s.counters.errors) },
  { label: 'Warnings', getValue: (s) => String(s.counters.warnings) },
  { label: 'Info', getValue: (s) => String(s.counters.info) },
  { label: 'Samples', getValue: (s) => String(s.samples.length) },
  { label: 'Average CPU', getValue: (s) => (s.averageCpu === null ? '-' : formatPercent(s.averageCpu)) },
  { label: 'Average Memory', getValue: (s) => (s.averageMemory === null ? '-' : formatPercent(s.averageMemory)) },
];

/**
 * Builds the table rows for a snapshot.
 */
export function buildCounterRows(snapshot: AggregateSnapshot): string[][] {
  return TABLE_ROWS.map((row) => [row.label, row.getValue(snapshot)]);
}

/**
 * Widget that displays message counters and performance averages.
 *
 * @example
 * ```
 * Statistic        Value
 * Total Messages   3
 * Errors           1
 * Average CPU      55.2%
 * ```
 */
export class CountersTableWidget extends BaseWidget<AggregateSnapshot> {
  private tableElement: ReturnType<typeof contrib.table> | null = null;

  constructor(config: WidgetConfig) {
    super(config);
  }

  create(grid: DashboardGrid, position: GridPosition): void {
    this.tableElement = grid.set(
      position.row,
      position.col,
      position.rowSpan,
      position.colSpan,
      contrib.table,
      {
        keys: false,
        fg: this.theme.text,
        selectedFg: this.theme.text,
        selectedBg: this.theme.background,
        interactive: false,
        label: ' Statistics ',
        border: this.borderStyle(),
        columnSpacing: 2,
        columnWidth: [16, 10],
      },
    );

    this.element = this.tableElement as unknown as blessed.Widgets.BlessedElement;
  }

  update(snapshot: AggregateSnapshot): void {
    if (!this.tableElement) return;

    this.tableElement.setData({
      headers: ['Statistic', 'Value'],
      data: buildCounterRows(snapshot),
    });
  }
}
