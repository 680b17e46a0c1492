export { BaseWidget } from './base-widget.js';
export type { DashboardGrid, GridPosition, WidgetConfig } from './base-widget.js';
export { FeedLogWidget } from './feed-log.js';
export type { FeedLogConfig } from './feed-log.js';
export { UsageGaugeWidget, getColorForPercent } from './usage-gauge.js';
export type { UsageGaugeData, UsageGaugeConfig } from './usage-gauge.js';
export { CountersTableWidget, buildCounterRows } from './counters-table.js';
