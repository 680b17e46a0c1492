export type { FeedEntry, FeedKind, FeedSeverity, FeedRenderer } from './types.js';
export { ConsoleRenderer } from './console-renderer.js';
export type { ConsoleRendererOptions } from './console-renderer.js';
export { formatSummary, summaryEntry } from './summary.js';
export {
  Glyphs,
  INDENT,
  RULE_WIDTH,
  rule,
  formatPercent,
  statusGlyph,
  clampPercent,
} from './formatters.js';
