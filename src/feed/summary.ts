/**
 * End-of-session statistics block.
 */

import type { AggregateSnapshot } from '../state/aggregate-store.js';
import type { FeedEntry } from './types.js';
import { Glyphs, formatPercent, rule } from './formatters.js';

/**
 * Builds the statistics lines printed when a session ends.
 *
 * @example
 * ```
 * ============================================================
 * 📈 STATISTICS
 * ============================================================
 * Total Messages: 3
 * Errors: 1
 * Warnings: 0
 * Info: 1
 * Average CPU: 55.2%
 * Average Memory: 70.0%
 * ```
 */
export function formatSummary(snapshot: AggregateSnapshot): string[] {
  const { counters } = snapshot;
  const lines = [
    '',
    rule('='),
    `${Glyphs.STATISTICS} STATISTICS`,
    rule('='),
    `Total Messages: ${counters.total}`,
    `Errors: ${counters.errors}`,
    `Warnings: ${counters.warnings}`,
    `Info: ${counters.info}`,
  ];

  if (snapshot.averageCpu !== null) {
    lines.push(`Average CPU: ${formatPercent(snapshot.averageCpu)}`);
  }
  if (snapshot.averageMemory !== null) {
    lines.push(`Average Memory: ${formatPercent(snapshot.averageMemory)}`);
  }

  return lines;
}

export function summaryEntry(snapshot: AggregateSnapshot): FeedEntry {
  return { kind: 'summary', severity: 'info', lines: formatSummary(snapshot) };
}
