/**
 * Formatting utilities for feed lines.
 */

/**
 * Status glyphs used in feed lines.
 */
export const Glyphs = {
  WELCOME: '🎉',
  CAPABILITIES: '📋',
  ERROR: '❌',
  WARNING: '⚠️',
  INFO: 'ℹ️',
  METRICS: '📊',
  NETWORK: '🌐',
  SERVICE: '🔧',
  BUSY: '🔄',
  ONLINE: '🟢',
  OFFLINE: '🔴',
  NOT_INSTALLED: '⚪',
  SCANNING: '🔍',
  IDLE: '💤',
  DEBUG: '🔍',
  UNKNOWN: '📨',
  STARTUP: '🚀',
  RECEIVING: '📡',
  DISCONNECTED: '🔌',
  STATISTICS: '📈',
} as const;

/**
 * Width of separator rules.
 */
export const RULE_WIDTH = 60;

/**
 * Indentation for continuation lines.
 */
export const INDENT = '   ';

/**
 * Horizontal rule made of `char`.
 *
 * @example
 * rule('-', 3)  // "---"
 */
export function rule(char: '=' | '-', width = RULE_WIDTH): string {
  return char.repeat(width);
}

/**
 * Formats a percentage with one decimal place.
 *
 * @example
 * formatPercent(55.25)  // "55.3%"
 */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Online/offline indicator for a flag.
 */
export function statusGlyph(up: boolean): string {
  return up ? Glyphs.ONLINE : Glyphs.OFFLINE;
}

/**
 * Calculates an integer percentage clamped to 0-100.
 */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(100, Math.round(value)));
}
