/**
 * Dashboard type definitions.
 *
 * Themes and configuration for the terminal dashboard.
 */

import type { ThemeName } from '../config.js';
import type { FeedSeverity } from '../feed/types.js';

/**
 * Dashboard color theme configuration.
 */
export interface DashboardTheme {
  /** Primary accent color for borders and highlights */
  readonly primary: string;
  /** Color for successful/running states */
  readonly success: string;
  /** Color for warning states */
  readonly warning: string;
  /** Color for error/stopped states */
  readonly error: string;
  /** Default text color */
  readonly text: string;
  /** Muted text color for secondary information */
  readonly textMuted: string;
  /** Background color */
  readonly background: string;
}

/**
 * Internal feed log entry.
 */
export interface FeedLogEntry {
  /** Unix timestamp when the entry was shown */
  readonly timestamp: number;
  readonly severity: FeedSeverity;
  readonly text: string;
}

export const DARK_THEME: DashboardTheme = {
  primary: 'cyan',
  success: 'green',
  warning: 'yellow',
  error: 'red',
  text: 'white',
  textMuted: 'gray',
  background: 'black',
} as const;

export const LIGHT_THEME: DashboardTheme = {
  primary: 'blue',
  success: 'green',
  warning: 'yellow',
  error: 'red',
  text: 'black',
  textMuted: 'gray',
  background: 'white',
} as const;

export function getTheme(name: ThemeName): DashboardTheme {
  return name === 'dark' ? DARK_THEME : LIGHT_THEME;
}

/**
 * Color for a feed severity.
 */
export function severityColor(theme: DashboardTheme, severity: FeedSeverity): string {
  switch (severity) {
    case 'success':
      return theme.success;
    case 'warning':
      return theme.warning;
    case 'error':
      return theme.error;
    case 'info':
      return theme.text;
  }
}

/**
 * Escapes blessed tag delimiters in user-supplied text.
 */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (brace) => (brace === '{' ? '{open}' : '{close}'));
}
