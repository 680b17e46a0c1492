/**
 * Terminal dashboard for the live feed.
 */

export { TuiRenderer, ScreenQuitSource, DEFAULT_TUI_CONFIG, QUIT_KEYS } from './tui-renderer.js';
export type { TuiRendererConfig } from './tui-renderer.js';
export { DARK_THEME, LIGHT_THEME, getTheme, severityColor, escapeTags } from './types.js';
export type { DashboardTheme, FeedLogEntry } from './types.js';
export * from './widgets/index.js';
