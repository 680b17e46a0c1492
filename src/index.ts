/**
 * exo-feed - live monitoring client for the management server's
 * newline-delimited JSON event stream.
 *
 * This module provides the public API for the exo-feed library.
 */

export const VERSION = '0.1.0' as const;

// Wire protocol
export * from './protocol/index.js';

// Aggregated state
export * from './state/index.js';

// Message routing
export * from './router/index.js';

// Feed output
export * from './feed/index.js';

// Session client
export * from './client/index.js';

// Terminal dashboard
export * from './tui/index.js';

// Configuration & logging
export {
  DEFAULT_CLIENT_CONFIG,
  ENV_VARS,
  LOG_LEVELS,
  configFromEnv,
  resolveConfig,
  validateConfig,
  isLogLevel,
} from './config.js';
export type { ClientConfig, OutputMode, ThemeName, LogLevel } from './config.js';

export { createLogger, createSilentLogger } from './logging.js';
export type { Logger, LoggerOptions } from './logging.js';
