/**
 * Client configuration.
 *
 * Values come from, lowest to highest precedence: built-in defaults,
 * environment variables, explicit overrides (command-line flags).
 */

import { ConfigError } from './protocol/errors.js';
import { DEFAULT_PERFORMANCE_WINDOW } from './state/aggregate-store.js';

/**
 * Output mode.
 *
 * - 'console': plain line feed on stdout
 * - 'tui': full-screen terminal dashboard
 */
export type OutputMode = 'console' | 'tui';

export type ThemeName = 'dark' | 'light';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug', 'trace'];

export interface ClientConfig {
  /** Management server host. @default 'localhost' */
  readonly host: string;
  /** Management server TCP port. @default 52417 */
  readonly port: number;
  /**
   * Connect timeout in milliseconds. `null` waits indefinitely.
   * @default null
   */
  readonly connectTimeoutMs: number | null;
  /**
   * Largest accepted frame in bytes. `null` accepts frames of any size.
   * @default null
   */
  readonly maxFrameBytes: number | null;
  /** Number of performance samples retained. @default 100 */
  readonly performanceWindowSize: number;
  /** @default 'console' */
  readonly mode: OutputMode;
  /** Dashboard color theme. @default 'dark' */
  readonly theme: ThemeName;
  /** Diagnostic log level. @default 'warn' */
  readonly logLevel: LogLevel;
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  host: 'localhost',
  port: 52417,
  connectTimeoutMs: null,
  maxFrameBytes: null,
  performanceWindowSize: DEFAULT_PERFORMANCE_WINDOW,
  mode: 'console',
  theme: 'dark',
  logLevel: 'warn',
};

/**
 * Environment variables read by {@link configFromEnv}.
 */
export const ENV_VARS = {
  HOST: 'EXO_FEED_HOST',
  PORT: 'EXO_FEED_PORT',
  LOG_LEVEL: 'EXO_FEED_LOG_LEVEL',
} as const;

/**
 * Reads overrides from environment variables. Unset or empty
 * variables are ignored.
 *
 * @throws ConfigError for a log level that does not exist
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
  const overrides: { -readonly [K in keyof ClientConfig]?: ClientConfig[K] } = {};

  const host = env[ENV_VARS.HOST];
  if (host) overrides.host = host;

  const port = env[ENV_VARS.PORT];
  if (port) overrides.port = Number(port);

  const logLevel = env[ENV_VARS.LOG_LEVEL];
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError([
        `Invalid ${ENV_VARS.LOG_LEVEL}: ${logLevel}. Must be one of ${LOG_LEVELS.join(', ')}.`,
      ]);
    }
    overrides.logLevel = logLevel;
  }

  return overrides;
}

/**
 * Merges overrides over defaults and validates the result. Later
 * overrides win; keys must be left out, not set to `undefined`.
 *
 * @throws ConfigError listing every invalid value
 */
export function resolveConfig(...overrides: readonly Partial<ClientConfig>[]): ClientConfig {
  const config = overrides.reduce<ClientConfig>(
    (acc, override) => ({ ...acc, ...override }),
    DEFAULT_CLIENT_CONFIG,
  );
  validateConfig(config);
  return config;
}

/**
 * @throws ConfigError listing every invalid value
 */
export function validateConfig(config: ClientConfig): void {
  const problems: string[] = [];

  if (config.host.trim() === '') {
    problems.push('Host address cannot be empty');
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    problems.push(`Invalid port number: ${config.port}. Must be between 1 and 65535.`);
  }

  if (config.connectTimeoutMs !== null && !isPositiveInteger(config.connectTimeoutMs)) {
    problems.push(`Invalid connect timeout: ${config.connectTimeoutMs}. Must be a positive integer.`);
  }

  if (config.maxFrameBytes !== null && !isPositiveInteger(config.maxFrameBytes)) {
    problems.push(`Invalid max frame size: ${config.maxFrameBytes}. Must be a positive integer.`);
  }

  if (!isPositiveInteger(config.performanceWindowSize)) {
    problems.push(
      `Invalid performance window size: ${config.performanceWindowSize}. Must be a positive integer.`,
    );
  }

  if (config.mode !== 'console' && config.mode !== 'tui') {
    problems.push(`Invalid mode: ${String(config.mode)}. Must be 'console' or 'tui'.`);
  }

  if (config.theme !== 'dark' && config.theme !== 'light') {
    problems.push(`Invalid theme: ${String(config.theme)}. Must be 'dark' or 'light'.`);
  }

  if (!isLogLevel(config.logLevel)) {
    problems.push(`Invalid log level: ${String(config.logLevel)}. Must be one of ${LOG_LEVELS.join(', ')}.`);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
