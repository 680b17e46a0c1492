#!/usr/bin/env node
/**
 * exo-feed - live feed client for the management server.
 *
 * Connects to the management server's event stream and prints status,
 * log and performance messages as they arrive. Statistics are printed
 * when the session ends.
 *
 * @example
 * ```bash
 * # Connect to localhost on the default port
 * exo-feed
 *
 * # Connect to a specific host and port
 * exo-feed --host 192.168.1.100 --port 52417
 *
 * # Full-screen dashboard
 * exo-feed --tui -t light
 * ```
 */

import { parseArgs } from 'node:util';
import {
  DEFAULT_CLIENT_CONFIG,
  ENV_VARS,
  LOG_LEVELS,
  configFromEnv,
  isLogLevel,
  resolveConfig,
  type ClientConfig,
} from '../config.js';
import { ConfigError } from '../protocol/errors.js';
import { createLogger } from '../logging.js';
import { MonitorConnection } from '../client/connection.js';
import { MonitorSession } from '../client/session.js';
import { KeyboardQuitSource, type QuitSource } from '../client/quit-source.js';
import { AggregateStore } from '../state/aggregate-store.js';
import { ConsoleRenderer } from '../feed/console-renderer.js';
import { Glyphs, rule } from '../feed/formatters.js';
import { formatSummary } from '../feed/summary.js';
import type { FeedRenderer } from '../feed/types.js';
import { TuiRenderer } from '../tui/tui-renderer.js';
import { VERSION } from '../index.js';

// =============================================================================
// CLI Argument Definition
// =============================================================================

const ARGS_OPTIONS = {
  host: { type: 'string', short: 'H' },
  port: { type: 'string', short: 'p' },
  tui: { type: 'boolean', default: false },
  theme: { type: 'string', short: 't' },
  'log-level': { type: 'string' },
  'max-frame-bytes': { type: 'string' },
  'connect-timeout': { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

type ParsedValues = ReturnType<typeof parseCli>['values'];

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, options: ARGS_OPTIONS, strict: true, allowPositionals: false });
}

// =============================================================================
// Help & Version Output
// =============================================================================

function printHelp(): void {
  const help = `
exo-feed - live feed client for the management server

USAGE:
  exo-feed [OPTIONS]

OPTIONS:
  -H, --host <address>        Server host address (default: ${DEFAULT_CLIENT_CONFIG.host})
  -p, --port <number>         Server port (default: ${DEFAULT_CLIENT_CONFIG.port})
      --tui                   Full-screen dashboard instead of a line feed
  -t, --theme <name>          Dashboard theme: dark, light (default: dark)
      --log-level <level>     Diagnostic log level: ${LOG_LEVELS.join(', ')} (default: ${DEFAULT_CLIENT_CONFIG.logLevel})
      --max-frame-bytes <n>   Drop frames larger than n bytes (default: unlimited)
      --connect-timeout <ms>  Give up connecting after ms milliseconds (default: wait)
  -h, --help                  Show this help message
  -v, --version               Show version number

ENVIRONMENT:
  ${ENV_VARS.HOST}, ${ENV_VARS.PORT}, ${ENV_VARS.LOG_LEVEL}

KEYS:
  q + Enter                   Quit (line feed)
  q, Escape, Ctrl+C           Quit (dashboard)
`.trim();

  console.log(help);
}

function printBanner(): void {
  console.log(`${Glyphs.STARTUP} exo-feed v${VERSION}`);
  console.log(rule('='));
  console.log('Live status, logs and performance metrics from the management server.');
  console.log("Press 'q' and Enter to quit");
  console.log(rule('='));
}

// =============================================================================
// Argument Validation
// =============================================================================

type Overrides = { -readonly [K in keyof ClientConfig]?: ClientConfig[K] };

function toOverrides(values: ParsedValues): Overrides {
  const errors: string[] = [];
  const overrides: Overrides = {};

  if (values.host !== undefined) overrides.host = values.host;
  if (values.port !== undefined) overrides.port = parseInteger(values.port);
  if (values.tui) overrides.mode = 'tui';

  if (values.theme !== undefined) {
    if (values.theme === 'dark' || values.theme === 'light') {
      overrides.theme = values.theme;
    } else {
      errors.push(`Invalid theme: ${values.theme}. Must be 'dark' or 'light'.`);
    }
  }

  const logLevel = values['log-level'];
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      overrides.logLevel = logLevel;
    } else {
      errors.push(`Invalid log level: ${logLevel}. Must be one of ${LOG_LEVELS.join(', ')}.`);
    }
  }

  const maxFrameBytes = values['max-frame-bytes'];
  if (maxFrameBytes !== undefined) overrides.maxFrameBytes = parseInteger(maxFrameBytes);

  const connectTimeout = values['connect-timeout'];
  if (connectTimeout !== undefined) overrides.connectTimeoutMs = parseInteger(connectTimeout);

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return overrides;
}

function parseInteger(text: string): number {
  return /^-?\d+$/.test(text.trim()) ? Number(text) : Number.NaN;
}

function exitWithUsageError(problems: readonly string[]): never {
  console.error('Error: Invalid arguments\n');
  for (const problem of problems) {
    console.error(`  - ${problem}`);
  }
  console.error('\nRun "exo-feed --help" for usage information.');
  process.exit(1);
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let args: ReturnType<typeof parseCli>;

  try {
    args = parseCli(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error('Run "exo-feed --help" for usage information.');
    process.exit(1);
  }

  if (args.values.help) {
    printHelp();
    process.exit(0);
  }

  if (args.values.version) {
    console.log(`exo-feed v${VERSION}`);
    process.exit(0);
  }

  let config: ClientConfig;
  try {
    config = resolveConfig(configFromEnv(), toOverrides(args.values));
  } catch (error) {
    if (error instanceof ConfigError) {
      exitWithUsageError(error.problems);
    }
    throw error;
  }

  const tui = config.mode === 'tui';
  const logger = createLogger({ level: tui ? 'silent' : config.logLevel });

  const connection = new MonitorConnection({
    host: config.host,
    port: config.port,
    connectTimeoutMs: config.connectTimeoutMs,
    maxFrameBytes: config.maxFrameBytes,
  });

  let renderer: FeedRenderer;
  let quitSource: QuitSource;
  if (tui) {
    const dashboard = new TuiRenderer({ host: config.host, port: config.port, theme: config.theme });
    dashboard.start();
    renderer = dashboard;
    quitSource = dashboard.quitSource;
  } else {
    printBanner();
    renderer = new ConsoleRenderer();
    quitSource = new KeyboardQuitSource();
  }

  const session = new MonitorSession({
    connection,
    renderer,
    quitSource,
    store: new AggregateStore(config.performanceWindowSize),
    logger,
  });

  const result = await session.run();
  renderer.close();

  if (result.status === 'connect_failed') {
    if (tui) {
      console.error(`${Glyphs.ERROR} Failed to connect to management server: ${result.error.message}`);
    }
    process.exit(1);
  }

  if (tui) {
    console.log(formatSummary(result.snapshot).join('\n'));
  }
  process.exit(0);
}

// =============================================================================
// Execute
// =============================================================================

main().catch((error: unknown) => {
  console.error('Unexpected error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
