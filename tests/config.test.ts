import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CLIENT_CONFIG,
  configFromEnv,
  isLogLevel,
  resolveConfig,
  validateConfig,
} from '../src/config.js';
import { ConfigError } from '../src/protocol/errors.js';

function configError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('Expected ConfigError');
}

describe('resolveConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveConfig()).toEqual({
      host: 'localhost',
      port: 52417,
      connectTimeoutMs: null,
      maxFrameBytes: null,
      performanceWindowSize: 100,
      mode: 'console',
      theme: 'dark',
      logLevel: 'warn',
    });
  });

  it('lets later overrides win', () => {
    const config = resolveConfig({ host: 'env-host', port: 6000 }, { port: 7000, mode: 'tui' });

    expect(config.host).toBe('env-host');
    expect(config.port).toBe(7000);
    expect(config.mode).toBe('tui');
  });

  it('does not modify the defaults', () => {
    resolveConfig({ host: 'elsewhere' });
    expect(DEFAULT_CLIENT_CONFIG.host).toBe('localhost');
  });

  it('collects every invalid value', () => {
    const error = configError(() => resolveConfig({ host: ' ', port: 0, maxFrameBytes: -1 }));

    expect(error.problems).toEqual([
      'Host address cannot be empty',
      'Invalid port number: 0. Must be between 1 and 65535.',
      'Invalid max frame size: -1. Must be a positive integer.',
    ]);
    expect(error.message).toBe(`Invalid configuration: ${error.problems.join('; ')}`);
  });
});

describe('validateConfig', () => {
  it('accepts the port range bounds', () => {
    expect(() => validateConfig({ ...DEFAULT_CLIENT_CONFIG, port: 1 })).not.toThrow();
    expect(() => validateConfig({ ...DEFAULT_CLIENT_CONFIG, port: 65535 })).not.toThrow();
  });

  it('rejects ports outside the range or not integers', () => {
    expect(() => validateConfig({ ...DEFAULT_CLIENT_CONFIG, port: 65536 })).toThrow(ConfigError);
    expect(() => validateConfig({ ...DEFAULT_CLIENT_CONFIG, port: 80.5 })).toThrow(ConfigError);
    expect(() => validateConfig({ ...DEFAULT_CLIENT_CONFIG, port: Number.NaN })).toThrow(ConfigError);
  });

  it('rejects a zero connect timeout and window size', () => {
    const error = configError(() =>
      validateConfig({ ...DEFAULT_CLIENT_CONFIG, connectTimeoutMs: 0, performanceWindowSize: 0 }),
    );
    expect(error.problems).toEqual([
      'Invalid connect timeout: 0. Must be a positive integer.',
      'Invalid performance window size: 0. Must be a positive integer.',
    ]);
  });
});

describe('configFromEnv', () => {
  it('reads host, port and log level', () => {
    expect(
      configFromEnv({ EXO_FEED_HOST: '10.0.0.5', EXO_FEED_PORT: '6000', EXO_FEED_LOG_LEVEL: 'debug' }),
    ).toEqual({ host: '10.0.0.5', port: 6000, logLevel: 'debug' });
  });

  it('ignores unset and empty variables', () => {
    expect(configFromEnv({ EXO_FEED_HOST: '' })).toEqual({});
  });

  it('leaves a non-numeric port for validation to reject', () => {
    const overrides = configFromEnv({ EXO_FEED_PORT: 'abc' });
    expect(() => resolveConfig(overrides)).toThrow('Invalid port number: NaN. Must be between 1 and 65535.');
  });

  it('rejects an unknown log level', () => {
    const error = configError(() => configFromEnv({ EXO_FEED_LOG_LEVEL: 'loud' }));
    expect(error.problems).toEqual([
      'Invalid EXO_FEED_LOG_LEVEL: loud. Must be one of silent, error, warn, info, debug, trace.',
    ]);
  });
});

describe('isLogLevel', () => {
  it('recognizes pino level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('fatal')).toBe(false);
  });
});
