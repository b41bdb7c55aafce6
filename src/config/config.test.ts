import { describe, expect, it } from 'vitest';
import { ConfigError } from '../error/configError.js';
import { DEFAULT_CLIENT_TIMEOUT, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to a one minute timeout and info logging', () => {
    const [err, config] = loadConfig({});

    expect(err).toBeNull();
    expect(DEFAULT_CLIENT_TIMEOUT).toBe(60_000);
    expect(config).toEqual({ timeoutMs: 60_000, logLevel: 'info' });
  });

  it('reads timeout and log level from the environment', () => {
    const [err, config] = loadConfig({
      FLUENTREQ_TIMEOUT_MS: '2500',
      FLUENTREQ_LOG_LEVEL: 'warn',
      NODE_ENV: 'production',
    });

    expect(err).toBeNull();
    expect(config).toEqual({ timeoutMs: 2500, logLevel: 'warn', nodeEnv: 'production' });
  });

  it('logs at debug by default when running locally', () => {
    const [, config] = loadConfig({ NODE_ENV: 'local' });

    expect(config?.logLevel).toBe('debug');
  });

  it('rejects a non-positive timeout', () => {
    const [err, config] = loadConfig({ FLUENTREQ_TIMEOUT_MS: '0' });

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(ConfigError);
    expect(err?.message.startsWith('error parsing config; FLUENTREQ_TIMEOUT_MS: ')).toBe(true);
  });

  it('rejects a timeout beyond what timers support', () => {
    const [err, config] = loadConfig({ FLUENTREQ_TIMEOUT_MS: '3000000000' });

    expect(config).toBeNull();
    expect(err?.message.startsWith('error parsing config; FLUENTREQ_TIMEOUT_MS: ')).toBe(true);
    expect(loadConfig({ FLUENTREQ_TIMEOUT_MS: '2147483647' })[1]?.timeoutMs).toBe(2_147_483_647);
  });

  it('rejects an unknown log level', () => {
    const [err] = loadConfig({ FLUENTREQ_LOG_LEVEL: 'verbose' });

    expect(err?.message.startsWith('error parsing config; FLUENTREQ_LOG_LEVEL: ')).toBe(true);
  });

  it('returns a frozen config', () => {
    const [, config] = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
  });
});
