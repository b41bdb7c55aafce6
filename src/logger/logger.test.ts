import { describe, expect, it } from 'vitest';
import { createLogger, type RequestLogger } from './logger.js';

describe('createLogger', () => {
  it('uses the configured level', () => {
    const logger = createLogger({ logLevel: 'warn', nodeEnv: 'production' });

    expect(logger.level).toBe('warn');
    expect(logger.isDebugEnabled()).toBe(false);
    expect(logger.isWarnEnabled()).toBe(true);
  });

  it('is silent under test', () => {
    const logger = createLogger({ logLevel: 'debug', nodeEnv: 'test' });

    expect(logger.silent).toBe(true);
  });

  it('writes through a single console transport', () => {
    const logger = createLogger({ logLevel: 'info', nodeEnv: 'local' });

    expect(logger.transports).toHaveLength(1);
    expect(logger.silent).toBe(false);
  });

  it('satisfies the request logger contract', () => {
    const logger: RequestLogger = createLogger({ logLevel: 'info', nodeEnv: 'test' });

    expect(typeof logger.debug).toBe('function');
  });
});
