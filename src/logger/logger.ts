import { createLogger as createWinstonLogger, format, type Logger, transports } from 'winston';
import type { Config } from '../config/config.js';

/**
 * Subset of a logger the request builder writes to. A winston `Logger` satisfies it,
 * as do most console-shaped loggers.
 */
export interface RequestLogger {
  debug(message: string, meta?: Record<string, unknown>): unknown;
  warn(message: string, meta?: Record<string, unknown>): unknown;
}

function getLocalFormat() {
  return format.combine(format.printf(({ level, message, stack }) => [`${level}: ${String(message)}`, stack].filter(Boolean).join('\n')));
}

function getProductionFormat() {
  return format.combine(
    format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    format.ms(),
    format.json(),
  );
}

/**
 * Creates the package logger: console output, JSON lines with a timestamp in production,
 * plain text when `NODE_ENV=local`, silent when `NODE_ENV=test`.
 */
export function createLogger({ logLevel, nodeEnv }: Pick<Config, 'logLevel' | 'nodeEnv'>): Logger {
  const isLocalEnv = nodeEnv === 'local';

  return createWinstonLogger({
    level: logLevel,
    silent: nodeEnv === 'test',
    defaultMeta: { service: 'fluentreq' },
    transports: [
      new transports.Console({
        format: isLocalEnv ? getLocalFormat() : getProductionFormat(),
      }),
    ],
  });
}
