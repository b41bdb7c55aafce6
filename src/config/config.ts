import { z } from 'zod';
import { ConfigError } from '../error/configError.js';
import { MAX_TIMEOUT_MS } from '../utils/signals.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Timeout of the default client, one minute. */
export const DEFAULT_CLIENT_TIMEOUT = 60_000;

/** Log levels the package logger accepts, most to least severe. */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Package configuration resolved from the environment. */
export interface Config {
  /** Timeout of the default client in milliseconds. */
  readonly timeoutMs: number;
  /** Minimum level written by the package logger. */
  readonly logLevel: LogLevel;
  /** `NODE_ENV`; `test` silences logging, `local` switches to plain-text output. */
  readonly nodeEnv?: string;
}

/** Configuration used when the environment sets nothing. */
export const defaultConfig: Config = Object.freeze({
  timeoutMs: DEFAULT_CLIENT_TIMEOUT,
  logLevel: 'info',
});

const envSchema = z.object({
  FLUENTREQ_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  FLUENTREQ_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.string().optional(),
});

/**
 * Reads the package configuration from environment variables.
 *
 * - `FLUENTREQ_TIMEOUT_MS`: default client timeout, positive integer milliseconds up to 2^31-1.
 * - `FLUENTREQ_LOG_LEVEL`: `error`, `warn`, `info` or `debug`; `debug` by default when `NODE_ENV=local`.
 *
 * @returns `[ConfigError, null]` when a variable is set to an invalid value.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): SafeWrap<ConfigError, Config> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    return [new ConfigError(`error parsing config; ${issues}`, { cause: parsed.error }), null];
  }

  const { FLUENTREQ_TIMEOUT_MS, FLUENTREQ_LOG_LEVEL, NODE_ENV } = parsed.data;
  const config: Config = {
    timeoutMs: FLUENTREQ_TIMEOUT_MS ?? DEFAULT_CLIENT_TIMEOUT,
    logLevel: FLUENTREQ_LOG_LEVEL ?? (NODE_ENV === 'local' ? 'debug' : defaultConfig.logLevel),
    ...(NODE_ENV === undefined ? {} : { nodeEnv: NODE_ENV }),
  };

  return [null, Object.freeze(config)];
}
