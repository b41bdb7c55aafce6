import { defaultConfig, loadConfig } from '../config/config.js';
import { createLogger } from '../logger/logger.js';
import type { HTTPClient, Transport } from '../types/request.js';

const [errConfig, config] = loadConfig();

/** Package logger, configured from the environment. */
export const logger = createLogger(config ?? defaultConfig);

if (errConfig) {
  logger.warn('invalid environment configuration, using defaults', { error: errConfig.message });
}

/** Transport backed by the global WHATWG `fetch`. */
export const fetchTransport: Transport = (request) => fetch(request);

/**
 * Client used when no client is attached to the request context: `fetch`, and a timeout of
 * one minute unless `FLUENTREQ_TIMEOUT_MS` says otherwise.
 */
export const defaultClient: HTTPClient = Object.freeze({
  timeout: (config ?? defaultConfig).timeoutMs,
  transport: fetchTransport,
  logger,
});
