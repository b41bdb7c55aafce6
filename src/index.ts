/**
 * Root entrypoint for fluentreq: re-exports the request builder, context helpers, types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Fluent builder for outbound HTTP requests.
 */
export { newRequest, RequestBuilder } from './core/request.js';

/**
 * Result stage created by `withResult`, `withJSONResult` and `withXMLResult`.
 */
export { type Decoder, ResultRequest, type SendOutcome } from './core/result.js';

/**
 * Request context carrying cancellation and the client used for sends.
 */
export {
  attachClientToContext,
  background,
  clientFromContext,
  type RequestContext,
  withSignal,
} from './context/context.js';

/** Client used when the context carries none, and its transport. */
export { defaultClient, fetchTransport } from './context/client.js';

/** Case-insensitive, multi-valued request header collection. */
export { canonicalHeaderKey, RequestHeaders } from './header/header.js';

export { JSON_MIME } from './codec/json.js';
export { XML_MIME } from './codec/xml.js';

/** Environment configuration of the default client. */
export { type Config, DEFAULT_CLIENT_TIMEOUT, type LogLevel, loadConfig } from './config/config.js';

export { createLogger, type RequestLogger } from './logger/logger.js';

export type { HTTPClient, HttpMethod, RequestBody, Transport } from './types/request.js';

/** Request errors and helpers for identifying them in a cause chain. */
export * from './error/index.js';

export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
