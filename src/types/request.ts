import type { ReadableStream } from 'node:stream/web';
import type { RequestLogger } from '../logger/logger.js';

/** HTTP method; the well-known ones are suggested, any token is accepted. */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | (string & {});

/** Request body sources accepted by `withBody`. */
export type RequestBody = ReadableStream<Uint8Array> | Uint8Array | ArrayBuffer | Blob | URLSearchParams | string;

/**
 * Sends a fully formed request and resolves with the response, body unread.
 * Rejects on transport-level failures; HTTP error statuses are regular responses.
 */
export type Transport = (request: Request) => Promise<Response>;

/** HTTP client resolved from the request context for each send. */
export interface HTTPClient {
  /**
   * Timeout in milliseconds covering the whole exchange, `false` to disable.
   * A builder's `withTimeout` takes precedence without changing this value.
   */
  readonly timeout: number | false;
  /** Transport performing the exchange. */
  readonly transport: Transport;
  /** Logger receiving send diagnostics. */
  readonly logger?: RequestLogger;
}
