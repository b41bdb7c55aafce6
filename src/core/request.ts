import { ReadableStream } from 'node:stream/web';
import type { StandardSchemaV1 } from '@standard-schema/spec';
import { createEncodingStream } from '../codec/stream.js';
import { decodeJSON, encodeJSON, JSON_MIME } from '../codec/json.js';
import { decodeXML, encodeXML, XML_MIME } from '../codec/xml.js';
import { clientFromContext, type RequestContext } from '../context/context.js';
import { ConstructRequestError } from '../error/constructRequestError.js';
import { RequestHeaders } from '../header/header.js';
import type { HttpMethod, RequestBody } from '../types/request.js';
import { createExchangeSignal, raceSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { createDecoder, noDecode, ResultRequest } from './result.js';

/**
 * Where the body of a send comes from. Replayable sources produce a fresh body for every
 * send; a caller-supplied stream can be sent once.
 */
type BodySource =
  | { readonly replayable: true; readonly produce: () => RequestBody }
  | { readonly replayable: false; readonly stream: ReadableStream<Uint8Array> };

/**
 * A response together with the release of its exchange: the listener on the context
 * signal and the timeout timer.
 */
export interface Exchange {
  readonly response: Response;
  /** Detaches from the context signal and clears the timeout. */
  release(): void;
}

/**
 * Fluent builder for a single outbound HTTP request.
 *
 * Configuration calls never fail and return the builder itself. `send` resolves the client
 * from the context, applies the effective timeout and hands the request to the client's
 * transport, returning the raw response with its body unread.
 *
 * Builders are single-owner and not safe for concurrent sends.
 *
 * @example
 * const [err, res] = await newRequest()
 *   .withBearerAuth(token)
 *   .withJSONBody({ message: 'hi' })
 *   .withJSONResult(schema)
 *   .send(ctx, 'POST', 'https://api.example.com/messages');
 */
export class RequestBuilder {
  /** Accumulated request headers. */
  #header = new RequestHeaders();
  /** Timeout override in milliseconds; `undefined` uses the client's. */
  #timeout?: number | false;
  /** Body of the request, if any. */
  #body: BodySource | null = null;
  /** Whether the one-shot body stream was handed to a send already. */
  #streamSent = false;

  /** Headers configured so far. */
  get header(): RequestHeaders {
    return this.#header;
  }

  /**
   * Overrides the client's timeout for sends of this builder. The client itself is left as is.
   *
   * @param ms - Timeout in milliseconds, or `false` for none.
   */
  withTimeout(ms: number | false): this {
    this.#timeout = ms;
    return this;
  }

  /**
   * Sets the body of the request, without touching `Content-Type`.
   *
   * A `ReadableStream` can only be sent once; other body kinds are resent as they are.
   */
  withBody(body: RequestBody): this {
    if (body instanceof ReadableStream) {
      this.#body = { replayable: false, stream: body };
      this.#streamSent = false;
    } else {
      this.#body = { replayable: true, produce: () => body };
    }

    return this;
  }

  /**
   * Sets the body to the JSON representation of `value` and `Content-Type` to `application/json`.
   *
   * Encoding happens when the transport reads the body, once per send. An encoding failure
   * therefore comes back from `send` as a transport failure caused by an `EncodeError`.
   */
  withJSONBody(value: unknown): this {
    this.#body = { replayable: true, produce: () => createEncodingStream(() => encodeJSON(value)) };
    this.#header.set('Content-Type', JSON_MIME);
    return this;
  }

  /**
   * Sets the body to the XML representation of the element map `value` and `Content-Type`
   * to `application/xml`. Encoded lazily, like {@link RequestBuilder.withJSONBody}.
   */
  withXMLBody(value: unknown): this {
    this.#body = { replayable: true, produce: () => createEncodingStream(() => encodeXML(value)) };
    this.#header.set('Content-Type', XML_MIME);
    return this;
  }

  /**
   * Sets the header entries associated with `key` to the single element `value`, replacing
   * any existing values. The key is case insensitive.
   */
  withHeader(key: string, value: string): this {
    this.#header.set(key, value);
    return this;
  }

  /**
   * Adds `value` to the header entries associated with `key`, keeping existing values.
   * The key is case insensitive.
   */
  withMultiValuedHeader(key: string, value: string): this {
    this.#header.add(key, value);
    return this;
  }

  /** Sets `Content-Type`, replacing any existing value. */
  withContentType(value: string): this {
    return this.withHeader('Content-Type', value);
  }

  /** Sets `Accept`, replacing any existing value. */
  withAccept(value: string): this {
    return this.withHeader('Accept', value);
  }

  /**
   * Sets `Authorization` to HTTP Basic authentication: `Basic` followed by the base64 of
   * `username:password`. Only the first colon separates the two on the receiving end.
   */
  withBasicAuth(username: string, password: string): this {
    const credentials = Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
    return this.withHeader('Authorization', `Basic ${credentials}`);
  }

  /**
   * Sets `Authorization` to HTTP Bearer authentication with `token` as given.
   */
  withBearerAuth(token: string): this {
    return this.withHeader('Authorization', `Bearer ${token}`);
  }

  /**
   * Returns a {@link ResultRequest} whose `send` reads the whole response body and returns it
   * as raw bytes alongside the response.
   */
  withResult(): ResultRequest<undefined> {
    return new ResultRequest(this, noDecode);
  }

  /**
   * Returns a {@link ResultRequest} decoding the response body as JSON, validated by `schema`
   * when one is given. Sets `Accept` to `application/json` unless an Accept header is set.
   */
  withJSONResult(): ResultRequest<unknown>;
  withJSONResult<Schema extends StandardSchemaV1>(schema: Schema): ResultRequest<StandardSchemaV1.InferOutput<Schema>>;
  withJSONResult(schema?: StandardSchemaV1): ResultRequest<unknown> {
    if (!this.#header.has('Accept')) {
      this.#header.set('Accept', JSON_MIME);
    }

    return new ResultRequest(this, createDecoder('json', decodeJSON, schema));
  }

  /**
   * Returns a {@link ResultRequest} decoding the response body as XML, validated by `schema`
   * when one is given. Sets `Accept` to `application/xml` unless an Accept header is set.
   */
  withXMLResult(): ResultRequest<unknown>;
  withXMLResult<Schema extends StandardSchemaV1>(schema: Schema): ResultRequest<StandardSchemaV1.InferOutput<Schema>>;
  withXMLResult(schema?: StandardSchemaV1): ResultRequest<unknown> {
    if (!this.#header.has('Accept')) {
      this.#header.set('Accept', XML_MIME);
    }

    return new ResultRequest(this, createDecoder('xml', decodeXML, schema));
  }

  /**
   * Sends the request and returns the raw response. The response body is not read; the
   * caller drains or cancels it.
   *
   * The client comes from `ctx` (see {@link clientFromContext}). The effective timeout is the
   * builder's override, else the client's, and covers the exchange including the body read.
   * Cancelling `ctx` aborts the exchange until the response arrives; from then on the body
   * belongs to the caller.
   *
   * Errors:
   * - Invalid method, URL, headers or body, or a stream body that was sent before, are
   *   returned as `ConstructRequestError`.
   * - Transport failures are returned as the transport raised them.
   * - A timeout returns `TimeoutError`; cancellation returns the reason `ctx.signal` aborted with.
   */
  async send(ctx: RequestContext, method: HttpMethod, url: string | URL): SafeWrapAsync<Error, Response> {
    const [err, exchange] = await this.exchange(ctx, method, url, { detachOnResponse: true });
    if (err) {
      return [err, null];
    }

    return [null, exchange.response];
  }

  /**
   * Performs the exchange behind {@link RequestBuilder.send}, handing back the release of
   * its signal for callers that read the body themselves.
   *
   * Failures release the exchange before returning. With `detachOnResponse`, the context
   * signal is let go once the response arrives while the timeout keeps running.
   *
   * @internal
   */
  async exchange(
    ctx: RequestContext,
    method: HttpMethod,
    url: string | URL,
    { detachOnResponse = false }: { detachOnResponse?: boolean } = {},
  ): SafeWrapAsync<Error, Exchange> {
    const client = clientFromContext(ctx);
    const href = String(url);

    const [errBody, body] = this.#peekBody();
    if (errBody) {
      return [new ConstructRequestError(errBody, method, href), null];
    }

    const timeout = this.#timeout ?? client.timeout;
    const exchangeSignal = createExchangeSignal(ctx.signal, timeout);
    const { signal } = exchangeSignal;

    const [errRequest, request] = safeWrap(
      () =>
        new Request(url, {
          method,
          headers: this.#header.toHeaders(),
          body,
          signal,
          duplex: 'half',
        }),
    );
    if (errRequest) {
      exchangeSignal.dispose();
      return [
        new ConstructRequestError(`error constructing ${method} request to ${href}`, method, href, {
          cause: errRequest,
        }),
        null,
      ];
    }

    if (this.#body && !this.#body.replayable) {
      this.#streamSent = true;
    }

    client.logger?.debug('sending request', { method, url: href, timeout });

    const [errSend, response] = await safeWrapAsync(() => raceSignal(client.transport(request), signal));
    if (errSend) {
      exchangeSignal.dispose();
      client.logger?.debug('request failed', { method, url: href, error: errSend.message });
      return [errSend, null];
    }

    client.logger?.debug('received response', { method, url: href, status: response.status });

    if (detachOnResponse) {
      exchangeSignal.detach();
    }

    return [null, { response, release: exchangeSignal.dispose }];
  }

  /**
   * Body for the next send. Returns an error message when the body is a stream that was
   * handed to an earlier send. The stream only counts as sent once a request was built with it.
   */
  #peekBody(): [error: string, body: null] | [error: null, body: RequestBody | null] {
    const source = this.#body;
    if (!source) {
      return [null, null];
    }

    if (source.replayable) {
      return [null, source.produce()];
    }

    if (this.#streamSent) {
      return ['error request body stream already sent, stream bodies are single-use', null];
    }

    return [null, source.stream];
  }
}

/** Creates a new {@link RequestBuilder} with no headers, body or timeout override. */
export function newRequest(): RequestBuilder {
  return new RequestBuilder();
}
