import type { ReadableStream } from 'node:stream/web';
import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { RequestContext } from '../context/context.js';
import { BodyReadError } from '../error/bodyReadError.js';
import { DecodeError } from '../error/decodeError.js';
import type { BodyFormat } from '../error/encodeError.js';
import { MissingRequestError } from '../error/missingRequestError.js';
import type { HttpMethod } from '../types/request.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { RequestBuilder } from './request.js';

/** Turns the raw response body into the result value. */
export type Decoder<T> = (data: Uint8Array) => SafeWrapAsync<Error, T>;

/**
 * Outcome of a {@link ResultRequest} send.
 */
export interface SendOutcome<T> {
  /**
   * The HTTP response. Its body was read to completion and released; reading it again
   * fails, use {@link SendOutcome.rawData} instead.
   */
  readonly response: Response;
  /** Raw bytes of the response body. */
  readonly rawData: Uint8Array;
  /** Decoded result, `undefined` for {@link RequestBuilder.withResult}. */
  readonly data: T;
  /** The raw body decoded as UTF-8 text. */
  text(): string;
}

/** Decoder of results that only need the raw bytes. */
export const noDecode: Decoder<undefined> = async () => [null, undefined];

/**
 * Creates a decoder parsing the body with `parse` and, when given, validating the parsed value
 * against `schema`. Schema rejections are returned as a `DecodeError` caused by the `ValidationError`.
 */
export function createDecoder(
  format: BodyFormat,
  parse: (data: Uint8Array) => SafeWrap<DecodeError, unknown>,
  schema?: StandardSchemaV1,
): Decoder<unknown> {
  return async (data) => {
    const [errParse, value] = parse(data);
    if (errParse) {
      return [errParse, null];
    }

    if (!schema) {
      return [null, value];
    }

    const [errValidate, validated] = await validator(value, schema);
    if (errValidate) {
      return [new DecodeError(`error validating ${format.toUpperCase()} result`, format, { cause: errValidate }), null];
    }

    return [null, validated];
  };
}

/**
 * Reads a body stream to completion and concatenates its chunks. On failure the stream is
 * cancelled; the reader lock is released either way.
 */
async function readBody(body: ReadableStream<unknown> | null): SafeWrapAsync<Error, Uint8Array> {
  if (!body) {
    return [null, new Uint8Array(0)];
  }

  const reader = body.getReader();
  const [err, chunks] = await safeWrapAsync(async () => {
    const read: Uint8Array[] = [];
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        return read;
      }

      if (!(value instanceof Uint8Array)) {
        throw new TypeError(`error response body chunk is ${typeof value}, expected Uint8Array`);
      }

      read.push(value);
    }
  });
  if (err) {
    // An errored stream rejects the cancel with its own error; the read error is reported instead.
    await reader.cancel(err).catch(() => undefined);
  }
  reader.releaseLock();

  if (err) {
    return [err, null];
  }

  const data = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.byteLength, 0));
  let offset = 0;
  for (const chunk of chunks) {
    data.set(chunk, offset);
    offset += chunk.byteLength;
  }

  return [null, data];
}

/**
 * Second stage of a request: sends through its {@link RequestBuilder}, reads the whole
 * response body into memory and decodes it.
 *
 * Created by {@link RequestBuilder.withResult}, {@link RequestBuilder.withJSONResult} and
 * {@link RequestBuilder.withXMLResult}; it shares the builder's configuration, not a copy.
 *
 * @typeParam T - Decoded result type.
 */
export class ResultRequest<T> {
  /** Builder performing the send. */
  #request: RequestBuilder | null;
  /** Decoder applied to the body once it was read. */
  #decode: Decoder<T>;

  constructor(request: RequestBuilder | null | undefined, decode: Decoder<T>) {
    this.#request = request ?? null;
    this.#decode = decode;
  }

  /**
   * Sends the request, reads the response body to completion, and decodes it. The context
   * signal and the timeout cover the body read and are released once it is done.
   *
   * Errors:
   * - `MissingRequestError` when there is no builder to send with.
   * - Send failures of the builder, as returned by {@link RequestBuilder.send}.
   * - `BodyReadError` when reading the body fails part way.
   * - `DecodeError` when the body does not decode (or validate).
   *
   * No outcome is returned on any failure.
   */
  async send(ctx: RequestContext, method: HttpMethod, url: string | URL): SafeWrapAsync<Error, SendOutcome<T>> {
    if (!this.#request) {
      return [new MissingRequestError('error sending result request, missing request'), null];
    }

    const [errSend, exchange] = await this.#request.exchange(ctx, method, url);
    if (errSend) {
      return [errSend, null];
    }

    const { response } = exchange;
    const [errRead, rawData] = await readBody(response.body);
    exchange.release();
    if (errRead) {
      return [new BodyReadError('error reading response body', { cause: errRead }), null];
    }

    const [errDecode, data] = await this.#decode(rawData);
    if (errDecode) {
      return [errDecode, null];
    }

    return [
      null,
      {
        response,
        rawData,
        data,
        text: () => new TextDecoder().decode(rawData),
      },
    ];
  }
}
