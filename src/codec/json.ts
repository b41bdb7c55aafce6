import { DecodeError } from '../error/decodeError.js';
import { EncodeError } from '../error/encodeError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** MIME type sent and accepted for JSON bodies. */
export const JSON_MIME = 'application/json';

/**
 * Serializes `value` to JSON text, without a trailing newline.
 *
 * Fails for values `JSON.stringify` cannot represent at the top level (`undefined`,
 * functions, symbols), and for cyclic structures or `BigInt`s.
 */
export function encodeJSON(value: unknown): SafeWrap<EncodeError, string> {
  const [err, text] = safeWrap(() => JSON.stringify(value));
  if (err) {
    return [new EncodeError('error encoding JSON body', 'json', { cause: err }), null];
  }

  if (typeof text !== 'string') {
    return [new EncodeError(`error encoding JSON body, ${typeof value} is not serializable`, 'json'), null];
  }

  return [null, text];
}

/**
 * Parses UTF-8 encoded JSON bytes.
 */
export function decodeJSON(data: Uint8Array): SafeWrap<DecodeError, unknown> {
  const [err, value] = safeWrap((): unknown => JSON.parse(new TextDecoder().decode(data)));
  if (err) {
    return [new DecodeError('error decoding JSON result', 'json', { cause: err }), null];
  }

  return [null, value];
}
