import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { DecodeError } from '../error/decodeError.js';
import { EncodeError } from '../error/encodeError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** MIME type sent and accepted for XML bodies. */
export const XML_MIME = 'application/xml';

/**
 * Options shared by the builder and the parser, so documents round-trip.
 * Attributes are written and read as `@_name` keys, text next to attributes as `#text`.
 */
const xmlOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
} as const;

const builder = new XMLBuilder(xmlOptions);
/** Text and attribute values are kept as strings; schemas coerce where numbers are wanted. */
const parser = new XMLParser({ ...xmlOptions, parseTagValue: false, parseAttributeValue: false });

/**
 * Serializes an element map (e.g. `{ note: { to: 'Tove' } }`) to XML text.
 */
export function encodeXML(value: unknown): SafeWrap<EncodeError, string> {
  if (value === null || typeof value !== 'object') {
    return [new EncodeError(`error encoding XML body, expected an element map, got ${value === null ? 'null' : typeof value}`, 'xml'), null];
  }

  const [err, xml] = safeWrap((): unknown => builder.build(value));
  if (err) {
    return [new EncodeError('error encoding XML body', 'xml', { cause: err }), null];
  }

  if (typeof xml !== 'string') {
    return [new EncodeError('error encoding XML body, builder returned no text', 'xml'), null];
  }

  return [null, xml];
}

/**
 * Parses UTF-8 encoded XML bytes into an element map.
 */
export function decodeXML(data: Uint8Array): SafeWrap<DecodeError, unknown> {
  const text = new TextDecoder().decode(data);

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    return [new DecodeError(`error decoding XML result, ${code} at ${line}:${col}: ${msg}`, 'xml'), null];
  }

  const [err, value] = safeWrap((): unknown => parser.parse(text));
  if (err) {
    return [new DecodeError('error decoding XML result', 'xml', { cause: err }), null];
  }

  return [null, value];
}
