import { ReadableStream } from 'node:stream/web';
import type { SafeWrap } from '../utils/wrap.js';

/** Size of the chunks handed to the body reader per pull. */
export const ENCODE_CHUNK_SIZE = 16 * 1024;

/**
 * Creates a request body stream whose content is produced lazily by `encode`.
 *
 * Nothing is serialized until the consumer (usually the transport) first reads from the
 * stream. The encoded bytes are then handed over one chunk per read, so the stream never
 * queues more than the chunk currently being read. When `encode` fails, the stream errors
 * with that failure and the reader observes it as a read error.
 *
 * @param encode - Serializer returning `[error, text]`.
 */
export function createEncodingStream(encode: () => SafeWrap<Error, string>): ReadableStream<Uint8Array> {
  let encoded: Uint8Array | null = null;
  let offset = 0;

  return new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        if (!encoded) {
          const [err, text] = encode();
          if (err) {
            controller.error(err);
            return;
          }

          encoded = new TextEncoder().encode(text);
        }

        if (offset >= encoded.byteLength) {
          controller.close();
          return;
        }

        controller.enqueue(encoded.subarray(offset, offset + ENCODE_CHUNK_SIZE));
        offset += ENCODE_CHUNK_SIZE;
      },
    },
    { highWaterMark: 0 },
  );
}
