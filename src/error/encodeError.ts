import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Body formats handled by the structured encoders and decoders. */
export type BodyFormat = 'json' | 'xml';

/**
 * Error raised while serializing a structured request body.
 *
 * The encoder runs when the transport starts reading the body, so this error reaches
 * the caller as the cause of a failed body read rather than from `withJSONBody`/`withXMLBody`.
 */
export class EncodeError extends Error {
  /** EncodeError error-name */
  static name = 'EncodeError';
  /** Format that failed to encode */
  #format: BodyFormat;

  /** Creates a new instance of an EncodeError for the given format */
  constructor(message: string, format: BodyFormat, opts?: ErrorOptions) {
    super(message, opts);
    this.#format = format;
  }

  /** Format that failed to encode */
  get format(): BodyFormat {
    return this.#format;
  }
}

/**
 * Extract an {@link EncodeError} from an unknown error value, following nested causes.
 */
export function getEncodeError(error: unknown): null | EncodeError {
  return unwrapErrorType(EncodeError, error);
}

/**
 * Type guard for {@link EncodeError}.
 */
export function isEncodeError(error: unknown): error is EncodeError {
  return isErrorType(EncodeError, error);
}
