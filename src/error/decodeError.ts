import type { BodyFormat } from './encodeError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a response body cannot be decoded into the expected result.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static name = 'DecodeError';
  /** Format that failed to decode */
  #format: BodyFormat;

  /** Creates a new instance of a DecodeError for the given format */
  constructor(message: string, format: BodyFormat, opts?: ErrorOptions) {
    super(message, opts);
    this.#format = format;
  }

  /** Format that failed to decode */
  get format(): BodyFormat {
    return this.#format;
  }
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}
