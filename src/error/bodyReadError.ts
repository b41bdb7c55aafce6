import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when reading a response body fails after the response arrived.
 */
export class BodyReadError extends Error {
  /** BodyReadError error-name */
  static name = 'BodyReadError';
}

/**
 * Extract a {@link BodyReadError} from an unknown error value, following nested causes.
 */
export function getBodyReadError(error: unknown): null | BodyReadError {
  return unwrapErrorType(BodyReadError, error);
}

/**
 * Type guard for {@link BodyReadError}.
 */
export function isBodyReadError(error: unknown): error is BodyReadError {
  return isErrorType(BodyReadError, error);
}
