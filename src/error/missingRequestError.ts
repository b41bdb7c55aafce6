import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a result request is sent without an underlying request builder.
 */
export class MissingRequestError extends Error {
  /** MissingRequestError error-name */
  static name = 'MissingRequestError';
}

/**
 * Type guard for {@link MissingRequestError}.
 */
export function isMissingRequestError(error: unknown): error is MissingRequestError {
  return isErrorType(MissingRequestError, error);
}
