import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request that could not be constructed from its method, URL and body.
 */
export class ConstructRequestError extends Error {
  /** ConstructRequestError error-name */
  static name = 'ConstructRequestError';
  /** Method the request was built with */
  #method: string;
  /** URL the request was built with */
  #url: string;

  /** Creates a new instance of a ConstructRequestError with accompanying method and URL input */
  constructor(message: string, method: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#method = method;
    this.#url = url;
  }

  /** Method the request was built with */
  get method(): string {
    return this.#method;
  }

  /** URL the request was built with */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract an {@link ConstructRequestError} from an unknown error value, following nested causes.
 */
export function getConstructRequestError(error: unknown): null | ConstructRequestError {
  return unwrapErrorType(ConstructRequestError, error);
}

/**
 * Type guard for {@link ConstructRequestError}.
 */
export function isConstructRequestError(error: unknown): error is ConstructRequestError {
  return isErrorType(ConstructRequestError, error);
}
