/**
 * Error entrypoint: exports the request errors and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the request builder.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { BodyReadError, getBodyReadError, isBodyReadError } from './bodyReadError.js';
export { ConfigError, isConfigError } from './configError.js';
export { ConstructRequestError, getConstructRequestError, isConstructRequestError } from './constructRequestError.js';
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
export { type BodyFormat, EncodeError, getEncodeError, isEncodeError } from './encodeError.js';
export { isErrorType } from './isErrorType.js';
export { isMissingRequestError, MissingRequestError } from './missingRequestError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
