import { isErrorType } from './isErrorType.js';

/**
 * Error raised when environment configuration fails to parse.
 */
export class ConfigError extends Error {
  /** ConfigError error-name */
  static name = 'ConfigError';
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return isErrorType(ConfigError, error);
}
