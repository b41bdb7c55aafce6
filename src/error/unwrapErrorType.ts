/** Constructor of an error class, used to match instances along a cause chain. */
// biome-ignore lint/suspicious/noExplicitAny: error classes take arbitrary constructor arguments
export type ErrorClass<T extends Error> = new (...args: any[]) => T;

/**
 * Whether an error carries the class name without being an instance of it, e.g. after being
 * re-thrown across a realm or flattened into a message string.
 */
function matchesByName(errorClass: ErrorClass<Error>, error: Error): boolean {
  return error.name === errorClass.name || error.message.startsWith(errorClass.name);
}

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const visited = new Set<object>();
  let current: unknown = err;

  while (current && typeof current === 'object' && !visited.has(current)) {
    visited.add(current);

    if (current instanceof errorClass) {
      return current;
    }

    if (current instanceof Error && matchesByName(errorClass, current)) {
      return current as T;
    }

    current = 'cause' in current ? current.cause : undefined;
  }

  return null;
}
