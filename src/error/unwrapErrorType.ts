/** Constructor of an error class, abstract or concrete, with any parameter list. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Stops on the first non-error `cause` or when a cause chain loops back on itself.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const visited = new Set<Error>();
  let current = err;

  while (current instanceof Error && !visited.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    visited.add(current);
    current = current.cause;
  }

  return null;
}
