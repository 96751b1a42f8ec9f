/** Any error class, including abstract ones, usable as an `instanceof` target. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
