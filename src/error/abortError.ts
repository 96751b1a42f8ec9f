import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request or stream is aborted through an `AbortSignal`.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Checks whether an {@link AbortError} is anywhere in the cause chain.
 */
export function isAbortError(error: unknown): boolean {
  return isErrorType(AbortError, error);
}
