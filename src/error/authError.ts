import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * The API refused the request's credentials (401, or a "Bad Authentication data" message).
 */
export class AuthError extends ApiError {
  /** AuthError error-name */
  static name = 'AuthError';
}

/**
 * Type guard for {@link AuthError}.
 */
export function isAuthError(error: unknown): error is AuthError {
  return isErrorType(AuthError, error);
}

/**
 * Extract an {@link AuthError} from an unknown error value, following nested causes.
 */
export function getAuthError(error: unknown): AuthError | null {
  return unwrapErrorType(AuthError, error);
}
