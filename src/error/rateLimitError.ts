import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * The API is rate limiting the caller: 429 on REST endpoints, 420 on streaming endpoints.
 */
export class RateLimitError extends ApiError {
  /** RateLimitError error-name */
  static name = 'RateLimitError';
}

/**
 * Type guard for {@link RateLimitError}.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return isErrorType(RateLimitError, error);
}

/**
 * Extract a {@link RateLimitError} from an unknown error value, following nested causes.
 */
export function getRateLimitError(error: unknown): RateLimitError | null {
  return unwrapErrorType(RateLimitError, error);
}
