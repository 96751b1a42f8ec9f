import { headersToRecord } from '../fetch/utils.js';
import type { FetchResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { TwitterError } from './twitterError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options accepted by {@link ApiError} and its refinements. */
export interface ApiErrorOptions extends ErrorOptions {
  /** Response the API answered with; supplies status, URL and headers. */
  response?: FetchResponse;
  /** URL used when the response does not report one. */
  resourceUrl?: string | null;
  requestMethod?: string | null;
  errorCode?: number | string | null;
}

/**
 * Error representing a request the remote API rejected.
 */
export class ApiError extends TwitterError {
  /** ApiError error-name */
  static name = 'ApiError';

  /** Creates a new ApiError from the rejecting response */
  constructor(message: string, { response, resourceUrl, requestMethod, errorCode, cause }: ApiErrorOptions = {}) {
    super(message, {
      requestMethod,
      errorCode,
      cause,
      resourceUrl: response?.url || resourceUrl,
      statusCode: response?.status,
      headers: response ? headersToRecord(response.headers) : null,
    });
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): ApiError | null {
  return unwrapErrorType(ApiError, error);
}
