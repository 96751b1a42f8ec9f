/**
 * Error entrypoint: the client's error taxonomy plus helpers for identifying and unwrapping error types.
 * Use this when you only need to classify failures without importing the clients.
 * @module
 */

/** Error raised when a request or stream is aborted via AbortSignal. */
export { AbortError, isAbortError } from './abortError.js';
/** Remote API rejected the request. */
export { ApiError, type ApiErrorOptions, getApiError, isApiError } from './apiError.js';
/** Remote API refused the credentials. */
export { AuthError, getAuthError, isAuthError } from './authError.js';
/** Local, transport or misuse failure; never carries a status code. */
export { ClientError, type ClientErrorOptions, getClientError, isClientError } from './clientError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Missing key on a read-only JSON view. */
export { isPropertyError, PropertyError } from './propertyError.js';
/** Remote API is rate limiting the caller. */
export { getRateLimitError, isRateLimitError, RateLimitError } from './rateLimitError.js';
/** Token endpoint answered without a usable token. */
export { isTokenResponseError, TokenResponseError } from './tokenResponseError.js';
/** Base class of all client errors. */
export { getTwitterError, isTwitterError, TwitterError, type TwitterErrorOptions } from './twitterError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Request issued on an empty resource path. */
export { isUsageError, UsageError } from './usageError.js';
/** Payload rejected by a Standard Schema validator. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
