import { ApiError } from '../error/apiError.js';
import { AuthError } from '../error/authError.js';
import { ClientError } from '../error/clientError.js';
import { RateLimitError } from '../error/rateLimitError.js';
import type { TwitterError } from '../error/twitterError.js';
import type { ResponseContext } from '../types/response.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { ApiResponse } from './apiResponse.js';
import { decodeJson, isJsonArray, JsonObject, type JsonValue } from './jsonObject.js';
import { StreamResponse } from './streamResponse.js';

const UNKNOWN_ERROR_MESSAGE = 'An unknown error has occured processing your request.';
const INVALID_RESOURCE_MESSAGE = 'Invalid API resource.';
const BAD_AUTHENTICATION_MESSAGE = 'Bad Authentication data';

/** Error code and message reported in an error body. */
interface ErrorDetails {
  code: number | string | null;
  message: string;
}

/**
 * Picks the error details out of a decoded error body.
 *
 * `errors` may be a list (the first entry is used) or a single object; anything
 * else falls back to an unknown error without a code.
 */
export function extractErrorDetails(data: JsonValue): ErrorDetails {
  const details: ErrorDetails = { code: null, message: UNKNOWN_ERROR_MESSAGE };
  if (!(data instanceof JsonObject)) {
    return details;
  }

  const [, errors] = data.get('errors');
  const first = errors !== null && isJsonArray(errors) ? errors[0] : errors;
  if (!(first instanceof JsonObject)) {
    return details;
  }

  const [, code] = first.get('code');
  const [, message] = first.get('message');
  if (typeof code === 'number' || typeof code === 'string') {
    details.code = code;
  }
  if (typeof message === 'string') {
    details.message = message;
  }

  return details;
}

async function readText({ response, requestMethod, resourceUrl }: ResponseContext): SafeWrapAsync<ClientError, string> {
  const [errRead, text] = await safeWrapAsync(() => response.text());
  if (errRead) {
    return [new ClientError(errRead.message, { resourceUrl, requestMethod, cause: errRead }), null];
  }

  return [null, text];
}

/**
 * Maps a buffered REST response.
 *
 * - 200 resolves to an {@link ApiResponse}; a body that is not JSON decodes to `null`.
 * - 401, or a message mentioning bad authentication data, is an {@link AuthError}.
 * - 404 is an {@link ApiError} with the message `Invalid API resource.`
 * - 429 is a {@link RateLimitError}.
 * - Anything else is an {@link ApiError} carrying the body's error message and code.
 */
export async function handleApiResponse(ctx: ResponseContext): SafeWrapAsync<TwitterError, ApiResponse> {
  const { response, requestMethod, resourceUrl } = ctx;

  const [errRead, text] = await readText(ctx);
  if (errRead) {
    return [errRead, null];
  }

  const [, data] = decodeJson(text);

  if (response.status === 200) {
    return [null, new ApiResponse(response, requestMethod, resourceUrl, data)];
  }

  if (data === null) {
    return [new ApiError('Unable to decode JSON response.', { response, resourceUrl, requestMethod }), null];
  }

  const { code, message } = extractErrorDetails(data);
  const opts = { response, resourceUrl, requestMethod, errorCode: code };

  if (response.status === 401 || message.includes(BAD_AUTHENTICATION_MESSAGE)) {
    return [new AuthError(message, opts), null];
  }

  if (response.status === 404) {
    return [new ApiError(INVALID_RESOURCE_MESSAGE, opts), null];
  }

  if (response.status === 429) {
    return [new RateLimitError(message, opts), null];
  }

  return [new ApiError(message, opts), null];
}

/**
 * Maps the response of a streaming endpoint.
 *
 * A 200 keeps the connection open and resolves to a {@link StreamResponse}. On any
 * other status the body is read as plain text: 401 is an {@link AuthError}, 404 an
 * {@link ApiError}, 420 a {@link RateLimitError} and anything else an {@link ApiError}
 * carrying the raw body. The error code is the HTTP status.
 */
export async function handleStreamResponse(ctx: ResponseContext): SafeWrapAsync<TwitterError, StreamResponse> {
  const { response, requestMethod, resourceUrl, controller, release } = ctx;

  if (response.status === 200) {
    return [null, new StreamResponse({ response, requestMethod, resourceUrl, controller, release })];
  }

  const [errRead, text] = await readText(ctx);
  if (errRead) {
    return [errRead, null];
  }

  const opts = { response, resourceUrl, requestMethod, errorCode: response.status };

  switch (response.status) {
    case 401:
      return [new AuthError('Unauthorized.', opts), null];
    case 404:
      return [new ApiError(INVALID_RESOURCE_MESSAGE, opts), null];
    case 420:
      return [new RateLimitError(text, opts), null];
    default:
      return [new ApiError(text, opts), null];
  }
}
