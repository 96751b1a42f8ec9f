import type { TwitterError } from '../error/twitterError.js';
import type { HeaderOptions, HttpMethod } from '../types/request.js';
import type { RequestParams } from '../utils/sanitizeParams.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Per-request options accepted by every terminal call. */
export interface RequestOptions {
  /** Cancels the request; for streams, also closes the open connection. */
  signal?: AbortSignal;
  /** Extra headers for this request only. */
  headers?: HeaderOptions;
}

/**
 * Issues requests for resource paths.
 *
 * @typeParam Result - What a successful request resolves to (a buffered or streaming response).
 */
export interface Requester<Result> {
  request(
    method: HttpMethod,
    path: string,
    params: RequestParams,
    opts: RequestOptions,
  ): SafeWrapAsync<TwitterError, Result>;
}
