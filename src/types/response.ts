import type { TwitterError } from '../error/twitterError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { FetchResponse, HttpMethod } from './request.js';

/** Everything a response handler needs to know about the request it answers. */
export interface ResponseContext {
  requestMethod: HttpMethod;
  /** Absolute URL the request was sent to. */
  resourceUrl: string;
  response: FetchResponse;
  /** Controller the request's signal derives from; streaming responses close through it. */
  controller: AbortController;
  /** Detaches the caller's signal from `controller` once the response no longer needs it. */
  release: VoidFunction;
}

/** Maps a received response onto a result or an error of the client's taxonomy. */
export type ResponseHandler<Result> = (ctx: ResponseContext) => SafeWrapAsync<TwitterError, Result>;
