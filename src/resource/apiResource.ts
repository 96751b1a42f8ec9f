import type { RequestOptions, Requester } from '../core/types.js';
import type { TwitterError } from '../error/twitterError.js';
import { UsageError } from '../error/usageError.js';
import type { HttpMethod } from '../types/request.js';
import type { RequestParams } from '../utils/sanitizeParams.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Immutable node of the API path tree.
 *
 * Nodes are built with {@link child} and are never validated until a request is
 * issued with {@link get} or {@link post}. The first path segment selects the API
 * endpoint (sub-domain), the rest is the resource:
 *
 * @example
 * const [err, response] = await client.root.child('api', 'statuses', 'show').get({ id: 20 });
 *
 * @typeParam Result - What a successful request resolves to.
 */
export class ApiResource<Result> {
  #requester: Requester<Result>;
  #path: string | null;

  constructor(requester: Requester<Result>, path: string | null = null) {
    this.#requester = requester;
    this.#path = path;
  }

  /** Joined path of this node, `null` for the root. */
  get path(): string | null {
    return this.#path;
  }

  /**
   * Returns a new node below this one. Names are joined with `/` as given;
   * `child('a', 'b')`, `child('a/b')` and `child('a').child('b')` are the same path.
   */
  child(...names: string[]): ApiResource<Result> {
    if (names.length === 0) {
      return this;
    }

    const segments = this.#path === null ? names : [this.#path, ...names];
    return new ApiResource(this.#requester, segments.join('/'));
  }

  /**
   * Issues a GET request for this path, parameters going into the query string.
   */
  get(params: RequestParams = {}, opts: RequestOptions = {}): SafeWrapAsync<TwitterError, Result> {
    return this.#request('GET', params, opts);
  }

  /**
   * Issues a POST request for this path, parameters going into the form body.
   * Blob values turn the body into a multipart upload.
   */
  post(params: RequestParams = {}, opts: RequestOptions = {}): SafeWrapAsync<TwitterError, Result> {
    return this.#request('POST', params, opts);
  }

  toString(): string {
    return `<ApiResource: ${this.#path ?? '/'}>`;
  }

  async #request(method: HttpMethod, params: RequestParams, opts: RequestOptions): SafeWrapAsync<TwitterError, Result> {
    if (this.#path === null) {
      return [new UsageError(`Calling ${method.toLowerCase()}() on an empty API path is not supported.`), null];
    }

    return this.#requester.request(method, this.#path, params, opts);
  }
}
