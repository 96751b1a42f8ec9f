import type {
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
  HttpMethod,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
}

/**
 * Thin wrapper around the native `fetch` API that:
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every received response is returned as-is, whatever its status; classifying
 * it is left to the response handlers.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default fetch options (headers). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client with default options */
  constructor(opts?: FetchClientOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request.
   *
   * @param url - Absolute URL, query string included.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('GET', url, opts);
  }

  /**
   * Executes a POST request.
   *
   * @param url - Absolute URL.
   * @param opts - Request options, body included, merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('POST', url, opts);
  }

  /**
   * Core request implementation used by the verb helpers.
   *
   * Network / fetch errors (including aborts) are wrapped in `Error` with the original as `cause`.
   */
  async #request(method: HttpMethod, url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        method,
        headers,
        body: opts.body,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }
}
