import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP methods the API is reached with. */
export type HttpMethod = 'GET' | 'POST';

/**
 * How a request is carried out.
 * - `buffered`: the response is read completely before it is handed on.
 * - `stream`: the connection stays open and the body is read incrementally.
 */
export type TransportMode = 'buffered' | 'stream';

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Serialized request body. */
  body?: URLSearchParams | FormData | string;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Response as returned by the transport. */
export type FetchResponse = Response;

/** Contract for HTTP transports used by the clients' sessions. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request against an absolute URL. */
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a POST request against an absolute URL. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the transport with default options */
  new (opts?: FetchClientOptions): FetchClientProviderDefinition;
}
