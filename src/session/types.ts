import type { FetchClientProviderDefinition, FetchResponse, HeaderOptions, HttpMethod } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Authentication scheme a session signs requests with. */
export type SessionKind = 'oauth1' | 'oauth2';

/** Wire-ready parts of a request, as produced by the parameter sanitizer. */
export interface SessionRequestOptions {
  /** Query-string values. */
  query?: Readonly<Record<string, string>>;
  /** Form values, urlencoded unless file parts are present. */
  form?: Readonly<Record<string, string>>;
  /** File parts; their presence turns the body into `multipart/form-data`. */
  files?: Readonly<Record<string, Blob>>;
  headers?: HeaderOptions;
  signal?: AbortSignal;
}

/**
 * Authenticated transport. A session is an immutable value; credential changes
 * produce a new session instead of modifying the current one.
 */
export interface Session {
  readonly kind: SessionKind;
  /** Signs and sends a request; any received response resolves, whatever its status. */
  request(method: HttpMethod, url: string, opts?: SessionRequestOptions): SafeWrapAsync<Error, FetchResponse>;
}

/** Options shared by every session factory. */
export interface SessionOptions {
  /** Transport the session sends through. */
  transport: FetchClientProviderDefinition;
  /** Sent as the `User-Agent` header on every request. */
  userAgent: string;
}
