import { mergeHeaderOptions } from '../fetch/utils.js';
import type { FetchResponse, HttpMethod } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { sendRequest } from './request.js';
import type { Session, SessionOptions, SessionRequestOptions } from './types.js';

/** Options for {@link createOAuth2Session}. */
export interface OAuth2SessionOptions extends SessionOptions {
  /** Bearer token; without one requests go out unauthenticated. */
  accessToken?: string | null;
}

/**
 * Application-only session sending the bearer token, when one is set.
 * Per-request headers win, which is how token requests switch to Basic auth.
 */
export class OAuth2Session implements Session {
  readonly kind = 'oauth2';
  #opts: OAuth2SessionOptions;

  constructor(opts: OAuth2SessionOptions) {
    this.#opts = opts;
  }

  get hasToken(): boolean {
    return Boolean(this.#opts.accessToken);
  }

  request(method: HttpMethod, url: string, opts: SessionRequestOptions = {}): SafeWrapAsync<Error, FetchResponse> {
    const { accessToken, userAgent, transport } = this.#opts;
    const defaults = {
      'User-Agent': userAgent,
      ...(accessToken ? { Authorization: `Bearer ${accessToken}` } : {}),
    };

    return sendRequest(transport, method, url, { ...opts, headers: mergeHeaderOptions(defaults, opts.headers) });
  }
}

/**
 * Builds an application-only session from the current bearer token.
 */
export function createOAuth2Session(opts: OAuth2SessionOptions): OAuth2Session {
  return new OAuth2Session(opts);
}

/**
 * HTTP Basic credentials for the OAuth2 token endpoints. Key and secret are
 * percent-encoded before they are joined.
 */
export function basicAuthorization(consumerKey: string, consumerSecret: string): string {
  const credentials = `${encodeURIComponent(consumerKey)}:${encodeURIComponent(consumerSecret)}`;
  return `Basic ${Buffer.from(credentials).toString('base64')}`;
}
