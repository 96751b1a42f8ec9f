import { createHmac } from 'node:crypto';
import OAuth from 'oauth-1.0a';
import { TokenResponseError } from '../error/tokenResponseError.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { FetchResponse, HttpMethod } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { sendRequest } from './request.js';
import type { Session, SessionOptions, SessionRequestOptions } from './types.js';

/** Consumer and (optional) access credentials of a user-context session. */
export interface OAuth1Credentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken?: string | null;
  accessTokenSecret?: string | null;
}

/** Options for {@link createOAuth1Session}. */
export interface OAuth1SessionOptions extends OAuth1Credentials, SessionOptions {
  /** Sent as `oauth_callback` when requesting a request token. */
  callbackUrl?: string | null;
  /** Sent as `oauth_verifier` when exchanging a request token. */
  verifier?: string | null;
}

function hmacSha1(baseString: string, key: string): string {
  return createHmac('sha1', key).update(baseString).digest('base64');
}

/**
 * OAuth 1.0a session signing every request with HMAC-SHA1.
 *
 * Query values and urlencoded form values are part of the signature base;
 * multipart parts are not.
 */
export class OAuth1Session implements Session {
  readonly kind = 'oauth1';
  #opts: OAuth1SessionOptions;
  #oauth: OAuth;

  constructor(opts: OAuth1SessionOptions) {
    this.#opts = opts;
    this.#oauth = new OAuth({
      consumer: { key: opts.consumerKey, secret: opts.consumerSecret },
      signature_method: 'HMAC-SHA1',
      hash_function: hmacSha1,
    });
  }

  /** Whether requests are signed with an access (or request) token. */
  get hasToken(): boolean {
    return Boolean(this.#opts.accessToken);
  }

  /** New session that sends `oauth_callback`. */
  withCallback(callbackUrl: string): OAuth1Session {
    return new OAuth1Session({ ...this.#opts, callbackUrl });
  }

  /** New session that sends `oauth_verifier`. */
  withVerifier(verifier: string): OAuth1Session {
    return new OAuth1Session({ ...this.#opts, verifier });
  }

  /**
   * Computes the `Authorization` header value for a request.
   *
   * @param data - Every value that takes part in the signature base.
   */
  authorize(method: HttpMethod, url: string, data: Readonly<Record<string, string>>): string {
    const protocolParams = this.#protocolParams();
    const { accessToken, accessTokenSecret } = this.#opts;
    const token = accessToken ? { key: accessToken, secret: accessTokenSecret ?? '' } : undefined;

    const authorization = this.#oauth.authorize({ url, method, data: { ...data, ...protocolParams } }, token);
    const headerData = { ...authorization, ...protocolParams };

    return this.#oauth.toHeader(headerData).Authorization;
  }

  request(method: HttpMethod, url: string, opts: SessionRequestOptions = {}): SafeWrapAsync<Error, FetchResponse> {
    const { query = {}, form = {}, files = {} } = opts;
    const multipart = Object.keys(files).length > 0;
    const authorization = this.authorize(method, url, { ...query, ...(multipart ? {} : form) });

    return sendRequest(this.#opts.transport, method, url, {
      ...opts,
      headers: mergeHeaderOptions({ 'User-Agent': this.#opts.userAgent, Authorization: authorization }, opts.headers),
    });
  }

  /**
   * POSTs to an OAuth token endpoint and parses the form-encoded answer.
   *
   * @returns Every field of the response, `oauth_token` and `oauth_token_secret` guaranteed.
   * A denied request or a response without both token fields is a {@link TokenResponseError}.
   */
  async fetchToken(url: string, signal?: AbortSignal): SafeWrapAsync<Error, Record<string, string>> {
    const [errRequest, response] = await this.request('POST', url, { signal });
    if (errRequest) {
      return [errRequest, null];
    }

    const [errText, text] = await safeWrapAsync(() => response.text());
    if (errText) {
      return [new Error('error reading token response in fetchToken', { cause: errText }), null];
    }

    if (!response.ok) {
      const message = `error token request answered with ${response.status}: ${text}`;
      return [new TokenResponseError(message, response.status), null];
    }

    const params = Object.fromEntries(new URLSearchParams(text));
    if (!params.oauth_token || !params.oauth_token_secret) {
      return [new TokenResponseError('error token response is missing oauth_token', response.status), null];
    }

    return [null, params];
  }

  #protocolParams(): Record<string, string> {
    const { callbackUrl, verifier } = this.#opts;
    return {
      ...(callbackUrl ? { oauth_callback: callbackUrl } : {}),
      ...(verifier ? { oauth_verifier: verifier } : {}),
    };
  }
}

/**
 * Builds an OAuth 1.0a session from the current credentials.
 */
export function createOAuth1Session(opts: OAuth1SessionOptions): OAuth1Session {
  return new OAuth1Session(opts);
}

/**
 * URL the user is sent to for authorizing a request token.
 */
export function buildAuthorizationUrl(
  baseUrl: string,
  oauthToken: string,
  params: Readonly<Record<string, string>> = {},
): SafeWrap<Error, string> {
  const [errUrl, url] = safeWrap<Error, URL>(() => new URL(baseUrl));
  if (errUrl) {
    return [errUrl, null];
  }

  url.searchParams.set('oauth_token', oauthToken);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }

  return [null, url.toString()];
}
