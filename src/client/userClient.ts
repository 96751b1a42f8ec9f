import { ClientError } from '../error/clientError.js';
import { isTokenResponseError } from '../error/tokenResponseError.js';
import { transportErrorMessage } from '../fetch/utils.js';
import { ApiResource } from '../resource/apiResource.js';
import { handleApiResponse } from '../response/handlers.js';
import type { ApiResponse } from '../response/apiResponse.js';
import { buildAuthorizationUrl, createOAuth1Session, type OAuth1Session } from '../session/oauth1.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { ClientConfig, RuntimeConfig } from './config.js';
import { ClientContext } from './context.js';

const MISSING_REQUEST_TOKEN_MESSAGE =
  'UserClient must be initialized with accessToken and accessTokenSecret to fetch authorized access token.';

/** Configuration for constructing a {@link UserClient}. */
export interface UserClientProps extends ClientConfig {
  consumerKey: string;
  consumerSecret: string;
  /** Access token, or a request token while the three-legged flow is in progress. */
  accessToken?: string | null;
  accessTokenSecret?: string | null;
}

/** Options for {@link UserClient.getRequestToken}. */
export interface RequestTokenOptions {
  /** Where the user authorizes the token; when set, `authUrl` is filled in. */
  baseAuthUrl?: string;
  /** Sent as `oauth_callback`. */
  callbackUrl?: string;
  /**
   * Store the returned token on the client.
   * @default true
   */
  autoSetToken?: boolean;
  /** Extra query parameters of the authorization URL, e.g. `force_login`. */
  authParams?: Record<string, string>;
  signal?: AbortSignal;
}

/** Options for {@link UserClient.getAccessToken}. */
export interface AccessTokenOptions {
  /**
   * Store the returned token on the client.
   * @default true
   */
  autoSetToken?: boolean;
  signal?: AbortSignal;
}

/** Token returned by the OAuth 1.0a token endpoints. */
export interface OAuthToken {
  oauthToken: string;
  oauthTokenSecret: string;
  /** Authorization URL, for request tokens fetched with a `baseAuthUrl`. */
  authUrl?: string;
  /** Every field of the token response, such as `user_id` or `oauth_callback_confirmed`. */
  params: Readonly<Record<string, string>>;
}

/**
 * Client acting on behalf of a user, authenticated with OAuth 1.0a.
 *
 * Also drives the three-legged flow: {@link getRequestToken} (or its sign-in and
 * authorize shortcuts), then {@link getAccessToken} with the verifier the user
 * brings back.
 *
 * @example
 * const client = new UserClient({ consumerKey, consumerSecret, accessToken, accessTokenSecret });
 * const [err, response] = await client.api.child('statuses', 'home_timeline').get({ count: 20 });
 */
export class UserClient {
  #consumerKey: string;
  #consumerSecret: string;
  #accessToken: string | null;
  #accessTokenSecret: string | null;
  #ctx: ClientContext<OAuth1Session>;
  #root: ApiResource<ApiResponse>;

  constructor({ consumerKey, consumerSecret, accessToken, accessTokenSecret, ...config }: UserClientProps) {
    this.#consumerKey = consumerKey;
    this.#consumerSecret = consumerSecret;
    this.#accessToken = accessToken ?? null;
    this.#accessTokenSecret = accessTokenSecret ?? null;
    this.#ctx = new ClientContext({
      ...config,
      buildSession: (opts) =>
        createOAuth1Session({
          ...opts,
          consumerKey: this.#consumerKey,
          consumerSecret: this.#consumerSecret,
          accessToken: this.#accessToken,
          accessTokenSecret: this.#accessTokenSecret,
        }),
    });
    this.#root = new ApiResource(this.#ctx.pipeline('buffered', handleApiResponse));
  }

  /** Root of the path tree; has no path of its own. */
  get root(): ApiResource<ApiResponse> {
    return this.#root;
  }

  /** Shortcut for `root.child(...names)`. */
  resource(...names: string[]): ApiResource<ApiResponse> {
    return this.#root.child(...names);
  }

  /** Resources of the `api` endpoint. */
  get api(): ApiResource<ApiResponse> {
    return this.#root.child('api');
  }

  /** Resources of the `upload` endpoint. */
  get upload(): ApiResource<ApiResponse> {
    return this.#root.child('upload');
  }

  get accessToken(): string | null {
    return this.#accessToken;
  }

  get accessTokenSecret(): string | null {
    return this.#accessTokenSecret;
  }

  /** Session currently used for signing. */
  get session(): OAuth1Session {
    return this.#ctx.session;
  }

  config(opts: RuntimeConfig): void {
    this.#ctx.config(opts);
  }

  dispose(): void {
    this.#ctx.dispose();
  }

  /**
   * Fetches a request token, the first step of the three-legged flow.
   *
   * @returns The token, with `authUrl` when `baseAuthUrl` was given. A `baseAuthUrl`
   * that cannot be parsed is a {@link ClientError}, and the token is not stored.
   */
  async getRequestToken({
    baseAuthUrl,
    callbackUrl,
    autoSetToken = true,
    authParams,
    signal,
  }: RequestTokenOptions = {}): SafeWrapAsync<ClientError, OAuthToken> {
    const session = callbackUrl ? this.#ctx.session.withCallback(callbackUrl) : this.#ctx.session;
    const url = this.#ctx.oauthUrl('requestToken');

    const [err, params] = await session.fetchToken(url, signal);
    if (err) {
      return [this.#tokenError(err, url), null];
    }

    const token = toOAuthToken(params);
    if (baseAuthUrl) {
      const [errUrl, authUrl] = buildAuthorizationUrl(baseAuthUrl, token.oauthToken, authParams);
      if (errUrl) {
        return [new ClientError(errUrl.message, { resourceUrl: baseAuthUrl, cause: errUrl }), null];
      }
      token.authUrl = authUrl;
    }

    if (autoSetToken) {
      this.#setToken(token, 'request token received');
    }

    return [null, token];
  }

  /**
   * {@link getRequestToken} with the "Sign in with Twitter" page as authorization URL.
   */
  getSigninToken(opts: Omit<RequestTokenOptions, 'baseAuthUrl'> = {}): SafeWrapAsync<ClientError, OAuthToken> {
    return this.getRequestToken({ ...opts, baseAuthUrl: this.#ctx.oauthUrl('authenticate') });
  }

  /**
   * {@link getRequestToken} with the authorize page, which always asks the user, as authorization URL.
   */
  getAuthorizeToken(opts: Omit<RequestTokenOptions, 'baseAuthUrl'> = {}): SafeWrapAsync<ClientError, OAuthToken> {
    return this.getRequestToken({ ...opts, baseAuthUrl: this.#ctx.oauthUrl('authorize') });
  }

  /**
   * Exchanges the stored request token and the user's verifier for an access token.
   * The client must hold both halves of the request token.
   */
  async getAccessToken(
    verifier: string,
    { autoSetToken = true, signal }: AccessTokenOptions = {},
  ): SafeWrapAsync<ClientError, OAuthToken> {
    if (!this.#accessToken || !this.#accessTokenSecret) {
      return [new ClientError(MISSING_REQUEST_TOKEN_MESSAGE), null];
    }

    const url = this.#ctx.oauthUrl('accessToken');
    const [err, params] = await this.#ctx.session.withVerifier(verifier).fetchToken(url, signal);
    if (err) {
      return [this.#tokenError(err, url), null];
    }

    const token = toOAuthToken(params);
    if (autoSetToken) {
      this.#setToken(token, 'access token received');
    }

    return [null, token];
  }

  #setToken({ oauthToken, oauthTokenSecret }: OAuthToken, reason: string): void {
    this.#accessToken = oauthToken;
    this.#accessTokenSecret = oauthTokenSecret;
    this.#ctx.rebuild(reason);
  }

  #tokenError(err: Error, resourceUrl: string): ClientError {
    this.#ctx.logger.debug(`POST ${resourceUrl} did not return a token`, String(err));
    if (isTokenResponseError(err)) {
      return new ClientError('Response does not contain a token.', { resourceUrl, requestMethod: 'POST', cause: err });
    }

    return new ClientError(transportErrorMessage(err), { cause: err });
  }
}

function toOAuthToken(params: Record<string, string>): OAuthToken {
  return {
    oauthToken: params.oauth_token,
    oauthTokenSecret: params.oauth_token_secret,
    params: Object.freeze({ ...params }),
  };
}
