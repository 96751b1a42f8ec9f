import { ClientError } from '../error/clientError.js';
import { transportErrorMessage } from '../fetch/utils.js';
import { ApiResource } from '../resource/apiResource.js';
import type { ApiResponse } from '../response/apiResponse.js';
import { handleApiResponse } from '../response/handlers.js';
import { basicAuthorization, createOAuth2Session, type OAuth2Session } from '../session/oauth2.js';
import { bearerTokenSchema } from '../session/schemas.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { ClientConfig, RuntimeConfig } from './config.js';
import { ClientContext } from './context.js';

/** Configuration for constructing an {@link AppClient}. */
export interface AppClientProps extends ClientConfig {
  consumerKey: string;
  consumerSecret: string;
  /** Bearer token from an earlier {@link AppClient.getAccessToken}. */
  accessToken?: string | null;
  /** @default 'bearer' */
  tokenType?: string;
}

/** Options for {@link AppClient.getAccessToken}. */
export interface BearerTokenOptions {
  /**
   * Store the returned token on the client.
   * @default true
   */
  autoSetToken?: boolean;
  signal?: AbortSignal;
}

/** Token returned by the client-credentials grant. */
export interface BearerToken {
  accessToken: string;
  tokenType: string;
}

/**
 * Client acting on behalf of the application only, authenticated with an OAuth2
 * bearer token obtained through the client-credentials grant.
 *
 * @example
 * const client = new AppClient({ consumerKey, consumerSecret });
 * const [errToken] = await client.getAccessToken();
 * const [err, response] = await client.api.child('search', 'tweets').get({ q: 'birds' });
 */
export class AppClient {
  #consumerKey: string;
  #consumerSecret: string;
  #accessToken: string | null;
  #tokenType: string;
  #ctx: ClientContext<OAuth2Session>;
  #root: ApiResource<ApiResponse>;

  constructor({ consumerKey, consumerSecret, accessToken, tokenType = 'bearer', ...config }: AppClientProps) {
    this.#consumerKey = consumerKey;
    this.#consumerSecret = consumerSecret;
    this.#accessToken = accessToken ?? null;
    this.#tokenType = tokenType;
    this.#ctx = new ClientContext({
      ...config,
      buildSession: (opts) => createOAuth2Session({ ...opts, accessToken: this.#accessToken }),
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

  get tokenType(): string {
    return this.#tokenType;
  }

  /** Session currently used for requests. */
  get session(): OAuth2Session {
    return this.#ctx.session;
  }

  config(opts: RuntimeConfig): void {
    this.#ctx.config(opts);
  }

  dispose(): void {
    this.#ctx.dispose();
  }

  /**
   * Obtains a bearer token with the consumer credentials.
   */
  async getAccessToken(opts: BearerTokenOptions = {}): SafeWrapAsync<ClientError, BearerToken> {
    const { autoSetToken = true, signal } = opts;
    const resourceUrl = this.#ctx.oauthUrl('token');
    const requestMethod = 'POST';

    const [errRequest, response] = await this.#ctx.session.request(requestMethod, resourceUrl, {
      form: { grant_type: 'client_credentials' },
      headers: { Authorization: basicAuthorization(this.#consumerKey, this.#consumerSecret) },
      signal,
    });
    if (errRequest) {
      return [new ClientError(transportErrorMessage(errRequest), { cause: errRequest }), null];
    }

    const [errText, text] = await safeWrapAsync(() => response.text());
    if (errText) {
      return [new ClientError(errText.message, { cause: errText }), null];
    }

    const [errParse, parsed] = safeWrap<Error, unknown>(() => JSON.parse(text));
    if (errParse) {
      return [this.#missingAccessToken(resourceUrl, response.status, errParse), null];
    }

    const [errValidate, body] = await validator(parsed, bearerTokenSchema);
    if (errValidate) {
      return [this.#missingAccessToken(resourceUrl, response.status, errValidate), null];
    }

    const token: BearerToken = { accessToken: body.access_token, tokenType: body.token_type };
    if (autoSetToken) {
      this.#accessToken = token.accessToken;
      this.#tokenType = token.tokenType;
      this.#ctx.rebuild('access token received');
    }

    return [null, token];
  }

  /**
   * Invalidates the stored bearer token. Only a 200 answer clears it from the client.
   *
   * @returns The token that was invalidated.
   */
  async invalidateAccessToken({ signal }: { signal?: AbortSignal } = {}): SafeWrapAsync<ClientError, string> {
    const accessToken = this.#accessToken;
    if (!accessToken) {
      return [new ClientError('No access token to invalidate.'), null];
    }

    const resourceUrl = this.#ctx.oauthUrl('invalidateToken');
    const requestMethod = 'POST';

    const [errRequest, response] = await this.#ctx.session.request(requestMethod, resourceUrl, {
      form: { access_token: accessToken },
      headers: { Authorization: basicAuthorization(this.#consumerKey, this.#consumerSecret) },
      signal,
    });
    if (errRequest) {
      return [new ClientError(transportErrorMessage(errRequest), { cause: errRequest }), null];
    }

    if (response.status !== 200) {
      this.#ctx.logger.debug(`${requestMethod} ${resourceUrl} answered ${response.status}`);
      return [new ClientError('Could not invalidate access token.', { resourceUrl, requestMethod }), null];
    }

    this.#accessToken = null;
    this.#ctx.rebuild('access token invalidated');

    return [null, accessToken];
  }

  #missingAccessToken(resourceUrl: string, status: number, cause: Error): ClientError {
    this.#ctx.logger.debug(`POST ${resourceUrl} answered ${status} without an access token`);
    return new ClientError('Response does not contain an access token.', { resourceUrl, requestMethod: 'POST', cause });
  }
}
