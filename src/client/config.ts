import type { FetchClientOptions } from '../fetch/client.js';
import type { FetchClientProvider, HeaderOptions } from '../types/request.js';
import { formatEndpoint } from '../utils/constructResourceUrl.js';
import type { Logger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/** API version segment used when none is configured. */
export const DEFAULT_API_VERSION = '1.1';

/** Endpoint template used when none is configured; `{endpoint}` is the sub-domain. */
export const DEFAULT_API_ENDPOINT_FORMAT = 'https://{endpoint}.twitter.com';

/** `User-Agent` sent when none is configured. */
export const DEFAULT_USER_AGENT = `Birdsong Twitter Client v${VERSION}`;

/** Paths of the OAuth endpoints, relative to the `api` endpoint. */
export const OAUTH_PATHS = {
  requestToken: '/oauth/request_token',
  accessToken: '/oauth/access_token',
  authenticate: '/oauth/authenticate',
  authorize: '/oauth/authorize',
  token: '/oauth2/token',
  invalidateToken: '/oauth2/invalidate_token',
} as const;

/** Name of an OAuth endpoint. */
export type OAuthPath = keyof typeof OAUTH_PATHS;

/**
 * Absolute URL of an OAuth endpoint under the `api` endpoint.
 */
export function oauthUrl(apiEndpointFormat: string, name: OAuthPath): string {
  return `${formatEndpoint(apiEndpointFormat, 'api')}${OAUTH_PATHS[name]}`;
}

/** Settings shared by every client. */
export interface ClientConfig {
  /**
   * API version segment of every resource URL.
   * @default '1.1'
   */
  apiVersion?: string;
  /**
   * Base URL template; `{endpoint}` is replaced with the first path segment.
   * @default 'https://{endpoint}.twitter.com'
   */
  apiEndpointFormat?: string;
  /** `User-Agent` header of every request. */
  userAgent?: string;
  /** HTTP transport implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Default options handed to the transport. */
  fetchOpts?: FetchClientOptions;
  /** Where debug output goes. Defaults to the adze-backed logger. */
  logger?: Logger;
}

/** Settings that may change after a client was created. */
export interface RuntimeConfig {
  /** New `User-Agent`; the session is rebuilt with it. */
  userAgent?: string;
  /** Default headers merged into the transport's. */
  headers?: HeaderOptions;
}
