/**
 * Root entrypoint for birdsong: re-exports the clients, response types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client acting on behalf of a user, authenticated with OAuth 1.0a.
 */
export {
  type AccessTokenOptions,
  type OAuthToken,
  type RequestTokenOptions,
  UserClient,
  type UserClientProps,
} from './client/userClient.js';

/**
 * Application-only client, authenticated with an OAuth2 bearer token.
 */
export { AppClient, type AppClientProps, type BearerToken, type BearerTokenOptions } from './client/appClient.js';

/**
 * Client for the streaming endpoints.
 */
export { StreamClient, type StreamClientProps } from './client/streamClient.js';

/**
 * Settings shared by every client, and their defaults.
 */
export {
  type ClientConfig,
  DEFAULT_API_ENDPOINT_FORMAT,
  DEFAULT_API_VERSION,
  DEFAULT_USER_AGENT,
  type RuntimeConfig,
} from './client/config.js';

/** Per-request options accepted by `get()` and `post()`. */
export type { RequestOptions } from './core/types.js';

/**
 * Immutable node of the API path tree.
 */
export { ApiResource } from './resource/apiResource.js';

/**
 * Fully read REST response.
 */
export { ApiResponse } from './response/apiResponse.js';

/**
 * Open connection to a streaming endpoint.
 */
export { StreamResponse } from './response/streamResponse.js';

/**
 * Read-only view over decoded JSON.
 */
export { JsonObject, type JsonValue, type PlainJson } from './response/jsonObject.js';

/** HTTP transport used by default, and the contract for replacing it. */
export { FetchClient, type FetchClientOptions } from './fetch/client.js';
export type { FetchClientProvider, FetchClientProviderDefinition, HttpMethod } from './types/request.js';

/** Parameter values accepted by requests. */
export type { ParamValue, RequestParams } from './utils/sanitizeParams.js';

/** Logger contract and the adze-backed default. */
export { defaultLogger, type Logger } from './utils/logger.js';

/** Error-first result tuples returned by every fallible operation. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Error taxonomy and helpers for identifying and unwrapping error types.
 */
export * from './error/index.js';

/** Version of this package. */
export { VERSION } from './version.js';
