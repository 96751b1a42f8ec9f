import { ApiResource } from '../resource/apiResource.js';
import { handleStreamResponse } from '../response/handlers.js';
import type { StreamResponse } from '../response/streamResponse.js';
import { createOAuth1Session, type OAuth1Session } from '../session/oauth1.js';
import type { ClientConfig, RuntimeConfig } from './config.js';
import { ClientContext } from './context.js';

/** Configuration for constructing a {@link StreamClient}; every credential is required. */
export interface StreamClientProps extends ClientConfig {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

/**
 * Client for the streaming endpoints. Requests keep the connection open and
 * resolve to a {@link StreamResponse} once the headers arrive.
 *
 * @example
 * const [err, response] = await client.stream.child('statuses', 'filter').post({ track: 'birds' });
 * if (response) {
 *   for await (const [errMessage, message] of response.stream()) {
 *     // ...
 *   }
 * }
 */
export class StreamClient {
  #ctx: ClientContext<OAuth1Session>;
  #root: ApiResource<StreamResponse>;

  constructor({ consumerKey, consumerSecret, accessToken, accessTokenSecret, ...config }: StreamClientProps) {
    this.#ctx = new ClientContext({
      ...config,
      buildSession: (opts) =>
        createOAuth1Session({ ...opts, consumerKey, consumerSecret, accessToken, accessTokenSecret }),
    });
    this.#root = new ApiResource(this.#ctx.pipeline('stream', handleStreamResponse));
  }

  /** Root of the path tree; has no path of its own. */
  get root(): ApiResource<StreamResponse> {
    return this.#root;
  }

  /** Shortcut for `root.child(...names)`. */
  resource(...names: string[]): ApiResource<StreamResponse> {
    return this.#root.child(...names);
  }

  /** Public streams. */
  get stream(): ApiResource<StreamResponse> {
    return this.#root.child('stream');
  }

  /** Streams of the authenticated user. */
  get userstream(): ApiResource<StreamResponse> {
    return this.#root.child('userstream');
  }

  /** Streams of a set of users. */
  get sitestream(): ApiResource<StreamResponse> {
    return this.#root.child('sitestream');
  }

  config(opts: RuntimeConfig): void {
    this.#ctx.config(opts);
  }

  dispose(): void {
    this.#ctx.dispose();
  }
}
