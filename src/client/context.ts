import { RequestPipeline } from '../core/pipeline.js';
import { FetchClient } from '../fetch/client.js';
import type { Session, SessionOptions } from '../session/types.js';
import type { FetchClientProviderDefinition, TransportMode } from '../types/request.js';
import type { ResponseHandler } from '../types/response.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import {
  type ClientConfig,
  DEFAULT_API_ENDPOINT_FORMAT,
  DEFAULT_API_VERSION,
  DEFAULT_USER_AGENT,
  type OAuthPath,
  oauthUrl,
  type RuntimeConfig,
} from './config.js';

/** Configuration for constructing a {@link ClientContext}. */
export interface ClientContextProps<S extends Session> extends ClientConfig {
  /**
   * Builds a session from the transport and user agent plus whatever credentials the
   * owning client currently holds. Called again on every {@link ClientContext.rebuild}.
   */
  buildSession: (opts: SessionOptions) => S;
}

/**
 * State every client is composed of: settings, the transport, and the single
 * session slot. The session is replaced as a whole whenever the credentials or
 * user agent change; requests read the slot when they are issued.
 */
export class ClientContext<S extends Session> {
  readonly apiVersion: string;
  readonly apiEndpointFormat: string;
  readonly logger: Logger;
  #transport: FetchClientProviderDefinition;
  #userAgent: string;
  #buildSession: (opts: SessionOptions) => S;
  #session: S;

  constructor({
    buildSession,
    fetchProvider = FetchClient,
    fetchOpts,
    apiVersion = DEFAULT_API_VERSION,
    apiEndpointFormat = DEFAULT_API_ENDPOINT_FORMAT,
    userAgent = DEFAULT_USER_AGENT,
    logger = defaultLogger,
  }: ClientContextProps<S>) {
    this.apiVersion = apiVersion;
    this.apiEndpointFormat = apiEndpointFormat;
    this.logger = logger;
    this.#transport = new fetchProvider(fetchOpts);
    this.#userAgent = userAgent;
    this.#buildSession = buildSession;
    this.#session = buildSession({ transport: this.#transport, userAgent });
  }

  /** Session currently in the slot. */
  get session(): S {
    return this.#session;
  }

  get userAgent(): string {
    return this.#userAgent;
  }

  /**
   * Replaces the session with one built from the current credentials.
   */
  rebuild(reason: string): void {
    this.#session = this.#buildSession({ transport: this.#transport, userAgent: this.#userAgent });
    this.logger.debug(`rebuilt ${this.#session.kind} session: ${reason}`);
  }

  /**
   * Updates runtime settings; a new user agent rebuilds the session.
   */
  config({ userAgent, headers }: RuntimeConfig): void {
    if (headers) {
      this.#transport.config({ headers });
    }

    if (userAgent !== undefined && userAgent !== this.#userAgent) {
      this.#userAgent = userAgent;
      this.rebuild('user agent changed');
    }
  }

  /** Absolute URL of an OAuth endpoint. */
  oauthUrl(name: OAuthPath): string {
    return oauthUrl(this.apiEndpointFormat, name);
  }

  /**
   * Creates a request pipeline reading this context's session slot.
   */
  pipeline<Result>(mode: TransportMode, handleResponse: ResponseHandler<Result>): RequestPipeline<Result> {
    return new RequestPipeline({
      mode,
      handleResponse,
      session: () => this.#session,
      logger: this.logger,
      apiVersion: this.apiVersion,
      apiEndpointFormat: this.apiEndpointFormat,
    });
  }

  /** Releases transport resources, when the transport holds any. */
  dispose(): void {
    this.#transport.dispose?.();
  }
}
