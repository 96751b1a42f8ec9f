import { ClientError } from '../error/clientError.js';
import type { TwitterError } from '../error/twitterError.js';
import { transportErrorMessage } from '../fetch/utils.js';
import type { Session } from '../session/types.js';
import type { HttpMethod, TransportMode } from '../types/request.js';
import type { ResponseHandler } from '../types/response.js';
import { constructResourceUrl, type ResourceUrlOptions } from '../utils/constructResourceUrl.js';
import type { Logger } from '../utils/logger.js';
import { type RequestParams, sanitizeParams, stringifyParams } from '../utils/sanitizeParams.js';
import { forwardAbort } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { RequestOptions, Requester } from './types.js';

/** Configuration for constructing a {@link RequestPipeline}. */
export interface RequestPipelineProps<Result> extends ResourceUrlOptions {
  /** Returns the session currently in the client's slot; read on every request. */
  session: () => Session;
  /** Whether responses are read whole or kept open as streams. */
  mode: TransportMode;
  /** Maps received responses onto results or errors. */
  handleResponse: ResponseHandler<Result>;
  logger: Logger;
}

/**
 * Request path shared by every client:
 * resource path → URL → sanitized parameters → session → response handler.
 *
 * Transport failures surface as {@link ClientError} with the request's method and
 * URL; everything the server answered is left to the response handler.
 *
 * @typeParam Result - What the response handler resolves successful responses to.
 */
export class RequestPipeline<Result> implements Requester<Result> {
  #session: () => Session;
  #mode: TransportMode;
  #handleResponse: ResponseHandler<Result>;
  #urlOptions: ResourceUrlOptions;
  #logger: Logger;

  constructor({ session, mode, handleResponse, logger, apiVersion, apiEndpointFormat }: RequestPipelineProps<Result>) {
    this.#session = session;
    this.#mode = mode;
    this.#handleResponse = handleResponse;
    this.#logger = logger;
    this.#urlOptions = { apiVersion, apiEndpointFormat };
  }

  /** Transport mode of this pipeline. */
  get mode(): TransportMode {
    return this.#mode;
  }

  /**
   * Issues a request for a resource path.
   *
   * GET parameters go into the query string, POST parameters into the form body.
   * In stream mode the request is sent with a controller owned by the resulting
   * stream, and the caller's signal aborts that controller, so either side can
   * close the connection.
   */
  async request(
    method: HttpMethod,
    path: string,
    params: RequestParams,
    opts: RequestOptions,
  ): SafeWrapAsync<TwitterError, Result> {
    const resourceUrl = constructResourceUrl(path, this.#urlOptions);
    const { params: values, files } = sanitizeParams(params);
    const fields = stringifyParams(values);
    const controller = new AbortController();
    const streaming = this.#mode === 'stream';
    const release = streaming ? forwardAbort(opts.signal, controller) : () => {};

    this.#logger.debug(`${method} ${resourceUrl}`, { mode: this.#mode, files: Object.keys(files) });

    const [errRequest, response] = await this.#session().request(method, resourceUrl, {
      ...(method === 'GET' ? { query: fields } : { form: fields }),
      files,
      headers: opts.headers,
      signal: streaming ? controller.signal : opts.signal,
    });

    if (errRequest) {
      release();
      this.#logger.debug(`${method} ${resourceUrl} failed in transport`, errRequest);
      const message = transportErrorMessage(errRequest);
      return [new ClientError(message, { resourceUrl, requestMethod: method, cause: errRequest }), null];
    }

    const [errResponse, result] = await this.#handleResponse({
      requestMethod: method,
      resourceUrl,
      response,
      controller,
      release,
    });

    if (errResponse) {
      release();
      this.#logger.debug(`${method} ${resourceUrl} answered ${response.status}`, String(errResponse));
      return [errResponse, null];
    }

    return [null, result];
  }
}
