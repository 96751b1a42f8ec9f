import { ClientError } from '../error/clientError.js';
import { headersToRecord } from '../fetch/utils.js';
import type { FetchResponse, HttpMethod } from '../types/request.js';
import { readLines } from '../utils/readLines.js';
import type { SafeWrap } from '../utils/wrap.js';
import { decodeJson, type JsonValue } from './jsonObject.js';

/** Options for constructing a {@link StreamResponse}. */
export interface StreamResponseOptions {
  response: FetchResponse;
  requestMethod: HttpMethod;
  resourceUrl: string;
  /** Controller whose signal the request was sent with; aborting it closes the connection. */
  controller: AbortController;
  /** Called once the body is done with, to detach the caller's signal from `controller`. */
  release?: VoidFunction;
}

/**
 * Open connection to a streaming endpoint.
 *
 * The body is newline-delimited JSON. {@link stream} yields one decoded value per
 * line; blank keep-alive lines and lines that are not valid JSON are skipped.
 * The body can be iterated once; later calls to {@link stream} yield nothing.
 */
export class StreamResponse {
  readonly resourceUrl: string;
  readonly requestMethod: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  #response: FetchResponse;
  #controller: AbortController;
  #release: VoidFunction;
  #consumed = false;

  constructor({ response, requestMethod, resourceUrl, controller, release = () => {} }: StreamResponseOptions) {
    this.resourceUrl = response.url || resourceUrl;
    this.requestMethod = requestMethod;
    this.headers = headersToRecord(response.headers);
    this.#response = response;
    this.#controller = controller;
    this.#release = release;
  }

  /** Whether the connection was closed, by {@link close} or by the signal the request was sent with. */
  get closed(): boolean {
    return this.#controller.signal.aborted;
  }

  /**
   * Yields decoded messages as they arrive.
   *
   * A connection failure is yielded once as `[ClientError, null]` and ends the
   * iteration; a failure caused by closing the connection simply ends it. Breaking
   * out of the loop releases the connection.
   */
  async *stream(): AsyncGenerator<SafeWrap<ClientError, JsonValue>, void, undefined> {
    if (this.#consumed) {
      return;
    }
    this.#consumed = true;

    const body = this.#response.body;
    if (!body) {
      this.#release();
      return;
    }

    try {
      for await (const [errLine, line] of readLines(body)) {
        if (errLine) {
          if (!this.closed) {
            yield [this.#error(errLine.message, errLine), null];
          }
          return;
        }

        if (!line.trim()) {
          continue;
        }

        const [errDecode, message] = decodeJson(line);
        if (errDecode) {
          continue;
        }

        yield [null, message];
      }
    } finally {
      this.#release();
    }
  }

  /**
   * Closes the connection. Safe to call more than once.
   */
  close(): void {
    if (!this.closed) {
      this.#controller.abort();
    }
  }

  toString(): string {
    return `<StreamResponse: ${this.requestMethod} ${this.resourceUrl}>`;
  }

  #error(message: string, cause: unknown): ClientError {
    return new ClientError(message, { resourceUrl: this.resourceUrl, requestMethod: this.requestMethod, cause });
  }
}
