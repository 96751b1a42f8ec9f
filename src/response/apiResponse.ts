import { headersToRecord } from '../fetch/utils.js';
import type { FetchResponse, HttpMethod } from '../types/request.js';
import type { JsonValue } from './jsonObject.js';

/**
 * Successful, fully read REST response.
 *
 * Carries everything the caller may need after the connection is gone: the
 * decoded body, the response headers and where the request went.
 */
export class ApiResponse {
  /** URL the response came from. */
  readonly resourceUrl: string;
  /** Response headers, lower-cased names. */
  readonly headers: Readonly<Record<string, string>>;
  readonly requestMethod: HttpMethod;
  /** Decoded body; `null` when the body was not valid JSON. */
  readonly data: JsonValue;

  constructor(response: FetchResponse, requestMethod: HttpMethod, resourceUrl: string, data: JsonValue) {
    this.resourceUrl = response.url || resourceUrl;
    this.headers = headersToRecord(response.headers);
    this.requestMethod = requestMethod;
    this.data = data;
    Object.freeze(this);
  }

  toString(): string {
    return `<ApiResponse: ${this.requestMethod} ${this.resourceUrl}>`;
  }
}
