import type { FetchClientProviderDefinition, FetchResponse, HttpMethod } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { SessionRequestOptions } from './types.js';

/**
 * Appends query values to a URL, keeping any query it already has.
 * A URL that cannot be parsed is returned as an error.
 */
export function withQuery(url: string, query: Readonly<Record<string, string>> = {}): SafeWrap<Error, string> {
  const entries = Object.entries(query);
  if (entries.length === 0) {
    return [null, url];
  }

  const [errUrl, target] = safeWrap<Error, URL>(() => new URL(url));
  if (errUrl) {
    return [errUrl, null];
  }

  for (const [key, value] of entries) {
    target.searchParams.append(key, value);
  }

  return [null, target.toString()];
}

/**
 * Encodes form values and file parts into a request body.
 *
 * - With file parts: `FormData`, sent as `multipart/form-data`.
 * - With form values only: `URLSearchParams`, sent as `application/x-www-form-urlencoded`.
 * - Otherwise no body.
 */
export function encodeBody(
  form: Readonly<Record<string, string>> = {},
  files: Readonly<Record<string, Blob>> = {},
): URLSearchParams | FormData | undefined {
  const fileEntries = Object.entries(files);
  if (fileEntries.length > 0) {
    const body = new FormData();
    for (const [key, value] of Object.entries(form)) {
      body.append(key, value);
    }
    for (const [key, file] of fileEntries) {
      body.append(key, file);
    }
    return body;
  }

  if (Object.keys(form).length > 0) {
    return new URLSearchParams(form);
  }

  return undefined;
}

/**
 * Hands an encoded request to the transport. GET requests never carry a body.
 */
export async function sendRequest(
  transport: FetchClientProviderDefinition,
  method: HttpMethod,
  url: string,
  { query, form, files, headers, signal }: SessionRequestOptions,
): SafeWrapAsync<Error, FetchResponse> {
  const [errUrl, target] = withQuery(url, query);
  if (errUrl) {
    return [errUrl, null];
  }

  if (method === 'GET') {
    return transport.get(target, { headers, signal });
  }

  return transport.post(target, { headers, signal, body: encodeBody(form, files) });
}
