import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Diagnostic fields shared by every error the client produces. */
export interface TwitterErrorOptions extends ErrorOptions {
  /** URL of the resource the request targeted. */
  resourceUrl?: string | null;
  /** Upper-cased HTTP method of the request. */
  requestMethod?: string | null;
  /** HTTP status code, when a response was received. */
  statusCode?: number | null;
  /** API error code taken from the response body, as the body carries it. */
  errorCode?: number | string | null;
  /** Response headers, lower-cased names. */
  headers?: Readonly<Record<string, string>> | null;
}

/**
 * Base class of the client's error taxonomy.
 *
 * `toString()` appends `(METHOD URL)` when both are known, so a logged error
 * can be traced back to its request without looking at the structured fields.
 */
export class TwitterError extends Error {
  /** TwitterError error-name */
  static name = 'TwitterError';
  #resourceUrl: string | null;
  #requestMethod: string | null;
  #statusCode: number | null;
  #errorCode: number | string | null;
  #headers: Readonly<Record<string, string>> | null;

  /** Creates a new TwitterError with the given diagnostics */
  constructor(message: string, opts: TwitterErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.#resourceUrl = opts.resourceUrl ?? null;
    this.#requestMethod = opts.requestMethod ?? null;
    this.#statusCode = opts.statusCode ?? null;
    this.#errorCode = opts.errorCode ?? null;
    this.#headers = opts.headers ?? null;
  }

  /** URL of the resource the failed request targeted */
  get resourceUrl(): string | null {
    return this.#resourceUrl;
  }

  /** HTTP method of the failed request */
  get requestMethod(): string | null {
    return this.#requestMethod;
  }

  /** HTTP status code, `null` when no response was received */
  get statusCode(): number | null {
    return this.#statusCode;
  }

  /** API error code from the response body */
  get errorCode(): number | string | null {
    return this.#errorCode;
  }

  /** Response headers of the failed request */
  get headers(): Readonly<Record<string, string>> | null {
    return this.#headers;
  }

  toString(): string {
    if (this.#requestMethod && this.#resourceUrl) {
      return `${this.name}: ${this.message} (${this.#requestMethod} ${this.#resourceUrl})`;
    }

    return `${this.name}: ${this.message}`;
  }
}

/**
 * Type guard for {@link TwitterError}.
 */
export function isTwitterError(error: unknown): error is TwitterError {
  return isErrorType(TwitterError, error);
}

/**
 * Extract a {@link TwitterError} from an unknown error value, following nested causes.
 */
export function getTwitterError(error: unknown): TwitterError | null {
  return unwrapErrorType(TwitterError, error);
}
