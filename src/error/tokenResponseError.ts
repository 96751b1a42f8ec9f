import { isErrorType } from './isErrorType.js';

/**
 * A token endpoint answered, but not with a usable token: the request was denied
 * or the expected token fields were missing.
 */
export class TokenResponseError extends Error {
  /** TokenResponseError error-name */
  static name = 'TokenResponseError';
  /** Internal status code of the token response */
  #status: number;

  /** Creates a new TokenResponseError for a response with the given status */
  constructor(message: string, status: number, opts?: ErrorOptions) {
    super(message, opts);
    this.name = 'TokenResponseError';
    this.#status = status;
  }

  /** HTTP status of the token response */
  get status(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link TokenResponseError}.
 */
export function isTokenResponseError(error: unknown): error is TokenResponseError {
  return isErrorType(TokenResponseError, error);
}
