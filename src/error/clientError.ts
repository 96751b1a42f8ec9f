import { isErrorType } from './isErrorType.js';
import { TwitterError } from './twitterError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options accepted by {@link ClientError}; a client error never has a status code. */
export interface ClientErrorOptions extends ErrorOptions {
  resourceUrl?: string | null;
  requestMethod?: string | null;
}

/**
 * Error for failures that happen on this side of the wire: transport errors,
 * malformed token responses and misuse of the client.
 */
export class ClientError extends TwitterError {
  /** ClientError error-name */
  static name = 'ClientError';

  /** Creates a new ClientError, optionally tied to the request that failed */
  constructor(message: string, { resourceUrl, requestMethod, cause }: ClientErrorOptions = {}) {
    super(message, { resourceUrl, requestMethod, cause });
  }
}

/**
 * Type guard for {@link ClientError}.
 */
export function isClientError(error: unknown): error is ClientError {
  return isErrorType(ClientError, error);
}

/**
 * Extract a {@link ClientError} from an unknown error value, following nested causes.
 */
export function getClientError(error: unknown): ClientError | null {
  return unwrapErrorType(ClientError, error);
}
