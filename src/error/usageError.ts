import { ClientError } from './clientError.js';
import { isErrorType } from './isErrorType.js';

/**
 * Programming mistake on the caller's side, such as issuing a request on the root path.
 * Never involves the network.
 */
export class UsageError extends ClientError {
  /** UsageError error-name */
  static name = 'UsageError';
}

/**
 * Type guard for {@link UsageError}.
 */
export function isUsageError(error: unknown): error is UsageError {
  return isErrorType(UsageError, error);
}
