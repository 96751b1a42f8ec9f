import { isErrorType } from './isErrorType.js';

/**
 * Lookup of a key that a read-only JSON view does not have.
 */
export class PropertyError extends Error {
  /** PropertyError error-name */
  static name = 'PropertyError';
  /** Internal name of the missing property */
  #property: string;

  /** Creates a new PropertyError for the missing property of the named view type */
  constructor(owner: string, property: string, opts?: ErrorOptions) {
    super(`${owner} has no property named ${property}.`, opts);
    this.name = 'PropertyError';
    this.#property = property;
  }

  /** Name of the missing property */
  get property(): string {
    return this.#property;
  }
}

/**
 * Type guard for {@link PropertyError}.
 */
export function isPropertyError(error: unknown): error is PropertyError {
  return isErrorType(PropertyError, error);
}
