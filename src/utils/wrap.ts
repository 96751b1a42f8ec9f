/**
 * Error-first result tuple returned by every fallible operation in the client, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Promise of a {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a promise factory and settles into a tuple instead of rejecting.
 * Synchronous throws from the factory are captured as well.
 * @example
 * const [error, response] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Synchronous counterpart of {@link safeWrapAsync}.
 * @example
 * const [error, parsed] = safeWrap(() => JSON.parse(text));
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
