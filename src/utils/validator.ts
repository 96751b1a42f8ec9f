import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an unknown value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A throwing or rejecting validator is reported as a `ValidationError` with the thrown value as `cause`.
 * - A result carrying `issues` is reported as a `ValidationError` listing them.
 * - Otherwise returns `[null, result.value]`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<Error, ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );

  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  let result = pending;
  if (result instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => Promise.resolve(pending));
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resultAsync;
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
