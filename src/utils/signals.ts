import { AbortError } from '../error/abortError.js';

/**
 * Aborts `target` when `source` aborts, carrying the source's reason over.
 *
 * The returned function detaches `source` again. It runs by itself once `target`
 * aborts, so a long-lived `source` only holds listeners for targets still open.
 */
export function forwardAbort(source: AbortSignal | null | undefined, target: AbortController): VoidFunction {
  if (!source) {
    return () => {};
  }

  const abort = () => {
    target.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  if (source.aborted) {
    abort();
    return () => {};
  }

  const release = () => {
    source.removeEventListener('abort', abort);
    target.signal.removeEventListener('abort', release);
  };

  source.addEventListener('abort', abort, { once: true });
  target.signal.addEventListener('abort', release, { once: true });

  return release;
}
