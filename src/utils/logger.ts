import adze from 'adze';

/** Namespace the default logger writes under. */
export const LOG_NAMESPACE = 'birdsong';

/**
 * Minimal logger contract the clients write to. Any console-like or pino-like
 * logger satisfies it.
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Logger backed by adze under the {@link LOG_NAMESPACE} namespace.
 * Adze's default active level leaves debug output out.
 */
export const defaultLogger: Logger = {
  debug: (...args) => adze.ns(LOG_NAMESPACE).debug(...args),
  info: (...args) => adze.ns(LOG_NAMESPACE).info(...args),
  warn: (...args) => adze.ns(LOG_NAMESPACE).warn(...args),
  error: (...args) => adze.ns(LOG_NAMESPACE).error(...args),
};
