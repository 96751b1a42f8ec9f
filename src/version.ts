/** Package version, reported in the default user agent. */
export const VERSION = '1.0.0';
