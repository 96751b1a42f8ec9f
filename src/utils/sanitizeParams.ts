/** Scalar parameter value sent as-is. */
export type ParamScalar = string | number;

/** File-like parameter value, routed to a multipart part. */
export type ParamFile = Blob;

/** Any value a request parameter may hold. */
export type ParamValue = ParamScalar | boolean | readonly ParamScalar[] | ParamFile;

/** Parameter bag of a request; `undefined` values are left out. */
export type RequestParams = Readonly<Record<string, ParamValue | undefined>>;

/** Parameters split into transport-ready values and file parts. */
export interface SanitizedParams {
  /** Query-string or form values. */
  params: Record<string, ParamScalar>;
  /** File parts for a multipart body. */
  files: Record<string, ParamFile>;
}

/**
 * Anything exposing a readable stream counts as a file.
 */
function isReadable(value: unknown): value is ParamFile {
  return typeof value === 'object' && value !== null && 'stream' in value && typeof value.stream === 'function';
}

function isSequence(value: ParamValue): value is readonly ParamScalar[] {
  return Array.isArray(value);
}

/**
 * Normalizes a parameter bag for the transport, applying per key, in order:
 * 1. readable values go to `files`,
 * 2. booleans become `"true"` / `"false"`,
 * 3. arrays are joined with `,`,
 * 4. anything else is passed through.
 *
 * The input is not modified.
 */
export function sanitizeParams(input: RequestParams): SanitizedParams {
  const params: Record<string, ParamScalar> = {};
  const files: Record<string, ParamFile> = {};

  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) {
      continue;
    }

    if (isReadable(value)) {
      files[key] = value;
    } else if (typeof value === 'boolean') {
      params[key] = value ? 'true' : 'false';
    } else if (isSequence(value)) {
      params[key] = value.join(',');
    } else {
      params[key] = value;
    }
  }

  return { params, files };
}

/**
 * Turns sanitized values into the strings that go on the wire and into the OAuth signature base.
 */
export function stringifyParams(params: Readonly<Record<string, ParamScalar>>): Record<string, string> {
  return Object.fromEntries(Object.entries(params).map(([key, value]) => [key, String(value)]));
}
