/** Client settings that decide where a resource path points to. */
export interface ResourceUrlOptions {
  /** API version segment, e.g. `1.1`. */
  apiVersion: string;
  /** Base URL template holding an `{endpoint}` placeholder. */
  apiEndpointFormat: string;
}

/**
 * Fills the endpoint (sub-domain) name into the endpoint format template.
 */
export function formatEndpoint(apiEndpointFormat: string, endpoint: string): string {
  return apiEndpointFormat.replaceAll('{endpoint}', endpoint);
}

/**
 * Builds the absolute URL of a resource path.
 *
 * The first segment selects the endpoint, the remaining segments form the resource:
 * `api/statuses/show` becomes `https://api.twitter.com/1.1/statuses/show.json`.
 */
export function constructResourceUrl(path: string, { apiVersion, apiEndpointFormat }: ResourceUrlOptions): string {
  const [endpoint, ...resource] = path.split('/');

  return `${formatEndpoint(apiEndpointFormat, endpoint)}/${apiVersion}/${resource.join('/')}.json`;
}
