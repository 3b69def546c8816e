/**
 * Endpoint resolution: server base URL + template fragment → host, path, scheme
 */

/** Fragment used when a template declares no endpoint */
export const DEFAULT_ENDPOINT_PATH = '/v1/chat/completions';

export interface ResolvedEndpoint {
  host: string;
  path: string;
  secure: boolean;
}

const ABSOLUTE_URL = /^https?:\/\//;

/**
 * Remove a leading scheme. Returns the remainder and whether the scheme
 * was https, or undefined when there is no scheme.
 */
function stripScheme(value: string): { rest: string; secure?: boolean } {
  if (value.startsWith('https://')) return { rest: value.substring(8), secure: true };
  if (value.startsWith('http://')) return { rest: value.substring(7), secure: false };
  return { rest: value };
}

function withLeadingSlash(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

/**
 * Resolve a server base and a template endpoint fragment.
 *
 * - An empty fragment means {@link DEFAULT_ENDPOINT_PATH}
 * - An absolute fragment (`http://` / `https://`) replaces the base entirely
 * - Without any scheme the connection is secure
 * - A path left in the host is moved in front of the fragment
 *
 * `v1/x` and `/v1/x` resolve identically.
 *
 * @returns The endpoint, or undefined when the host is empty
 *
 * @example
 * ```typescript
 * resolveEndpoint('https://openrouter.ai/api', '/v1/chat/completions');
 * // { host: 'openrouter.ai', path: '/api/v1/chat/completions', secure: true }
 * ```
 */
export function resolveEndpoint(serverBase: string, fragment: string): ResolvedEndpoint | undefined {
  let base = serverBase.trim();
  let path = fragment.trim() === '' ? DEFAULT_ENDPOINT_PATH : fragment.trim();

  if (ABSOLUTE_URL.test(path)) {
    base = path;
    path = '';
  }

  const { rest, secure } = stripScheme(base);
  let host = rest;

  const slash = host.indexOf('/');
  if (slash !== -1) {
    const basePath = host.substring(slash).replace(/\/+$/, '');
    host = host.substring(0, slash);
    path = path === '' ? basePath : basePath + withLeadingSlash(path);
  }

  if (host === '') return undefined;

  return {
    host,
    path: withLeadingSlash(path),
    secure: secure ?? true,
  };
}

/**
 * Render a resolved endpoint as a URL
 */
export function endpointToUrl(endpoint: ResolvedEndpoint): string {
  return `${endpoint.secure ? 'https' : 'http'}://${endpoint.host}${endpoint.path}`;
}
