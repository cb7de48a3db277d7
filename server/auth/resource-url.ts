/**
 * Resource URL helpers (RFC 8707 resource indicators).
 */

import { ConfigurationError } from '../errors.js';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (error) {
    throw new ConfigurationError(`Invalid URL '${url}'`, { cause: error });
  }
}

/**
 * Canonical form used for comparisons: lower-cased scheme and host, no fragment,
 * no trailing slash on the path.
 *
 * @example
 * normalizeResourceUrl('HTTPS://API.Example.com/v1/'); // 'https://api.example.com/v1'
 */
export function normalizeResourceUrl(url: string): string {
  const parsed = parseUrl(url);
  const path = parsed.pathname.replace(/\/+$/, '');
  return `${parsed.protocol}//${parsed.host}${path}${parsed.search}`;
}

/**
 * HTTPS, or plain HTTP to a loopback address.
 */
export function isSecureEndpoint(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol === 'https:') {
    return true;
  }
  return parsed.protocol === 'http:' && LOOPBACK_HOSTS.has(parsed.hostname);
}

/**
 * Hierarchical match: the token's resource equals the server's resource, or is a
 * path-prefix parent of it on the same origin.
 */
export function resourceMatches(tokenResource: string, serverResource: string): boolean {
  let token: string;
  let server: string;
  try {
    token = normalizeResourceUrl(tokenResource);
    server = normalizeResourceUrl(serverResource);
  } catch {
    return false;
  }
  if (token === server) {
    return true;
  }
  return server.startsWith(`${token}/`);
}

/**
 * True when any of the token's audiences matches the server resource.
 */
export function audienceMatches(audience: string | string[] | undefined, serverResource: string): boolean {
  if (audience === undefined) {
    return false;
  }
  const audiences = Array.isArray(audience) ? audience : [audience];
  return audiences.some(candidate => resourceMatches(candidate, serverResource));
}
