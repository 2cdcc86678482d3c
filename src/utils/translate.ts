/**
 * Mapping between proxy-visible and upstream-visible URLs and headers
 */

import type { HeaderList } from '../types/index.js';
import { SKIP_REQUEST_HEADERS, SKIP_RESPONSE_HEADERS } from '../config/proxy.js';

/**
 * Join the upstream origin with a mount-relative path. Percent-encoding is kept as given.
 */
export function buildUpstreamUrl(origin: string, path: string, query: string): string {
  const url = `${origin.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  return query ? `${url}?${query}` : url;
}

/**
 * Map an http(s) origin to its ws(s) counterpart; other schemes pass through
 */
export function toWebSocketOrigin(origin: string): string {
  if (origin.startsWith('https://')) {
    return 'wss://' + origin.slice('https://'.length).replace(/^\/+/, '');
  }
  if (origin.startsWith('http://')) {
    return 'ws://' + origin.slice('http://'.length).replace(/^\/+/, '');
  }
  return origin;
}

/**
 * Prepare headers for the upstream request
 */
export function forwardRequestHeaders(headers: Iterable<[string, string]>): HeaderList {
  const forwarded: HeaderList = [];
  for (const [name, value] of headers) {
    if (!SKIP_REQUEST_HEADERS.has(name.toLowerCase())) {
      forwarded.push([name, value]);
    }
  }
  return forwarded;
}

/**
 * Prepare headers for the proxy response
 */
export function filterResponseHeaders(headers: Iterable<[string, string]>): HeaderList {
  const filtered: HeaderList = [];
  for (const [name, value] of headers) {
    const lower = name.toLowerCase();
    if (SKIP_RESPONSE_HEADERS.has(lower) || lower === 'x-robots-tag') {
      continue;
    }
    filtered.push([name, value]);
  }

  // Keep the embedded notebook out of search indexes
  filtered.push(['X-Robots-Tag', 'noindex']);
  return filtered;
}

/**
 * Map a root-relative upstream redirect under the mount. Absolute locations
 * and locations already under the mount are returned unchanged.
 */
export function rewriteLocation(location: string, mount: string): string {
  if (!location.startsWith('/')) {
    return location;
  }
  if (location.startsWith(mount)) {
    return location;
  }
  return mount + location;
}

function findHeader(headers: HeaderList, name: string): number {
  const lower = name.toLowerCase();
  return headers.findIndex(([key]) => key.toLowerCase() === lower);
}

export function getHeader(headers: HeaderList, name: string): string | undefined {
  const index = findHeader(headers, name);
  return index === -1 ? undefined : headers[index][1];
}

/**
 * Replace the first header with this name, or append it
 */
export function setHeader(headers: HeaderList, name: string, value: string): void {
  const index = findHeader(headers, name);
  if (index === -1) {
    headers.push([name, value]);
  } else {
    headers[index] = [headers[index][0], value];
  }
}

/**
 * Add a token to the Vary header unless it is already listed
 */
export function appendVary(headers: HeaderList, value: string): void {
  const index = findHeader(headers, 'vary');
  if (index === -1) {
    headers.push(['Vary', value]);
    return;
  }

  const [name, existing] = headers[index];
  const tokens = existing
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter(Boolean);
  if (tokens.includes(value.toLowerCase())) {
    return;
  }
  headers[index] = [name, `${existing}, ${value}`];
}

export function toHeaders(list: HeaderList): Headers {
  const headers = new Headers();
  for (const [name, value] of list) {
    headers.append(name, value);
  }
  return headers;
}
