/**
 * Proxy configuration constants
 */

export const DEFAULT_MOUNT = '/marimo/semantic-entropy-probe-comparison';

/**
 * Environment variable holding the upstream origin
 */
export const UPSTREAM_ORIGIN_ENV = 'MARIMO_SEMANTIC_ENTROPY_BASE_URL';

export const DEFAULT_UPSTREAM_ORIGIN = 'http://semantic-entropy-probe-comparison.railway.internal';

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;

export const THEME_COOKIE = 'theme';

/**
 * Headers that only apply to a single transport leg
 */
export const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailers',
  'transfer-encoding',
  'upgrade',
]);

/**
 * Headers that should not be forwarded to the upstream
 */
export const SKIP_REQUEST_HEADERS = new Set([
  ...HOP_BY_HOP_HEADERS,
  'host',
  'content-length',
]);

/**
 * Headers that should not be forwarded from the upstream response.
 * Framing policies are dropped so the notebook can be embedded by the site.
 */
export const SKIP_RESPONSE_HEADERS = new Set([
  ...HOP_BY_HOP_HEADERS,
  'content-length',
  'content-encoding',
  'x-frame-options',
  'content-security-policy',
]);

/**
 * Handshake headers carried over to the upstream WebSocket
 */
export const WEBSOCKET_FORWARD_HEADERS = ['cookie', 'authorization'] as const;
