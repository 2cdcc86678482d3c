import type { Context } from 'hono';
import { getCookie } from 'hono/cookie';
import { html } from 'hono/html';
import type { AppEnv, FetchFn, ProxyRequestOptions, UpstreamResponse } from '../types/index.js';
import { THEME_COOKIE, UPSTREAM_ORIGIN_ENV } from '../config/proxy.js';
import { ProxyError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { isNullBodyStatus } from '../utils/response.js';
import { isTheme, rewriteHtml } from '../utils/html.js';
import {
  appendVary,
  buildUpstreamUrl,
  filterResponseHeaders,
  forwardRequestHeaders,
  getHeader,
  rewriteLocation,
  setHeader,
  toHeaders,
} from '../utils/translate.js';

export interface ProxyMiddlewareOptions {
  mount: string;
  resolveOrigin: () => string;
  timeoutMs: number;
  fetch: FetchFn;
}

/**
 * Make the upstream request and read the full response.
 * Transport failures, timeouts included, surface as ProxyError.
 */
async function makeProxyRequest(fetchFn: FetchFn, options: ProxyRequestOptions): Promise<UpstreamResponse> {
  try {
    const response = await fetchFn(options.url, {
      method: options.method,
      headers: toHeaders(options.headers),
      body: options.body,
      redirect: 'manual',
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    return {
      status: response.status,
      headers: [...response.headers],
      body: new Uint8Array(await response.arrayBuffer()),
    };
  } catch (error) {
    throw new ProxyError(
      `Failed to connect to upstream: ${describeError(error)}`,
      502,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Degraded page served when the upstream cannot be reached
 */
function renderUnavailablePage(origin: string, error: ProxyError) {
  const detail = describeError(error.originalError ?? error);

  return html`<!doctype html><html><head><meta charset="utf-8" /><meta name="viewport" content="width=device-width, initial-scale=1" /><title>Embed unavailable</title></head><body><h1>Embed unavailable</h1><p>The marimo service could not be reached from this server.</p><p><code>${origin}</code></p><p>For local dev, set <code>${UPSTREAM_ORIGIN_ENV}</code> to a reachable URL.</p><pre>${detail}</pre></body></html>`;
}

/**
 * Create the handler relaying `{mount}/*` to the upstream origin
 */
export function createProxyMiddleware(options: ProxyMiddlewareOptions) {
  const { mount, resolveOrigin, timeoutMs } = options;

  return async function proxyMiddleware(c: Context<AppEnv>): Promise<Response> {
    const logger = getLogger(c);
    const startTime = Date.now();
    const method = c.req.method;

    const requestUrl = new URL(c.req.url);
    const path = requestUrl.pathname.slice(mount.length);
    const origin = resolveOrigin();
    const upstreamUrl = buildUpstreamUrl(origin, path, requestUrl.search.slice(1));

    let body: ArrayBuffer | undefined;
    if (method !== 'GET' && method !== 'HEAD') {
      body = await c.req.raw.arrayBuffer();
    }

    let upstream: UpstreamResponse;
    try {
      upstream = await makeProxyRequest(options.fetch, {
        method,
        url: upstreamUrl,
        headers: forwardRequestHeaders(c.req.raw.headers),
        body,
        timeoutMs,
      });
    } catch (error) {
      if (!(error instanceof ProxyError)) {
        throw error;
      }
      logger.error(`[PROXY ERROR] ${method} ${requestUrl.pathname} -> ${upstreamUrl}`, {
        error: describeError(error.originalError ?? error),
      });
      return c.html(renderUnavailablePage(origin, error), 502);
    }

    logger.info(`[PROXY] ${method} ${requestUrl.pathname} -> ${upstream.status} (${Date.now() - startTime}ms)`);

    const headers = filterResponseHeaders(upstream.headers);

    const location = getHeader(upstream.headers, 'location');
    if (location) {
      setHeader(headers, 'location', rewriteLocation(location, mount));
    }

    let content = upstream.body;
    const contentType = getHeader(upstream.headers, 'content-type') ?? '';
    if (contentType.includes('text/html')) {
      const themeCookie = getCookie(c, THEME_COOKIE);
      const theme = isTheme(themeCookie) ? themeCookie : null;
      content = rewriteHtml(content, mount, theme);
      if (theme !== null) {
        appendVary(headers, 'Cookie');
      }
    }

    const hasBody = method !== 'HEAD' && !isNullBodyStatus(upstream.status);
    return new Response(hasBody ? content : null, {
      status: upstream.status,
      headers: toHeaders(headers),
    });
  };
}
