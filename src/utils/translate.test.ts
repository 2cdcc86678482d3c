import { describe, it, expect } from 'vitest';
import type { HeaderList } from '../types/index.js';
import {
  appendVary,
  buildUpstreamUrl,
  filterResponseHeaders,
  forwardRequestHeaders,
  getHeader,
  rewriteLocation,
  setHeader,
  toWebSocketOrigin,
} from './translate.js';

const MOUNT = '/nb/demo';

describe('buildUpstreamUrl', () => {
  it('joins origin and path with exactly one slash', () => {
    expect(buildUpstreamUrl('http://notebook.internal:2718/', '/assets/app.js', '')).toBe(
      'http://notebook.internal:2718/assets/app.js'
    );
    expect(buildUpstreamUrl('http://notebook.internal:2718//', 'ws', '')).toBe('http://notebook.internal:2718/ws');
  });

  it('appends the raw query only when present', () => {
    expect(buildUpstreamUrl('http://notebook.internal', '/files/a%20b', 'q=x%2Fy&flag')).toBe(
      'http://notebook.internal/files/a%20b?q=x%2Fy&flag'
    );
  });

  it('maps an empty path to the origin root', () => {
    expect(buildUpstreamUrl('http://notebook.internal', '', '')).toBe('http://notebook.internal/');
  });
});

describe('toWebSocketOrigin', () => {
  it('maps http schemes to ws schemes', () => {
    expect(toWebSocketOrigin('https://notebook.example.com')).toBe('wss://notebook.example.com');
    expect(toWebSocketOrigin('http://notebook.internal:2718')).toBe('ws://notebook.internal:2718');
  });

  it('leaves other schemes alone', () => {
    expect(toWebSocketOrigin('ws://already.internal')).toBe('ws://already.internal');
  });
});

describe('forwardRequestHeaders', () => {
  it('drops hop-by-hop, host and content-length headers and keeps order', () => {
    const forwarded = forwardRequestHeaders([
      ['Host', 'example.com'],
      ['Connection', 'keep-alive'],
      ['Cookie', 'theme=dark'],
      ['Content-Length', '3'],
      ['Upgrade', 'h2c'],
      ['X-Trace', 'abc'],
      ['TE', 'trailers'],
    ]);

    expect(forwarded).toEqual([
      ['Cookie', 'theme=dark'],
      ['X-Trace', 'abc'],
    ]);
  });
});

describe('filterResponseHeaders', () => {
  it('drops length, encoding and framing headers and marks the response noindex', () => {
    const filtered = filterResponseHeaders([
      ['Content-Type', 'text/html'],
      ['Content-Length', '10'],
      ['Content-Encoding', 'gzip'],
      ['X-Frame-Options', 'DENY'],
      ['Content-Security-Policy', "frame-ancestors 'none'"],
      ['Transfer-Encoding', 'chunked'],
      ['Cache-Control', 'no-store'],
    ]);

    expect(filtered).toEqual([
      ['Content-Type', 'text/html'],
      ['Cache-Control', 'no-store'],
      ['X-Robots-Tag', 'noindex'],
    ]);
  });

  it('replaces an upstream X-Robots-Tag', () => {
    expect(filterResponseHeaders([['x-robots-tag', 'all']])).toEqual([['X-Robots-Tag', 'noindex']]);
  });
});

describe('rewriteLocation', () => {
  it('prefixes root-relative locations with the mount', () => {
    expect(rewriteLocation('/login?next=%2F', MOUNT)).toBe('/nb/demo/login?next=%2F');
  });

  it('keeps absolute locations', () => {
    expect(rewriteLocation('https://auth.example.com/login', MOUNT)).toBe('https://auth.example.com/login');
  });

  it('keeps locations already under the mount', () => {
    expect(rewriteLocation('/nb/demo/files', MOUNT)).toBe('/nb/demo/files');
  });

  it('is idempotent', () => {
    for (const location of ['/', '/a/b', '/nb/demo', '/nb/demo/x', '/other?x=1']) {
      const once = rewriteLocation(location, MOUNT);
      expect(rewriteLocation(once, MOUNT)).toBe(once);
    }
  });
});

describe('appendVary', () => {
  it('sets Vary when missing', () => {
    const headers: HeaderList = [['Content-Type', 'text/html']];
    appendVary(headers, 'Cookie');
    expect(headers).toEqual([
      ['Content-Type', 'text/html'],
      ['Vary', 'Cookie'],
    ]);
  });

  it('appends to an existing Vary header found case-insensitively', () => {
    const headers: HeaderList = [['vary', 'Accept-Encoding']];
    appendVary(headers, 'Cookie');
    expect(headers).toEqual([['vary', 'Accept-Encoding, Cookie']]);
  });

  it('does not duplicate a token that is already listed', () => {
    const headers: HeaderList = [['Vary', 'accept-encoding, cookie']];
    appendVary(headers, 'Cookie');
    expect(headers).toEqual([['Vary', 'accept-encoding, cookie']]);
  });

  it('gives the same result when applied twice', () => {
    const headers: HeaderList = [['Vary', 'Origin']];
    appendVary(headers, 'Cookie');
    appendVary(headers, 'Cookie');
    expect(getHeader(headers, 'VARY')).toBe('Origin, Cookie');
  });
});

describe('setHeader', () => {
  it('replaces the value and keeps the original name', () => {
    const headers: HeaderList = [['location', '/a']];
    setHeader(headers, 'Location', '/nb/demo/a');
    expect(headers).toEqual([['location', '/nb/demo/a']]);
  });
});
