import { decodeHTML, escapeAttribute } from 'entities';
import type { Theme } from '../types/index.js';

const REWRITE_ATTR_RE = /(\b(?:href|src|action)=["'])\/(?!\/)([^"']*)/g;
const HEAD_TAG_RE = /<head(\s[^>]*)?>/i;
const USER_CONFIG_RE = /(<marimo-user-config[^>]*\bdata-config=")([^"]*)(")/i;
const MOUNT_CONFIG_RE = /(window\.__MARIMO_MOUNT_CONFIG__\s*=\s*\{)([\s\S]*?)(\}\s*;)/i;
const THEME_VALUE_RE = /("theme"\s*:\s*")[^"]+(")/;

const encoder = new TextEncoder();

export function isTheme(value: unknown): value is Theme {
  return value === 'dark' || value === 'light';
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    // Invalid sequences become U+FFFD
    return new TextDecoder('utf-8').decode(bytes);
  }
}

/**
 * Replace the theme inside the first `window.__MARIMO_MOUNT_CONFIG__ = {...};` block
 */
export function rewriteMountConfigTheme(html: string, theme: Theme): string {
  return html.replace(MOUNT_CONFIG_RE, (segment) =>
    segment.replace(THEME_VALUE_RE, (_match, head: string, tail: string) => `${head}${theme}${tail}`)
  );
}

/**
 * Set `display.theme` in the entity-escaped JSON of the first
 * `<marimo-user-config data-config="...">`. Unparsable config is left as is.
 */
export function rewriteUserConfigTheme(html: string, theme: Theme): string {
  return html.replace(USER_CONFIG_RE, (match, open: string, rawConfig: string, close: string) => {
    let config: unknown;
    try {
      config = JSON.parse(decodeHTML(rawConfig));
    } catch {
      return match;
    }
    if (typeof config !== 'object' || config === null || Array.isArray(config)) {
      return match;
    }

    const record: Record<string, unknown> = { ...config };
    const display = record.display;
    record.display =
      typeof display === 'object' && display !== null && !Array.isArray(display)
        ? { ...display, theme }
        : { theme };

    return open + escapeAttribute(JSON.stringify(record)) + close;
  });
}

export function rewriteTheme(html: string, theme: Theme): string {
  return rewriteUserConfigTheme(rewriteMountConfigTheme(html, theme), theme);
}

/**
 * Rewrite an HTML document so root-relative references resolve under `mount`.
 *
 * Injects `<base href="{mount}/" />` after the first `<head>` unless the
 * document already has a base tag, prefixes root-relative `href`, `src` and
 * `action` values, and optionally overrides the notebook theme.
 */
export function rewriteHtml(body: Uint8Array, mount: string, theme?: Theme | null): Uint8Array {
  let html = decodeUtf8(body);

  const baseHref = mount.replace(/\/+$/, '') + '/';
  const mountPrefix = mount.replace(/^\/+/, '');

  if (isTheme(theme)) {
    html = rewriteTheme(html, theme);
  }

  if (!html.toLowerCase().includes('<base')) {
    const head = HEAD_TAG_RE.exec(html);
    if (head) {
      const insertAt = head.index + head[0].length;
      html = `${html.slice(0, insertAt)}<base href="${baseHref}" />${html.slice(insertAt)}`;
    }
  }

  html = html.replace(REWRITE_ATTR_RE, (match, attr: string, rest: string) => {
    if (rest === mountPrefix || rest.startsWith(mountPrefix + '/')) {
      return match;
    }
    return `${attr}${baseHref}${rest}`;
  });

  return encoder.encode(html);
}
