import type { AppConfig } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import {
  DEFAULT_MOUNT,
  DEFAULT_UPSTREAM_ORIGIN,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
  UPSTREAM_ORIGIN_ENV,
} from './proxy.js';

export const DEFAULT_PORT = 8000;

type Env = Record<string, string | undefined>;

/**
 * Resolve the upstream origin. Read on every call so the target can be
 * changed without a restart.
 */
export function resolveUpstreamOrigin(env: Env): string {
  const value = env[UPSTREAM_ORIGIN_ENV]?.trim();
  return value ? value : DEFAULT_UPSTREAM_ORIGIN;
}

/**
 * Validate a mount path and strip trailing slashes
 */
export function normalizeMount(mount: string): string {
  const trimmed = mount.trim().replace(/\/+$/, '');
  if (!trimmed.startsWith('/')) {
    throw new ConfigurationError(
      `PROXY_MOUNT must be a non-empty path starting with "/", got "${mount}"`,
      'PROXY_MOUNT'
    );
  }
  return trimmed;
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`, name);
  }
  return value;
}

/**
 * Load application configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = parseInteger('PORT', env.PORT, DEFAULT_PORT, 1, 65535);
  const upstreamTimeoutMs = parseInteger(
    'UPSTREAM_TIMEOUT_MS',
    env.UPSTREAM_TIMEOUT_MS,
    DEFAULT_UPSTREAM_TIMEOUT_MS,
    1,
    Number.MAX_SAFE_INTEGER
  );
  const mount = normalizeMount(env.PROXY_MOUNT ?? DEFAULT_MOUNT);

  const sourceToken = env.LOGTAIL_SOURCE_TOKEN?.trim();
  const endpoint = env.LOGTAIL_ENDPOINT?.trim();

  return {
    port,
    mount,
    resolveOrigin: () => resolveUpstreamOrigin(env),
    upstreamTimeoutMs,
    logtail: sourceToken ? { sourceToken, endpoint: endpoint || undefined } : undefined,
  };
}
