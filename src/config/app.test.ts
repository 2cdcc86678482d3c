import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../utils/errors.js';
import { loadConfig, normalizeMount } from './app.js';
import { DEFAULT_MOUNT, DEFAULT_UPSTREAM_ORIGIN } from './proxy.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.mount).toBe(DEFAULT_MOUNT);
    expect(config.upstreamTimeoutMs).toBe(30_000);
    expect(config.resolveOrigin()).toBe(DEFAULT_UPSTREAM_ORIGIN);
    expect(config.logtail).toBeUndefined();
  });

  it('re-reads and trims the upstream origin on every call', () => {
    const env: Record<string, string | undefined> = {
      MARIMO_SEMANTIC_ENTROPY_BASE_URL: '  http://localhost:2718 ',
    };
    const config = loadConfig(env);

    expect(config.resolveOrigin()).toBe('http://localhost:2718');

    env.MARIMO_SEMANTIC_ENTROPY_BASE_URL = 'https://notebook.example.com';
    expect(config.resolveOrigin()).toBe('https://notebook.example.com');

    env.MARIMO_SEMANTIC_ENTROPY_BASE_URL = '   ';
    expect(config.resolveOrigin()).toBe(DEFAULT_UPSTREAM_ORIGIN);
  });

  it('reads port, mount and timeout', () => {
    const config = loadConfig({ PORT: '3000', PROXY_MOUNT: '/nb/demo/', UPSTREAM_TIMEOUT_MS: '5000' });

    expect(config.port).toBe(3000);
    expect(config.mount).toBe('/nb/demo');
    expect(config.upstreamTimeoutMs).toBe(5000);
  });

  it('enables log shipping when a source token is set', () => {
    const config = loadConfig({ LOGTAIL_SOURCE_TOKEN: 'test-token', LOGTAIL_ENDPOINT: 'https://logs.example.com' });

    expect(config.logtail).toEqual({ sourceToken: 'test-token', endpoint: 'https://logs.example.com' });
  });

  it('rejects an invalid port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ConfigurationError);
  });
});

describe('normalizeMount', () => {
  it('rejects mounts that are empty or relative', () => {
    expect(() => normalizeMount('/')).toThrow(ConfigurationError);
    expect(() => normalizeMount('nb/demo')).toThrow(ConfigurationError);
  });

  it('strips trailing slashes', () => {
    expect(normalizeMount('/nb/demo//')).toBe('/nb/demo');
  });
});
