import type { Logger } from '../utils/logger.js';

/**
 * Standard response format interface
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  message: string | null;
  timestamp: string;
  statusCode: number;
  data: T;
}

/**
 * Health check response interface
 */
export interface HealthCheckResponse {
  status: string;
  timestamp: string;
}

/**
 * Remote log shipping settings
 */
export interface LogtailConfig {
  sourceToken: string;
  endpoint?: string;
}

/**
 * Application configuration, loaded once at start-up
 */
export interface AppConfig {
  port: number;
  /** Path prefix the upstream is exposed under, e.g. `/marimo/app` */
  mount: string;
  /** Reads the upstream origin from the environment on every call */
  resolveOrigin: () => string;
  upstreamTimeoutMs: number;
  logtail?: LogtailConfig;
}

/**
 * Hono environment shared by every route
 */
export interface AppEnv {
  Variables: {
    logger: Logger;
  };
}

/**
 * Ordered header list. Names keep their case; matching is case-insensitive.
 */
export type HeaderList = Array<[name: string, value: string]>;

export type Theme = 'dark' | 'light';

/**
 * Proxy request options
 */
export interface ProxyRequestOptions {
  method: string;
  url: string;
  headers: HeaderList;
  body?: ArrayBuffer;
  timeoutMs: number;
}

/**
 * Fully read upstream HTTP response
 */
export interface UpstreamResponse {
  status: number;
  headers: HeaderList;
  body: Uint8Array;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Lifecycle of one relayed WebSocket session
 */
export type RelayState = 'pending' | 'connecting' | 'bridging' | 'closed';

export interface CloseInfo {
  code: number;
  reason: string;
}
