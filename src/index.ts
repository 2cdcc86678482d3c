import { Hono } from 'hono';
import type { AppConfig, AppEnv, FetchFn } from './types/index.js';
import { healthCheck } from './routes/health.js';
import { createProxyMiddleware } from './middleware/proxy.js';
import { createStandardResponse } from './utils/response.js';
import { handleError } from './utils/errors.js';
import type { Logger } from './utils/logger.js';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  /** Upstream HTTP client, the global fetch unless given */
  fetch?: FetchFn;
}

export function createApp({ config, logger, fetch: fetchFn }: AppDeps) {
  const app = new Hono<AppEnv>();
  const { mount } = config;

  // Initialize Logger
  app.use(async (c, next) => {
    c.set('logger', logger);
    await next();
  });

  // Health check endpoint
  app.get('/healthz', healthCheck);

  app.get(mount, (c) => c.redirect(`${mount}/`, 307));
  // `${mount}/*` also matches the bare mount
  app.all(mount, (c) => c.notFound());

  app.all(
    `${mount}/*`,
    createProxyMiddleware({
      mount,
      resolveOrigin: config.resolveOrigin,
      timeoutMs: config.upstreamTimeoutMs,
      fetch: fetchFn ?? ((input, init) => fetch(input, init)),
    })
  );

  app.notFound((c) => {
    return c.json(createStandardResponse(false, null, 'Route not found', 404), 404);
  });

  app.onError((error, c) => {
    logger.error(`[ERROR] ${c.req.method} ${c.req.path}`, { error: error.message });
    const body = handleError(error, 500);
    return c.json(body, 500);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
