import { createServer } from 'node:http';
import { getRequestListener } from '@hono/node-server';
import { createApp } from './index.js';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { describeError } from './utils/errors.js';
import { createWebSocketRelay } from './websocket/relay.js';

const config = loadConfig();
const logger = createLogger(config);

const app = createApp({ config, logger });
const relay = createWebSocketRelay({
  mount: config.mount,
  resolveOrigin: config.resolveOrigin,
  logger,
  handshakeTimeoutMs: config.upstreamTimeoutMs,
});

const server = createServer(getRequestListener(app.fetch));
server.on('upgrade', (request, socket, head) => relay.handleUpgrade(request, socket, head));

server.listen(config.port, () => {
  logger.info(`Proxy listening on port ${config.port}`, {
    mount: config.mount,
    upstream: config.resolveOrigin(),
  });
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down`);
  relay.close();
  server.close((error) => {
    if (error) {
      logger.error('HTTP server did not close cleanly', { error: describeError(error) });
    }
    void logger
      .flush()
      .catch((flushError: unknown) => console.error('[LOGGER] Flush failed', flushError))
      .finally(() => process.exit(error ? 1 : 0));
  });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
