import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import WebSocket, { WebSocketServer, type RawData } from 'ws';
import type { CloseInfo, RelayState } from '../types/index.js';
import { DEFAULT_UPSTREAM_TIMEOUT_MS, WEBSOCKET_FORWARD_HEADERS } from '../config/proxy.js';
import { ProxyError, describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { buildUpstreamUrl, toWebSocketOrigin } from '../utils/translate.js';

export interface WebSocketRelayOptions {
  mount: string;
  resolveOrigin: () => string;
  logger: Logger;
  /** Upper bound on the upstream opening handshake */
  handshakeTimeoutMs?: number;
}

export interface WebSocketRelay {
  /** Listener for the `upgrade` event of the HTTP server */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void;
  /** Terminate every live session */
  close(): void;
}

const NORMAL_CLOSURE = 1000;
const INTERNAL_ERROR = 1011;
const HIGH_WATER_MARK = 1024 * 1024;

/**
 * Whether a close code may be sent in a close frame (1005, 1006 and 1015 are reserved)
 */
export function isSendableCloseCode(code: number): boolean {
  return (
    (code >= 1000 && code <= 1003) ||
    (code >= 1007 && code <= 1014) ||
    (code >= 3000 && code <= 4999)
  );
}

export function parseSubprotocols(header: string | undefined): string[] {
  if (!header) {
    return [];
  }
  return header
    .split(',')
    .map((protocol) => protocol.trim())
    .filter(Boolean);
}

export function pickForwardHeaders(request: IncomingMessage): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const name of WEBSOCKET_FORWARD_HEADERS) {
    const value = request.headers[name];
    if (value) {
      headers[name] = value;
    }
  }
  return headers;
}

/**
 * Open the upstream socket. Resolves once the handshake completes; rejects on
 * failure, on timeout, or when `signal` aborts first.
 */
export function connectUpstream(
  url: string,
  protocols: string[],
  headers: Record<string, string>,
  options: { signal: AbortSignal; handshakeTimeoutMs: number }
): Promise<WebSocket> {
  const { signal, handshakeTimeoutMs } = options;

  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new ProxyError('Upstream connect aborted'));
      return;
    }

    // maxPayload 0 disables the message size limit
    const upstream = new WebSocket(url, protocols, {
      headers,
      maxPayload: 0,
      handshakeTimeout: handshakeTimeoutMs,
    });

    const onAbort = () => {
      upstream.off('open', onOpen);
      reject(new ProxyError('Upstream connect aborted'));
      // terminate() while connecting emits one more 'error', still caught by onError
      upstream.terminate();
    };
    const onOpen = () => {
      upstream.off('error', onError);
      signal.removeEventListener('abort', onAbort);
      resolve(upstream);
    };
    const onError = (error: Error) => {
      upstream.off('open', onOpen);
      signal.removeEventListener('abort', onAbort);
      reject(error);
    };

    upstream.once('open', onOpen);
    upstream.once('error', onError);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function toPayload(data: RawData): Buffer | ArrayBuffer {
  return Array.isArray(data) ? Buffer.concat(data) : data;
}

export interface Pausable {
  readonly isPaused: boolean;
  pause(): void;
  resume(): void;
}

/**
 * Stop reading from `source` while `sink` has a megabyte or more queued, and
 * read again once it drains below that
 */
export function applyBackpressure(
  source: Pausable,
  sink: { readonly bufferedAmount: number },
  highWaterMark = HIGH_WATER_MARK
): void {
  const congested = sink.bufferedAmount >= highWaterMark;
  if (congested && !source.isPaused) {
    source.pause();
  } else if (!congested && source.isPaused) {
    source.resume();
  }
}

/**
 * Forward frames from `source` to `sink` until `source` closes or the signal aborts
 */
function pump(
  source: WebSocket,
  sink: WebSocket,
  signal: AbortSignal,
  onFault: (error: Error) => void
): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted || source.readyState === WebSocket.CLOSED) {
      resolve();
      return;
    }

    const onMessage = (data: RawData, isBinary: boolean) => {
      if (sink.readyState !== WebSocket.OPEN) {
        return;
      }
      sink.send(toPayload(data), { binary: isBinary }, (error) => {
        if (error) {
          onFault(error);
          return;
        }
        applyBackpressure(source, sink);
      });
      applyBackpressure(source, sink);
    };

    const finish = () => {
      source.off('message', onMessage);
      source.off('close', finish);
      signal.removeEventListener('abort', finish);
      // a paused socket would never read the closing handshake
      if (source.isPaused) {
        source.resume();
      }
      resolve();
    };

    source.on('message', onMessage);
    source.once('close', finish);
    signal.addEventListener('abort', finish, { once: true });
  });
}

interface SessionOptions {
  upstreamUrl: string;
  protocols: string[];
  headers: Record<string, string>;
  handshakeTimeoutMs: number;
  logger: Logger;
  accept: (protocol: string | null) => Promise<WebSocket>;
}

/**
 * One inbound WebSocket bridged to one upstream WebSocket.
 *
 * pending -> connecting -> bridging -> closed. The inbound handshake is only
 * completed once the upstream one has, so the upstream subprotocol can be echoed.
 */
export class WebSocketRelaySession {
  state: RelayState = 'pending';

  private upstreamClose: CloseInfo | null = null;
  private readonly controller = new AbortController();
  private client: WebSocket | null = null;
  private upstream: WebSocket | null = null;

  constructor(private readonly options: SessionOptions) {}

  async run(): Promise<void> {
    const { upstreamUrl, protocols, headers, handshakeTimeoutMs, logger } = this.options;

    this.state = 'connecting';
    let upstream: WebSocket;
    try {
      upstream = await connectUpstream(upstreamUrl, protocols, headers, {
        signal: this.controller.signal,
        handshakeTimeoutMs,
      });
    } catch (error) {
      if (this.isClosed()) {
        logger.info(`[WS] Inbound socket gone before upstream connected: ${upstreamUrl}`);
        return;
      }
      logger.error(`[WS] Upstream connect failed: ${upstreamUrl}`, { error: describeError(error) });
      await this.rejectInbound();
      return;
    }

    this.upstream = upstream;
    upstream.on('error', (error) => this.fault('upstream', error));
    upstream.on('close', (code, reason) => {
      this.upstreamClose = { code, reason: reason.toString() };
    });
    if (this.isClosed()) {
      this.closeUpstream();
      return;
    }

    let client: WebSocket;
    try {
      client = await this.options.accept(upstream.protocol || null);
    } catch (error) {
      logger.warn(`[WS] Inbound handshake failed: ${upstreamUrl}`, { error: describeError(error) });
      this.closeUpstream();
      this.state = 'closed';
      return;
    }

    this.client = client;
    client.on('error', (error) => this.fault('client', error));
    if (this.isClosed()) {
      this.closeClient();
      return;
    }

    this.state = 'bridging';
    logger.info(`[WS] Bridging ${upstreamUrl}`, { protocol: upstream.protocol || null });

    const signal = this.controller.signal;
    try {
      await Promise.race([
        pump(client, upstream, signal, (error) => this.fault('client -> upstream', error)),
        pump(upstream, client, signal, (error) => this.fault('upstream -> client', error)),
      ]);
    } finally {
      this.shutdown();
    }
  }

  /**
   * Stop bridging and close both sides
   */
  shutdown(): void {
    if (this.isClosed()) {
      return;
    }
    this.state = 'closed';
    this.controller.abort();
    this.closeUpstream();
    this.closeClient();
    this.options.logger.info(`[WS] Closed ${this.options.upstreamUrl}`, {
      code: this.upstreamClose?.code ?? null,
    });
  }

  /**
   * Tear the session down because the inbound socket failed or went away.
   * Before bridging starts this also cancels the pending upstream connect.
   */
  abort(): void {
    if (this.isClosed()) {
      return;
    }
    if (this.state === 'bridging') {
      this.controller.abort();
      return;
    }
    this.state = 'closed';
    this.controller.abort();
    this.closeUpstream();
  }

  isClosed(): boolean {
    return this.state === 'closed';
  }

  private fault(direction: string, error: Error): void {
    this.options.logger.error(`[WS] ${direction} failed: ${this.options.upstreamUrl}`, {
      error: describeError(error),
    });
    this.controller.abort();
  }

  /**
   * Complete the inbound handshake only to close it, so the client sees a
   * proper close frame instead of a refused upgrade
   */
  private async rejectInbound(): Promise<void> {
    try {
      const client = await this.options.accept(null);
      client.close(INTERNAL_ERROR);
    } catch (error) {
      this.options.logger.warn('[WS] Inbound handshake failed', { error: describeError(error) });
    } finally {
      this.state = 'closed';
    }
  }

  private closeUpstream(): void {
    const upstream = this.upstream;
    if (!upstream || upstream.readyState === WebSocket.CLOSED) {
      return;
    }
    try {
      upstream.close(NORMAL_CLOSURE);
    } catch (error) {
      this.options.logger.warn('[WS] Failed to close upstream socket', { error: describeError(error) });
      upstream.terminate();
    }
  }

  private closeClient(): void {
    const client = this.client;
    if (!client || client.readyState === WebSocket.CLOSED) {
      return;
    }
    const last = this.upstreamClose;
    const [code, reason] = last && isSendableCloseCode(last.code) ? [last.code, last.reason] : [NORMAL_CLOSURE, ''];
    try {
      client.close(code, reason);
    } catch (error) {
      this.options.logger.warn('[WS] Failed to close client socket', { error: describeError(error) });
      client.terminate();
    }
  }
}

function isUnderMount(pathname: string, mount: string): boolean {
  return pathname.startsWith(`${mount}/`);
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

/**
 * WebSocket side of the proxy: bridges upgrades on `{mount}/*` to the upstream
 */
export function createWebSocketRelay(options: WebSocketRelayOptions): WebSocketRelay {
  const { mount, resolveOrigin, logger, handshakeTimeoutMs = DEFAULT_UPSTREAM_TIMEOUT_MS } = options;
  const selectedProtocols = new WeakMap<IncomingMessage, string>();
  const sessions = new Set<WebSocketRelaySession>();

  const server = new WebSocketServer({
    noServer: true,
    handleProtocols: (_offered, request) => selectedProtocols.get(request) ?? false,
  });

  function accept(request: IncomingMessage, socket: Duplex, head: Buffer, protocol: string | null): Promise<WebSocket> {
    if (protocol) {
      selectedProtocols.set(request, protocol);
    }

    return new Promise((resolve, reject) => {
      // ws destroys the socket without calling back when the handshake is invalid
      const onClose = () => reject(new ProxyError('Inbound socket closed before the handshake completed', 400));
      if (socket.destroyed) {
        onClose();
        return;
      }
      socket.once('close', onClose);
      server.handleUpgrade(request, socket, head, (client) => {
        socket.off('close', onClose);
        resolve(client);
      });
    });
  }

  function handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const requestUrl = new URL(request.url ?? '/', 'http://localhost');
    if (!isUnderMount(requestUrl.pathname, mount)) {
      rejectUpgrade(socket, '404 Not Found');
      return;
    }

    const path = requestUrl.pathname.slice(mount.length);
    const upstreamUrl = buildUpstreamUrl(toWebSocketOrigin(resolveOrigin()), path, requestUrl.search.slice(1));

    const session = new WebSocketRelaySession({
      upstreamUrl,
      protocols: parseSubprotocols(request.headers['sec-websocket-protocol']),
      headers: pickForwardHeaders(request),
      handshakeTimeoutMs,
      logger,
      accept: (protocol) => accept(request, socket, head, protocol),
    });

    // the HTTP server drops its own error listener once it hands the socket over
    socket.on('error', (error) => {
      logger.warn(`[WS] Inbound socket error: ${upstreamUrl}`, { error: describeError(error) });
      session.abort();
    });
    socket.once('close', () => session.abort());

    sessions.add(session);
    void session
      .run()
      .catch((error: unknown) => {
        logger.error(`[WS] Session failed: ${upstreamUrl}`, { error: describeError(error) });
        session.shutdown();
      })
      .finally(() => sessions.delete(session));
  }

  function close(): void {
    for (const session of sessions) {
      session.shutdown();
    }
    sessions.clear();
    server.close();
  }

  return { handleUpgrade, close };
}
