import { WebSocketServer, WebSocket } from 'ws';
import type { ServerOptions } from 'ws';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import { v4 as uuidv4 } from 'uuid';
import type { WSMessage } from '../types/messages.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { isPlainRecord, sanitizeJson } from './sanitize.js';
import { rawDataToString } from './transport.js';

/** Maximum broadcast message size (1MB) */
const MAX_BROADCAST_SIZE = 1 * 1024 * 1024;

export const SERVER_VERSION = '2.0.0';

export interface LiveServerOptions {
  /** Attach to an existing HTTP server (mutually exclusive with port) */
  server?: Server;
  /** Listen on a standalone port (mutually exclusive with server) */
  port?: number;
  /** Path prefix; the segment after it is the client id (default: '/ws/') */
  pathPrefix?: string;
  /** Max payload size in bytes (default: 1MB) */
  maxPayload?: number;
  /** Protocol ping interval in ms (default: 30000) */
  heartbeatInterval?: number;
  /** Maximum concurrent connections (default: 100, 0 = unlimited) */
  maxConnections?: number;
  /** Allowed origins (default: accept all) */
  allowedOrigins?: string[];
  logger?: Logger;
  /** Called with every well-formed frame after the built-in ping handling */
  onMessage?: (clientId: string, message: WSMessage) => void;
}

export interface LiveServer {
  readonly wss: WebSocketServer;
  /** Number of open sockets, optionally for one client id */
  connectionCount(clientId?: string): number;
  clientIds(): string[];
  broadcast(message: WSMessage): number;
  sendTo(clientId: string, message: WSMessage): number;
  cleanup(): void;
}

/**
 * Start heartbeat ping/pong on an existing WebSocketServer.
 * Sockets that miss a pong are terminated. Returns a cleanup function.
 */
export function createHeartbeat(wss: WebSocketServer, intervalMs = 30_000): () => void {
  const alive = new WeakMap<WebSocket, boolean>();

  const interval = setInterval(() => {
    wss.clients.forEach((ws) => {
      if (alive.get(ws) === false) return ws.terminate();
      alive.set(ws, false);
      ws.ping();
    });
  }, intervalMs);

  wss.on('connection', (ws) => {
    alive.set(ws, true);
    ws.on('pong', () => { alive.set(ws, true); });
  });

  return () => clearInterval(interval);
}

/** Send to every open socket. Returns how many sockets were written to. */
export function broadcast(sockets: Iterable<WebSocket>, message: WSMessage, logger: Logger): number {
  const data = JSON.stringify(message);
  if (data.length > MAX_BROADCAST_SIZE) {
    logger.warn(`broadcast message too large (${(data.length / 1024).toFixed(0)}KB), skipping`);
    return 0;
  }
  let sent = 0;
  for (const socket of sockets) {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(data);
      sent++;
    }
  }
  return sent;
}

/** Extract the client id from a request path such as `/ws/main?x=1`. */
export function clientIdFromPath(url: string | undefined, pathPrefix: string): string | null {
  if (!url) return null;
  const pathname = url.split('?')[0];
  if (!pathname.startsWith(pathPrefix)) return null;
  let id: string;
  try {
    id = decodeURIComponent(pathname.slice(pathPrefix.length));
  } catch {
    return null;
  }
  if (id.includes('/')) return null;
  return id || uuidv4();
}

/**
 * Create the push-channel server: one registry entry per client id,
 * ping answered with pong, other frames echoed back.
 */
export function createLiveServer(options: LiveServerOptions): LiveServer {
  const {
    server,
    port,
    pathPrefix = '/ws/',
    maxPayload = 1024 * 1024,
    heartbeatInterval = 30_000,
    maxConnections = 100,
    allowedOrigins,
    logger = createLogger('live-server'),
    onMessage,
  } = options;

  const registry = new Map<string, Set<WebSocket>>();

  const wssOptions: ServerOptions = {
    maxPayload,
    verifyClient: (info: { origin: string; secure: boolean; req: IncomingMessage }): boolean => {
      if (clientIdFromPath(info.req.url, pathPrefix) === null) {
        logger.warn(`rejected connection to unknown path: ${info.req.url ?? ''}`);
        return false;
      }
      if (allowedOrigins && allowedOrigins.length > 0 && !allowedOrigins.includes(info.origin)) {
        logger.warn(`rejected connection from origin: ${info.origin}`);
        return false;
      }
      return true;
    },
  };
  if (server) {
    wssOptions.server = server;
  } else if (port !== undefined) {
    wssOptions.port = port;
  }

  const wss = new WebSocketServer(wssOptions);
  const cleanupHeartbeat = createHeartbeat(wss, heartbeatInterval);

  const register = (clientId: string, ws: WebSocket) => {
    let sockets = registry.get(clientId);
    if (!sockets) {
      sockets = new Set();
      registry.set(clientId, sockets);
    }
    sockets.add(ws);
  };

  const unregister = (clientId: string, ws: WebSocket) => {
    const sockets = registry.get(clientId);
    if (!sockets) return;
    sockets.delete(ws);
    if (sockets.size === 0) registry.delete(clientId);
  };

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    if (maxConnections > 0 && wss.clients.size > maxConnections) {
      logger.warn(`connection limit reached (${maxConnections}), rejecting`);
      ws.close(1013, 'Max connections reached');
      return;
    }

    const clientId = clientIdFromPath(req.url, pathPrefix) ?? uuidv4();
    register(clientId, ws);
    logger.info(`client connected: ${clientId}`);

    ws.on('message', (raw) => {
      let parsed: unknown;
      try {
        parsed = sanitizeJson(JSON.parse(rawDataToString(raw)));
      } catch {
        logger.debug(`ignoring malformed frame from ${clientId}`);
        return;
      }
      if (!isPlainRecord(parsed) || typeof parsed.type !== 'string') return;
      const message: WSMessage = { ...parsed, type: parsed.type };

      if (message.type === 'ping') {
        ws.send(JSON.stringify({ type: 'pong', timestamp: new Date().toISOString() }));
      } else {
        ws.send(JSON.stringify({ type: 'echo', data: message }));
      }
      onMessage?.(clientId, message);
    });

    ws.on('close', () => {
      unregister(clientId, ws);
      logger.info(`client disconnected: ${clientId}`);
    });

    ws.on('error', (err) => {
      logger.error(`client error: ${err.message}`);
    });
  });

  return {
    wss,
    connectionCount(clientId) {
      if (clientId === undefined) {
        let total = 0;
        for (const sockets of registry.values()) total += sockets.size;
        return total;
      }
      return registry.get(clientId)?.size ?? 0;
    },
    clientIds() {
      return [...registry.keys()];
    },
    broadcast(message) {
      return broadcast(wss.clients, message, logger);
    },
    sendTo(clientId, message) {
      return broadcast(registry.get(clientId) ?? [], message, logger);
    },
    cleanup() {
      cleanupHeartbeat();
      for (const ws of wss.clients) ws.terminate();
      registry.clear();
      wss.close();
    },
  };
}

export interface HealthReport {
  status: 'healthy';
  timestamp: string;
  version: string;
  components: { websocket: 'active' };
  connections: number;
}

export function healthReport(live: LiveServer, now: Date = new Date()): HealthReport {
  return {
    status: 'healthy',
    timestamp: now.toISOString(),
    version: SERVER_VERSION,
    components: { websocket: 'active' },
    connections: live.connectionCount(),
  };
}

/** HTTP listener answering `GET /health`; every other route is a JSON 404. */
export function createHealthHandler(live: LiveServer): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const pathname = (req.url ?? '/').split('?')[0];
    if (req.method === 'GET' && pathname === '/health') {
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify(healthReport(live)));
      return;
    }
    res.writeHead(404, { 'content-type': 'application/json' });
    res.end(JSON.stringify({ error: 'Resource not found', status_code: 404 }));
  };
}
