// Types
export type {
  NotificationCategory,
  PingMessage,
  ClientMessage,
  StatsData,
  ComponentUpdate,
  PongMessage,
  NotificationMessage,
  UpdateMessage,
  UnknownMessage,
  ServerMessage,
  LiveEvent,
  WSMessage,
  ConnectionState,
  PageLocation,
} from './types/index.js';

export type { LiveClientConfig } from './config.js';
export type { LiveClient, LiveClientDeps } from './live-client.js';
export type { Logger, LogLevel } from './logger.js';
export type { ConnectionManagerOptions } from './ws/connection-manager.js';
export type { DecodeResult } from './ws/decode.js';
export type { Scheduler, CancelTimer } from './ws/scheduler.js';
export type { Transport, TransportFactory, TransportHandlers } from './ws/transport.js';
export type { LiveEventKind, LiveEventHandler } from './ui/event-bus.js';
export type { NotificationItem, NotificationSurface, NotificationCenterOptions } from './ui/notifications.js';
export type { DisplayElement, DisplayRole } from './ui/display-board.js';
export type { LiveServer, LiveServerOptions, HealthReport } from './ws/server.js';

// Client
export { createLiveClient } from './live-client.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export { ConnectionManager } from './ws/connection-manager.js';
export { decodeServerMessage, encodeClientMessage } from './ws/decode.js';
export { resolveEndpoint, parsePageLocation, DEFAULT_CHANNEL_PATH } from './ws/endpoint.js';
export { ScheduledTask, systemScheduler } from './ws/scheduler.js';
export { wsTransportFactory } from './ws/transport.js';
export { sanitizeJson } from './ws/sanitize.js';

// UI
export { UiEventBus } from './ui/event-bus.js';
export { NotificationCenter, escapeHtml } from './ui/notifications.js';
export { DisplayBoard } from './ui/display-board.js';
export { routeUpdate } from './ui/update-router.js';

// Errors and logging
export { LiveError, TransportUnavailableError, MessageParseError, ConfigError } from './errors.js';
export { createLogger, silentLogger } from './logger.js';

// WebSocket server
export { createHeartbeat, broadcast, createLiveServer, createHealthHandler, healthReport } from './ws/server.js';
