import type { LiveClientConfig } from './config.js';
import { DEFAULT_CONFIG } from './config.js';
import type { ConnectionState } from './types/connection.js';
import type { LiveEvent } from './types/messages.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { ConnectionManager } from './ws/connection-manager.js';
import type { Scheduler } from './ws/scheduler.js';
import type { TransportFactory } from './ws/transport.js';
import { UiEventBus } from './ui/event-bus.js';
import { NotificationCenter } from './ui/notifications.js';
import { DisplayBoard } from './ui/display-board.js';
import { routeUpdate } from './ui/update-router.js';

export interface LiveClientDeps {
  transportFactory?: TransportFactory;
  scheduler?: Scheduler;
  logger?: Logger;
  onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
}

export interface LiveClient {
  readonly connection: ConnectionManager;
  readonly bus: UiEventBus;
  readonly notifications: NotificationCenter;
  readonly board: DisplayBoard;
  start(): void;
  stop(): void;
}

/**
 * Wire a connection, an event bus, a notification stack and a display board
 * into one client with an explicit start/stop lifecycle. Each call builds
 * fresh instances; nothing is shared between clients.
 */
export function createLiveClient(config: Partial<LiveClientConfig> = {}, deps: LiveClientDeps = {}): LiveClient {
  const settings: LiveClientConfig = { ...DEFAULT_CONFIG, ...config };
  const logger = deps.logger ?? createLogger('live-client');

  const bus = new UiEventBus(logger);
  const notifications = new NotificationCenter({
    autoDismissMs: settings.notificationDismissMs,
    scheduler: deps.scheduler,
    logger,
  });
  const board = new DisplayBoard();

  const forward = (event: LiveEvent) => {
    if (event.type === 'notification' && !settings.enableNotifications) {
      logger.debug('notifications disabled, dropping message');
      return;
    }
    if (event.type === 'update' && !settings.enableRealTimeSync) {
      logger.debug('real-time sync disabled, dropping update');
      return;
    }
    bus.emit(event);
  };

  const connection = new ConnectionManager({
    url: settings.url,
    transportFactory: deps.transportFactory,
    scheduler: deps.scheduler,
    logger,
    heartbeatIntervalMs: settings.heartbeatIntervalMs,
    reconnectDelayMs: settings.reconnectDelayMs,
    backoffMultiplier: settings.backoffMultiplier,
    maxReconnectDelayMs: settings.maxReconnectDelayMs,
    maxReconnectAttempts: settings.maxReconnectAttempts,
    maxQueueSize: settings.maxQueueSize,
    onMessage: forward,
    onStateChange: deps.onStateChange,
  });

  bus.on('notification', (event) => {
    notifications.display(event.message, event.category);
  });
  bus.on('update', (event) => {
    logger.debug('real-time update received', event.update);
    routeUpdate(event.update, board, logger);
  });

  return {
    connection,
    bus,
    notifications,
    board,
    start() {
      if (!settings.enableWebsockets) {
        logger.info('websockets disabled, live updates stay off');
        return;
      }
      connection.start();
    },
    stop() {
      connection.stop();
      notifications.clear();
    },
  };
}
