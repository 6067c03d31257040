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
} from './messages.js';

export type {
  ConnectionState,
  PageLocation,
} from './connection.js';
