export type NotificationCategory = 'info' | 'success' | 'warning' | 'error';

/** Frames the client sends. */
export interface PingMessage {
  type: 'ping';
  /** Epoch milliseconds at send time */
  timestamp: number;
}

export type ClientMessage = PingMessage;

export type StatsData = Record<string, string | number>;

export type ComponentUpdate =
  | { component: 'stats'; data: StatsData }
  | { component: 'users'; data: number | string }
  /** Component names this client does not render yet */
  | { component: 'unknown'; name: string; data: unknown };

export interface PongMessage {
  type: 'pong';
  timestamp?: string | number;
}

export interface NotificationMessage {
  type: 'notification';
  message: string;
  category: NotificationCategory;
}

export interface UpdateMessage {
  type: 'update';
  update: ComponentUpdate;
}

export interface UnknownMessage {
  type: 'unknown';
  rawType: string;
}

/** Inbound frames after decoding. Anything unrecognised lands in `unknown`. */
export type ServerMessage = PongMessage | NotificationMessage | UpdateMessage | UnknownMessage;

/** Server messages the UI layer consumes. */
export type LiveEvent = NotificationMessage | UpdateMessage;

/** Generic envelope accepted by the live server for broadcast. */
export interface WSMessage {
  type: string;
  [key: string]: unknown;
}
