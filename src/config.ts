import { ConfigError } from './errors.js';
import { DEFAULT_CHANNEL_PATH, parsePageLocation, resolveEndpoint } from './ws/endpoint.js';

export interface LiveClientConfig {
  /** Channel URL (e.g., 'wss://learn.example.com/ws/main') */
  url: string;
  heartbeatIntervalMs: number;
  reconnectDelayMs: number;
  backoffMultiplier: number;
  maxReconnectDelayMs: number;
  /** 0 = retry forever */
  maxReconnectAttempts: number;
  maxQueueSize: number;
  notificationDismissMs: number;
  enableWebsockets: boolean;
  enableNotifications: boolean;
  enableRealTimeSync: boolean;
}

export const DEFAULT_ORIGIN = 'http://localhost:8000';

export const DEFAULT_CONFIG: LiveClientConfig = {
  url: resolveEndpoint(parsePageLocation(DEFAULT_ORIGIN), DEFAULT_CHANNEL_PATH),
  heartbeatIntervalMs: 30_000,
  reconnectDelayMs: 5_000,
  backoffMultiplier: 1,
  maxReconnectDelayMs: 30_000,
  maxReconnectAttempts: 0,
  maxQueueSize: 10,
  notificationDismissMs: 5_000,
  enableWebsockets: true,
  enableNotifications: true,
  enableRealTimeSync: true,
};

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(key, `expected a non-negative number, got "${raw}"`);
  }
  return value;
}

function readInteger(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigError(key, `expected an integer, got "${value}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new ConfigError(key, `expected a boolean, got "${raw}"`);
}

/**
 * Build the client configuration from environment variables.
 * `LIVE_URL` wins over `LIVE_ORIGIN` + `LIVE_PATH`.
 */
export function loadConfig(env: Env = process.env): LiveClientConfig {
  const explicitUrl = readString(env, 'LIVE_URL');
  let url: string;
  if (explicitUrl) {
    if (!/^wss?:\/\//.test(explicitUrl)) {
      throw new ConfigError('LIVE_URL', `expected a ws:// or wss:// URL, got "${explicitUrl}"`);
    }
    url = explicitUrl;
  } else {
    const origin = readString(env, 'LIVE_ORIGIN') ?? DEFAULT_ORIGIN;
    const path = readString(env, 'LIVE_PATH') ?? DEFAULT_CHANNEL_PATH;
    url = resolveEndpoint(parsePageLocation(origin), path);
  }

  const backoffMultiplier = readNumber(env, 'LIVE_BACKOFF_MULTIPLIER', DEFAULT_CONFIG.backoffMultiplier);
  if (backoffMultiplier < 1) {
    throw new ConfigError('LIVE_BACKOFF_MULTIPLIER', `must be at least 1, got ${backoffMultiplier}`);
  }

  return {
    url,
    heartbeatIntervalMs: readInteger(env, 'LIVE_HEARTBEAT_MS', DEFAULT_CONFIG.heartbeatIntervalMs),
    reconnectDelayMs: readInteger(env, 'LIVE_RECONNECT_DELAY_MS', DEFAULT_CONFIG.reconnectDelayMs),
    backoffMultiplier,
    maxReconnectDelayMs: readInteger(env, 'LIVE_MAX_RECONNECT_DELAY_MS', DEFAULT_CONFIG.maxReconnectDelayMs),
    maxReconnectAttempts: readInteger(env, 'LIVE_MAX_RECONNECT_ATTEMPTS', DEFAULT_CONFIG.maxReconnectAttempts),
    maxQueueSize: readInteger(env, 'LIVE_MAX_QUEUE_SIZE', DEFAULT_CONFIG.maxQueueSize),
    notificationDismissMs: readInteger(env, 'LIVE_NOTIFICATION_DISMISS_MS', DEFAULT_CONFIG.notificationDismissMs),
    enableWebsockets: readBoolean(env, 'ENABLE_WEBSOCKETS', DEFAULT_CONFIG.enableWebsockets),
    enableNotifications: readBoolean(env, 'ENABLE_NOTIFICATIONS', DEFAULT_CONFIG.enableNotifications),
    enableRealTimeSync: readBoolean(env, 'ENABLE_REAL_TIME_SYNC', DEFAULT_CONFIG.enableRealTimeSync),
  };
}
