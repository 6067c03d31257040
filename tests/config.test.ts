import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_CONFIG, loadConfig } from '../src/config.ts';
import { ConfigError } from '../src/errors.ts';

describe('loadConfig', () => {
  it('should fall back to defaults with an empty environment', () => {
    const config = loadConfig({});
    assert.deepEqual(config, DEFAULT_CONFIG);
    assert.equal(config.url, 'ws://localhost:8000/ws/main');
    assert.equal(config.heartbeatIntervalMs, 30_000);
    assert.equal(config.reconnectDelayMs, 5_000);
    assert.equal(config.maxReconnectAttempts, 0);
  });

  it('should derive the URL from the page origin and path', () => {
    assert.equal(loadConfig({ LIVE_ORIGIN: 'https://learn.example.com' }).url, 'wss://learn.example.com/ws/main');
    assert.equal(
      loadConfig({ LIVE_ORIGIN: 'http://127.0.0.1:3000', LIVE_PATH: '/ws/admin' }).url,
      'ws://127.0.0.1:3000/ws/admin',
    );
  });

  it('should prefer an explicit LIVE_URL', () => {
    const config = loadConfig({ LIVE_URL: 'wss://push.example.com/ws/main', LIVE_ORIGIN: 'http://ignored.example.com' });
    assert.equal(config.url, 'wss://push.example.com/ws/main');
  });

  it('should reject a LIVE_URL that is not a socket URL', () => {
    assert.throws(() => loadConfig({ LIVE_URL: 'https://learn.example.com/ws/main' }), ConfigError);
  });

  it('should parse numeric settings', () => {
    const config = loadConfig({
      LIVE_HEARTBEAT_MS: '15000',
      LIVE_RECONNECT_DELAY_MS: ' 2000 ',
      LIVE_BACKOFF_MULTIPLIER: '1.5',
      LIVE_MAX_RECONNECT_ATTEMPTS: '8',
    });
    assert.equal(config.heartbeatIntervalMs, 15_000);
    assert.equal(config.reconnectDelayMs, 2_000);
    assert.equal(config.backoffMultiplier, 1.5);
    assert.equal(config.maxReconnectAttempts, 8);
  });

  it('should reject invalid numbers', () => {
    assert.throws(() => loadConfig({ LIVE_HEARTBEAT_MS: 'soon' }), {
      name: 'ConfigError',
      message: 'LIVE_HEARTBEAT_MS: expected a non-negative number, got "soon"',
    });
    assert.throws(() => loadConfig({ LIVE_RECONNECT_DELAY_MS: '-1' }), ConfigError);
    assert.throws(() => loadConfig({ LIVE_MAX_RECONNECT_ATTEMPTS: '2.5' }), {
      message: 'LIVE_MAX_RECONNECT_ATTEMPTS: expected an integer, got "2.5"',
    });
    assert.throws(() => loadConfig({ LIVE_BACKOFF_MULTIPLIER: '0.5' }), {
      message: 'LIVE_BACKOFF_MULTIPLIER: must be at least 1, got 0.5',
    });
  });

  it('should parse feature flags', () => {
    const config = loadConfig({ ENABLE_NOTIFICATIONS: 'no', ENABLE_REAL_TIME_SYNC: '0', ENABLE_WEBSOCKETS: 'TRUE' });
    assert.equal(config.enableNotifications, false);
    assert.equal(config.enableRealTimeSync, false);
    assert.equal(config.enableWebsockets, true);
    assert.throws(() => loadConfig({ ENABLE_WEBSOCKETS: 'maybe' }), {
      message: 'ENABLE_WEBSOCKETS: expected a boolean, got "maybe"',
    });
  });

  it('should treat blank values as unset', () => {
    assert.equal(loadConfig({ LIVE_URL: '   ', LIVE_HEARTBEAT_MS: '' }).heartbeatIntervalMs, 30_000);
  });
});
