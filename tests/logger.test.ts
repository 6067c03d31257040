import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, isLogLevel } from '../src/logger.ts';

describe('createLogger', () => {
  it('should prefix messages with the scope', (t) => {
    const info = t.mock.method(console, 'info', () => {});
    const logger = createLogger('live-test', 'debug');
    logger.info('connected', { attempt: 1 });
    assert.equal(info.mock.callCount(), 1);
    assert.deepEqual(info.mock.calls[0].arguments, ['[live-test] connected', { attempt: 1 }]);
  });

  it('should filter below the configured level', (t) => {
    const debug = t.mock.method(console, 'debug', () => {});
    const info = t.mock.method(console, 'info', () => {});
    const warn = t.mock.method(console, 'warn', () => {});
    const logger = createLogger('live-test', 'warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    assert.equal(debug.mock.callCount(), 0);
    assert.equal(info.mock.callCount(), 0);
    assert.deepEqual(warn.mock.calls[0].arguments, ['[live-test] shown']);
  });

  it('should print nothing when silent', (t) => {
    const error = t.mock.method(console, 'error', () => {});
    createLogger('live-test', 'silent').error('nope');
    assert.equal(error.mock.callCount(), 0);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    assert.equal(isLogLevel('warn'), true);
    assert.equal(isLogLevel('verbose'), false);
    assert.equal(isLogLevel('toString'), false);
  });
});
