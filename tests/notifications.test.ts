import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NotificationCenter, escapeHtml } from '../src/ui/notifications.ts';
import type { NotificationItem } from '../src/ui/notifications.ts';
import { FakeScheduler } from './helpers/fake-scheduler.ts';
import { captureLogger } from './helpers/capture-logger.ts';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function setup() {
  const scheduler = new FakeScheduler(1_000);
  const center = new NotificationCenter({ scheduler, logger: captureLogger().logger });
  return { scheduler, center };
}

describe('NotificationCenter', () => {
  it('should show an item with a generated id', () => {
    const { center } = setup();
    const id = center.display('Assignment due tomorrow', 'warning');
    assert.match(id, UUID_V4);
    assert.deepEqual(center.items(), [
      { id, message: 'Assignment due tomorrow', category: 'warning', shownAt: 1_000 },
    ]);
  });

  it('should stack duplicate messages as independent items', () => {
    const { center } = setup();
    const first = center.display('Saved', 'success');
    const second = center.display('Saved', 'success');
    assert.notEqual(first, second);
    assert.deepEqual(center.items().map((i) => i.id), [first, second]);
  });

  it('should hide each item after five seconds', () => {
    const { center, scheduler } = setup();
    center.display('first', 'info');
    scheduler.advance(2_000);
    const later = center.display('second', 'info');

    scheduler.advance(2_999);
    assert.equal(center.items().length, 2);
    scheduler.advance(1);
    assert.deepEqual(center.items().map((i) => i.id), [later]);
    scheduler.advance(2_000);
    assert.equal(center.items().length, 0);
  });

  it('should let the user dismiss an item early', () => {
    const { center, scheduler } = setup();
    const id = center.display('Offline', 'error');
    assert.equal(center.dismiss(id), true);
    assert.equal(center.items().length, 0);
    assert.equal(center.dismiss(id), false);
    assert.equal(scheduler.pendingCount, 0);
  });

  it('should notify subscribers with a snapshot on every change', () => {
    const { center, scheduler } = setup();
    const snapshots: NotificationItem[][] = [];
    const off = center.subscribe((items) => snapshots.push([...items]));

    const a = center.display('a', 'info');
    center.display('b', 'info');
    center.dismiss(a);
    scheduler.advance(5_000);

    assert.deepEqual(snapshots.map((s) => s.map((i) => i.message)), [['a'], ['a', 'b'], ['b'], []]);
    off();
    center.display('c', 'info');
    assert.equal(snapshots.length, 4);
  });

  it('should cancel every timer on clear()', () => {
    const { center, scheduler } = setup();
    center.display('a', 'info');
    center.display('b', 'info');
    center.clear();
    assert.equal(center.items().length, 0);
    assert.equal(scheduler.pendingCount, 0);
  });

  it('should honour a custom dismiss delay', () => {
    const scheduler = new FakeScheduler();
    const center = new NotificationCenter({ scheduler, autoDismissMs: 100, logger: captureLogger().logger });
    center.display('quick', 'info');
    scheduler.advance(100);
    assert.equal(center.items().length, 0);
  });
});

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    assert.equal(escapeHtml(`<b>"Tom" & 'Jerry'</b>`), '&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;');
  });
});
