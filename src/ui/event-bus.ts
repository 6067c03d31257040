import type { LiveEvent } from '../types/messages.js';
import { describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';

export type LiveEventKind = LiveEvent['type'];
export type LiveEventOf<K extends LiveEventKind> = Extract<LiveEvent, { type: K }>;
export type LiveEventHandler<K extends LiveEventKind> = (event: LiveEventOf<K>) => void;

type HandlerSets = { [K in LiveEventKind]: Set<LiveEventHandler<K>> };

/**
 * Fan-out point between the connection and the page's widgets.
 * Listeners are keyed by message kind; one throwing listener does not
 * stop delivery to the rest.
 */
export class UiEventBus {
  private readonly handlers: HandlerSets = {
    notification: new Set(),
    update: new Set(),
  };

  constructor(private readonly logger: Logger = createLogger('live-ui')) {}

  /** Subscribe to one kind of event. Returns an unsubscribe function. */
  on<K extends LiveEventKind>(kind: K, handler: LiveEventHandler<K>): () => void {
    const set: Set<LiveEventHandler<K>> = this.handlers[kind];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  emit(event: LiveEvent): void {
    switch (event.type) {
      case 'notification':
        this.deliver(this.handlers.notification, event);
        return;
      case 'update':
        this.deliver(this.handlers.update, event);
        return;
    }
  }

  listenerCount(kind: LiveEventKind): number {
    return this.handlers[kind].size;
  }

  clear(): void {
    this.handlers.notification.clear();
    this.handlers.update.clear();
  }

  private deliver<E extends LiveEvent>(handlers: Set<(event: E) => void>, event: E): void {
    for (const handler of [...handlers]) {
      try {
        handler(event);
      } catch (err) {
        this.logger.error(`${event.type} listener failed: ${describeError(err)}`);
      }
    }
  }
}
