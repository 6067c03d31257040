import { v4 as uuidv4 } from 'uuid';
import type { NotificationCategory } from '../types/messages.js';
import { describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { systemScheduler } from '../ws/scheduler.js';
import type { CancelTimer, Scheduler } from '../ws/scheduler.js';

export interface NotificationItem {
  id: string;
  message: string;
  category: NotificationCategory;
  /** Epoch ms when the item was displayed */
  shownAt: number;
}

export type NotificationListener = (items: readonly NotificationItem[]) => void;

/** The one capability the connection layer needs from the notification UI. */
export interface NotificationSurface {
  display(message: string, category: NotificationCategory): string;
}

export interface NotificationCenterOptions {
  /** Time before an item hides itself in ms (default: 5000) */
  autoDismissMs?: number;
  scheduler?: Scheduler;
  logger?: Logger;
}

/**
 * Stack of transient notifications. Every `display` call adds its own item,
 * and each item disappears after `autoDismissMs` unless dismissed first.
 */
export class NotificationCenter implements NotificationSurface {
  private readonly visible = new Map<string, { item: NotificationItem; cancel: CancelTimer }>();
  private readonly listeners = new Set<NotificationListener>();

  private readonly autoDismissMs: number;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;

  constructor(options: NotificationCenterOptions = {}) {
    this.autoDismissMs = options.autoDismissMs ?? 5_000;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.logger = options.logger ?? createLogger('live-notifications');
  }

  display(message: string, category: NotificationCategory = 'info'): string {
    const item: NotificationItem = {
      id: uuidv4(),
      message,
      category,
      shownAt: this.scheduler.now(),
    };
    const cancel = this.scheduler.schedule(() => this.remove(item.id), this.autoDismissMs);
    this.visible.set(item.id, { item, cancel });
    this.notify();
    return item.id;
  }

  /** Hide an item before its timer runs out (the close button). */
  dismiss(id: string): boolean {
    const entry = this.visible.get(id);
    if (!entry) return false;
    entry.cancel();
    return this.remove(id);
  }

  items(): NotificationItem[] {
    return [...this.visible.values()].map(({ item }) => item);
  }

  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    for (const { cancel } of this.visible.values()) cancel();
    const hadItems = this.visible.size > 0;
    this.visible.clear();
    if (hadItems) this.notify();
  }

  private remove(id: string): boolean {
    const removed = this.visible.delete(id);
    if (removed) this.notify();
    return removed;
  }

  private notify(): void {
    const snapshot = this.items();
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.error(`notification listener failed: ${describeError(err)}`);
      }
    }
  }
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/** Escape text for renderers that build notification markup as a string. */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}
