export type CancelTimer = () => void;

/**
 * Timer source for the connection manager. The default wraps the global
 * timers; tests supply a manual clock.
 */
export interface Scheduler {
  /** Run `callback` once after `delayMs`. Returns a function that cancels it. */
  schedule(callback: () => void, delayMs: number): CancelTimer;
  now(): number;
}

export const systemScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
  now: () => Date.now(),
};

/**
 * A single cancellable scheduled task. Scheduling again replaces the
 * pending callback, so at most one timer is ever outstanding per task.
 */
export class ScheduledTask {
  private cancelPending: CancelTimer | null = null;

  constructor(private readonly scheduler: Scheduler) {}

  schedule(callback: () => void, delayMs: number): void {
    this.cancel();
    this.cancelPending = this.scheduler.schedule(() => {
      this.cancelPending = null;
      callback();
    }, delayMs);
  }

  cancel(): void {
    if (this.cancelPending) {
      this.cancelPending();
      this.cancelPending = null;
    }
  }

  get pending(): boolean {
    return this.cancelPending !== null;
  }
}
