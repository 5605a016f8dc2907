import defaultLogger, { type Logger } from '../logger.js';

export type WatchTickContext = {
  /** `startedAt` of the session the watch was started for. */
  sessionStartedAt: string;
  isCancelled: () => boolean;
};

/** Produces one watch emission. Returning false ends the watch for that origin. */
export type WatchTick = (origin: string, context: WatchTickContext) => boolean;

type WatchTask = {
  sessionStartedAt: string;
  intervalMs: number;
  timer: NodeJS.Timeout | null;
  cancelled: boolean;
};

/**
 * Per-origin periodic status emitters. Each origin has at most one timer
 * chain; the first tick fires on the next turn of the event loop. Once a task
 * is cancelled its tick never runs again.
 */
export class WatchRegistry {
  private readonly tasks = new Map<string, WatchTask>();
  private readonly log: Logger;

  constructor(
    private readonly tick: WatchTick,
    logger?: Logger
  ) {
    this.log = logger ?? defaultLogger.child({ component: 'watch' });
  }

  start(origin: string, intervalSeconds: number, sessionStartedAt: string) {
    this.stop(origin);
    const task: WatchTask = {
      sessionStartedAt,
      intervalMs: Math.max(1, intervalSeconds) * 1000,
      timer: null,
      cancelled: false
    };
    this.tasks.set(origin, task);
    this.schedule(origin, task, 0);
    this.log.debug({ origin, intervalSeconds, sessionStartedAt }, 'Watch started');
  }

  /** Cancels the origin's watch. Returns whether one was running. */
  stop(origin: string): boolean {
    const task = this.tasks.get(origin);
    if (!task) {
      return false;
    }
    this.cancel(origin, task);
    this.log.debug({ origin }, 'Watch stopped');
    return true;
  }

  stopAll(): number {
    const entries = Array.from(this.tasks.entries());
    for (const [origin, task] of entries) {
      this.cancel(origin, task);
    }
    return entries.length;
  }

  has(origin: string) {
    return this.tasks.has(origin);
  }

  get size() {
    return this.tasks.size;
  }

  origins(): string[] {
    return Array.from(this.tasks.keys());
  }

  private cancel(origin: string, task: WatchTask) {
    task.cancelled = true;
    if (task.timer) {
      clearTimeout(task.timer);
      task.timer = null;
    }
    if (this.tasks.get(origin) === task) {
      this.tasks.delete(origin);
    }
  }

  private schedule(origin: string, task: WatchTask, delayMs: number) {
    task.timer = setTimeout(() => {
      task.timer = null;
      this.run(origin, task);
    }, delayMs);
  }

  private run(origin: string, task: WatchTask) {
    if (task.cancelled) {
      return;
    }
    let keepGoing: boolean;
    try {
      keepGoing = this.tick(origin, {
        sessionStartedAt: task.sessionStartedAt,
        isCancelled: () => task.cancelled
      });
    } catch (error) {
      this.log.error({ err: error, origin }, 'Watch tick failed');
      keepGoing = false;
    }
    if (task.cancelled) {
      return;
    }
    if (!keepGoing) {
      this.cancel(origin, task);
      return;
    }
    this.schedule(origin, task, task.intervalMs);
  }
}
