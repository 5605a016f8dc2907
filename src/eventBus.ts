import { EventEmitter } from 'node:events';
import logger from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import { toError } from './errors.js';
import type { Notifier } from './notify/notifier.js';
import type { EventRecord } from './types.js';

const EVENT_CHANNEL = 'event';

export type DispatchResult = {
  stored: boolean;
  notified: boolean;
};

interface EventBusDependencies {
  store: (event: EventRecord) => void;
  notifier: Notifier;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

/**
 * Hands confirmed events to the artifact store and the notifier. Failures of
 * either are logged and counted; dispatch itself never rejects.
 */
export class EventBus extends EventEmitter {
  private readonly store: (event: EventRecord) => void;
  private readonly notifier: Notifier;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies) {
    super();
    this.store = dependencies.store;
    this.notifier = dependencies.notifier;
    this.log = dependencies.log ?? logger.child({ component: 'events' });
    this.metrics = dependencies.metrics ?? defaultMetrics;
  }

  async dispatch(event: EventRecord): Promise<DispatchResult> {
    let stored = false;
    try {
      this.store(event);
      stored = true;
    } catch (error) {
      this.metrics.recordDispatchFailure('store', error);
      this.log.error({ err: toError(error), eventId: event.eventId }, 'Failed to store event');
    }

    let notified = false;
    try {
      const result = await this.notifier.notify(event);
      notified = result.ok;
      this.metrics.recordNotification(result.ok, result.attempts);
      if (!result.ok) {
        this.metrics.recordDispatchFailure('notify', result.error ?? 'notification failed');
        this.log.error(
          { eventId: event.eventId, notifier: this.notifier.name, attempts: result.attempts, error: result.error },
          'Notification failed'
        );
      }
    } catch (error) {
      this.metrics.recordNotification(false);
      this.metrics.recordDispatchFailure('notify', error);
      this.log.error({ err: toError(error), eventId: event.eventId }, 'Notifier threw');
    }

    this.log.info({ eventId: event.eventId, windowId: event.scores.windowId, stored, notified }, 'Event dispatched');
    this.emit(EVENT_CHANNEL, event);
    return { stored, notified };
  }

  onEvent(listener: (event: EventRecord) => void) {
    this.on(EVENT_CHANNEL, listener);
    return () => {
      this.off(EVENT_CHANNEL, listener);
    };
  }
}

export default EventBus;
