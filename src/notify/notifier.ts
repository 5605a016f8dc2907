import defaultLogger, { type Logger } from '../logger.js';
import { toError } from '../errors.js';
import type { EventRecord } from '../types.js';

export type NotifyResult = {
  ok: boolean;
  attempts: number;
  error?: string;
};

/** Delivers a confirmed event to whoever is watching. Implementations never throw. */
export interface Notifier {
  readonly name: string;
  notify(event: EventRecord): Promise<NotifyResult>;
}

export class LogNotifier implements Notifier {
  readonly name = 'log';
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? defaultLogger.child({ component: 'notifier' });
  }

  async notify(event: EventRecord): Promise<NotifyResult> {
    this.log.info(
      {
        eventId: event.eventId,
        windowId: event.scores.windowId,
        babyScore: event.scores.babyScore,
        catScore: event.scores.catScore,
        clipReference: event.clipReference
      },
      'Baby cry confirmed'
    );
    return { ok: true, attempts: 1 };
  }
}

export type WebhookNotifierOptions = {
  url: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  logger?: Logger;
};

/** POSTs the event as JSON; a failed delivery is retried once. */
export class WebhookNotifier implements Notifier {
  readonly name = 'webhook';
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
    this.log = options.logger ?? defaultLogger.child({ component: 'notifier' });
  }

  async notify(event: EventRecord): Promise<NotifyResult> {
    let lastError = 'unknown error';
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      try {
        const response = await this.fetchImpl(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(event),
          signal: AbortSignal.timeout(this.timeoutMs)
        });
        if (response.ok) {
          return { ok: true, attempts: attempt };
        }
        lastError = `HTTP ${response.status}`;
      } catch (error) {
        lastError = toError(error).message;
      }
      this.log.warn({ eventId: event.eventId, attempt, error: lastError }, 'Webhook delivery failed');
    }
    return { ok: false, attempts: 2, error: lastError };
  }
}
