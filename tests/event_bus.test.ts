import { describe, expect, it, vi } from 'vitest';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { LogNotifier, WebhookNotifier, type Notifier } from '../src/notify/notifier.js';
import type { EventRecord } from '../src/types.js';
import { cryWindow } from './helpers/fixtures.js';

const event: EventRecord = {
  eventId: 'evt-1',
  timestamp: 3000,
  scores: cryWindow(3),
  clipReference: 'clips/window-3.wav'
};

function okNotifier() {
  const notify = vi.fn(async (_event: EventRecord) => ({ ok: true, attempts: 1 }));
  const notifier: Notifier = { name: 'fake', notify };
  return { notifier, notify };
}

describe('EventBus', () => {
  it('stores, notifies and emits a dispatched event', async () => {
    const store = vi.fn();
    const { notifier } = okNotifier();
    const metrics = new MetricsRegistry();
    const bus = new EventBus({ store, notifier, metrics });
    const seen: EventRecord[] = [];
    const unsubscribe = bus.onEvent(received => seen.push(received));

    const result = await bus.dispatch(event);
    unsubscribe();
    await bus.dispatch({ ...event, eventId: 'evt-2' });

    expect(result).toEqual({ stored: true, notified: true });
    expect(store).toHaveBeenCalledWith(event);
    expect(seen).toEqual([event]);
    expect(metrics.snapshot().dispatch.notified).toBe(2);
  });

  it('still notifies when the store throws', async () => {
    const { notifier, notify } = okNotifier();
    const metrics = new MetricsRegistry();
    const bus = new EventBus({
      store: () => {
        throw new Error('database is locked');
      },
      notifier,
      metrics
    });

    const result = await bus.dispatch(event);

    expect(result).toEqual({ stored: false, notified: true });
    expect(notify).toHaveBeenCalledTimes(1);
    expect(metrics.snapshot().dispatch.storeFailures).toBe(1);
    expect(metrics.snapshot().dispatch.lastFailure?.message).toBe('database is locked');
  });

  it('resolves even when the notifier rejects', async () => {
    const metrics = new MetricsRegistry();
    const bus = new EventBus({
      store: vi.fn(),
      notifier: { name: 'broken', notify: async () => Promise.reject(new Error('socket hang up')) },
      metrics
    });

    await expect(bus.dispatch(event)).resolves.toEqual({ stored: true, notified: false });
    expect(metrics.snapshot().dispatch.notifyFailures).toBe(1);
  });
});

describe('WebhookNotifier', () => {
  it('posts the event as JSON', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 204 }));
    const notifier = new WebhookNotifier({ url: 'http://hooks.test/cry', timeoutMs: 1000, fetch: fetchMock });

    const result = await notifier.notify(event);

    expect(result).toEqual({ ok: true, attempts: 1 });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://hooks.test/cry');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual(event);
  });

  it('retries a failed delivery once', async () => {
    const fetchMock = vi
      .fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 200 }))
      .mockResolvedValueOnce(new Response(null, { status: 502 }));
    const notifier = new WebhookNotifier({ url: 'http://hooks.test/cry', timeoutMs: 1000, fetch: fetchMock });

    const result = await notifier.notify(event);

    expect(result).toEqual({ ok: true, attempts: 2 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after the retry and reports the last error', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 500 }));
    const notifier = new WebhookNotifier({ url: 'http://hooks.test/cry', timeoutMs: 1000, fetch: fetchMock });

    const result = await notifier.notify(event);

    expect(result).toEqual({ ok: false, attempts: 2, error: 'HTTP 500' });
  });

  it('reports network errors as failed attempts', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const notifier = new WebhookNotifier({ url: 'http://hooks.test/cry', timeoutMs: 1000, fetch: fetchMock });

    await expect(notifier.notify(event)).resolves.toEqual({ ok: false, attempts: 2, error: 'fetch failed' });
  });
});

describe('LogNotifier', () => {
  it('always succeeds on the first attempt', async () => {
    await expect(new LogNotifier().notify(event)).resolves.toEqual({ ok: true, attempts: 1 });
  });
});
