import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../../logger.js';
import metricsModule, { MetricsRegistry } from '../../metrics/index.js';
import { StateChannelUnavailableError, toError } from '../../errors.js';
import type { CommandService, MemoryOutbox } from '../../commands/service.js';
import type { CalibrationManager } from '../../calibration/manager.js';
import type { EventStore, ListEventsOptions } from '../../db.js';
import { isRecord } from '../../utils/schema.js';

export type HealthReport = {
  status: string;
  checks: Array<{ name: string; status: string; details?: Record<string, unknown> }>;
};

export interface CommandsRouterOptions {
  service: CommandService;
  manager: CalibrationManager;
  outbox: MemoryOutbox;
  store?: EventStore | null;
  metrics?: MetricsRegistry;
  health?: () => Promise<HealthReport>;
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

const DEFAULT_ORIGIN = 'http';

export class CommandsRouter {
  private readonly service: CommandService;
  private readonly manager: CalibrationManager;
  private readonly outbox: MemoryOutbox;
  private readonly store: EventStore | null;
  private readonly metrics: MetricsRegistry;
  private readonly health: (() => Promise<HealthReport>) | null;
  private readonly handlers: Handler[];

  constructor(options: CommandsRouterOptions) {
    this.service = options.service;
    this.manager = options.manager;
    this.outbox = options.outbox;
    this.store = options.store ?? null;
    this.metrics = options.metrics ?? metricsModule;
    this.health = options.health ?? null;
    this.handlers = [
      (req, res, url) => this.handleCommand(req, res, url),
      (req, res, url) => this.handleStatus(req, res, url),
      (req, res, url) => this.handleOutbox(req, res, url),
      (req, res, url) => this.handleEvents(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  close() {
    this.service.close();
  }

  private handleCommand(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/commands') {
      return false;
    }

    readJsonBody(req)
      .catch(() => null)
      .then(payload => {
        if (!isRecord(payload)) {
          sendJson(res, 400, { error: 'Invalid command payload' });
          return;
        }
        const text = typeof payload.text === 'string' ? payload.text.trim() : '';
        if (!text) {
          sendJson(res, 400, { error: 'Command text is required' });
          return;
        }
        const origin =
          typeof payload.origin === 'string' && payload.origin.trim() ? payload.origin.trim() : DEFAULT_ORIGIN;
        const reply = this.service.execute(origin, text);
        sendJson(res, 200, { origin, ok: reply.ok, text: reply.text });
      })
      .catch(error => {
        logger.error({ err: toError(error) }, 'Command request failed');
        sendJson(res, 500, { error: 'Internal server error' });
      });

    return true;
  }

  private handleStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/status') {
      return false;
    }

    try {
      this.manager.sync();
      const monitor = this.service.readMonitor();
      sendJson(res, 200, {
        calibration: this.manager.status(),
        monitor: {
          status: monitor.document,
          ageMs: monitor.ageMs,
          stale: monitor.stale
        }
      });
    } catch (error) {
      if (error instanceof StateChannelUnavailableError) {
        sendJson(res, 503, { error: 'status unknown, retry', detail: error.message });
        return true;
      }
      throw error;
    }

    return true;
  }

  private handleOutbox(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/outbox') {
      return false;
    }

    const origin = url.searchParams.get('origin')?.trim();
    if (!origin) {
      sendJson(res, 400, { error: 'origin query parameter is required' });
      return true;
    }
    sendJson(res, 200, { origin, messages: this.outbox.drain(origin) });
    return true;
  }

  private handleEvents(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events') {
      return false;
    }
    if (!this.store) {
      sendJson(res, 404, { error: 'Event store not configured' });
      return true;
    }

    const options = parseListOptions(url);
    const result = this.store.listEvents(options);
    sendJson(res, 200, {
      items: result.items,
      total: result.total,
      limit: options.limit ?? undefined,
      offset: options.offset ?? undefined
    });
    return true;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/health') {
      return false;
    }

    if (!this.health) {
      sendJson(res, 200, { status: 'ok', checks: [] });
      return true;
    }

    this.health()
      .then(report => {
        sendJson(res, report.status === 'ok' ? 200 : 503, report);
      })
      .catch(error => {
        logger.error({ err: toError(error) }, 'Health check failed');
        sendJson(res, 500, { error: 'Internal server error' });
      });
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/metrics') {
      return false;
    }

    if (url.searchParams.get('format') === 'json') {
      sendJson(res, 200, { metrics: this.metrics.snapshot() });
      return true;
    }
    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
    res.end(this.metrics.exportPrometheus());
    return true;
  }
}

export function createCommandsRouter(options: CommandsRouterOptions) {
  return new CommandsRouter(options);
}

function parseListOptions(url: URL): ListEventsOptions {
  const options: ListEventsOptions = {};
  const limit = parseNumberParam(url.searchParams.get('limit'));
  const offset = parseNumberParam(url.searchParams.get('offset'));
  const since = parseNumberParam(url.searchParams.get('since'));
  const until = parseNumberParam(url.searchParams.get('until'));
  if (limit !== null) {
    options.limit = limit;
  }
  if (offset !== null) {
    options.offset = offset;
  }
  if (since !== null) {
    options.since = since;
  }
  if (until !== null) {
    options.until = until;
  }
  return options;
}

function parseNumberParam(raw: string | null): number | null {
  if (raw === null || raw.trim() === '') {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    req.on('data', chunk => {
      if (typeof chunk === 'string') {
        chunks.push(Buffer.from(chunk, 'utf8'));
      } else {
        chunks.push(chunk);
      }
    });

    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw) {
        resolve({});
        return;
      }

      try {
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(error);
      }
    });

    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, payload: Record<string, unknown>) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}
