import http from 'node:http';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { toError } from '../errors.js';
import type { CommandService, MemoryOutbox } from '../commands/service.js';
import type { CalibrationManager } from '../calibration/manager.js';
import type { EventStore } from '../db.js';
import { createCommandsRouter, type HealthReport } from './routes/commands.js';

export interface HttpServerOptions {
  port?: number;
  host?: string;
  service: CommandService;
  manager: CalibrationManager;
  outbox: MemoryOutbox;
  store?: EventStore | null;
  health?: () => Promise<HealthReport>;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8080;
  const host = options.host ?? '0.0.0.0';

  const commandsRouter = createCommandsRouter({
    service: options.service,
    manager: options.manager,
    outbox: options.outbox,
    store: options.store,
    metrics,
    health: options.health
  });

  const server = http.createServer((req, res) => {
    try {
      if (commandsRouter.handle(req, res)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error({ err: toError(error) }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  server.on('close', () => {
    commandsRouter.close();
  });

  await new Promise<void>((resolve, reject) => {
    server.listen(port, host, () => resolve());
    server.on('error', reject);
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
