import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { MonitorError, StateChannelUnavailableError } from '../errors.js';
import type { CalibrationIntervalConfig } from '../config/index.js';
import { statusAgeMs, type StatusDocument } from '../channel/documents.js';
import type { SnapshotChannel } from '../channel/fileChannel.js';
import type { CalibrationManager } from '../calibration/manager.js';
import { REPLY_PREFIXES, formatStatus, invokeHandler, type CommandContext, type CommandReply, type MonitorView } from './handlers.js';
import { parseCommand, type CommandType } from './parse.js';
import { WatchRegistry, type WatchTickContext } from './watch.js';

export interface ReplySink {
  send(origin: string, text: string): void;
}

/** Buffers watch emissions per origin until a client drains them. */
export class MemoryOutbox implements ReplySink {
  private readonly messages = new Map<string, string[]>();

  constructor(private readonly limit = 100) {}

  send(origin: string, text: string) {
    const queue = this.messages.get(origin) ?? [];
    queue.push(text);
    if (queue.length > this.limit) {
      queue.splice(0, queue.length - this.limit);
    }
    this.messages.set(origin, queue);
  }

  drain(origin: string): string[] {
    const queue = this.messages.get(origin) ?? [];
    this.messages.delete(origin);
    return queue;
  }

  pending(origin: string) {
    return this.messages.get(origin)?.length ?? 0;
  }
}

export type CommandServiceOptions = {
  manager: CalibrationManager;
  statusChannel?: SnapshotChannel<StatusDocument> | null;
  intervals: CalibrationIntervalConfig;
  staleAfterMs: number;
  sink: ReplySink;
  now?: () => number;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

/**
 * Command-process front end for calibration: parses command text, dispatches
 * it through the handler table and owns the per-origin watch timers.
 */
export class CommandService {
  readonly watches: WatchRegistry;
  private readonly manager: CalibrationManager;
  private readonly statusChannel: SnapshotChannel<StatusDocument> | null;
  private readonly intervals: CalibrationIntervalConfig;
  private readonly staleAfterMs: number;
  private readonly sink: ReplySink;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: CommandServiceOptions) {
    this.manager = options.manager;
    this.statusChannel = options.statusChannel ?? null;
    this.intervals = options.intervals;
    this.staleAfterMs = options.staleAfterMs;
    this.sink = options.sink;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? defaultLogger.child({ component: 'commands' });
    this.metrics = options.metrics ?? defaultMetrics;
    this.watches = new WatchRegistry((origin, context) => this.emitWatch(origin, context), this.log);
  }

  execute(origin: string, text: string): CommandReply {
    const parsed = parseCommand(text);
    if (!parsed.ok) {
      if (parsed.type) {
        this.metrics.recordCalibrationCommand(parsed.type, false);
      }
      return { ok: false, text: parsed.error };
    }

    const { command } = parsed;
    const context = this.createContext(origin);
    try {
      if (command.type !== 'help') {
        this.manager.sync();
      }
      const reply = invokeHandler(command.type, command.payload, context);
      this.metrics.recordCalibrationCommand(command.type, reply.ok);
      return reply;
    } catch (error) {
      this.metrics.recordCalibrationCommand(command.type, false);
      return this.errorReply(command.type, origin, error);
    }
  }

  /** Current status text, as `/cal_status` would render it. */
  statusText(): string {
    this.manager.sync();
    return formatStatus(this.manager.status(), this.readMonitor());
  }

  readMonitor(): MonitorView {
    if (!this.statusChannel) {
      return { document: null, ageMs: null, stale: false };
    }
    const document = this.statusChannel.read();
    if (!document) {
      return { document: null, ageMs: null, stale: false };
    }
    const ageMs = statusAgeMs(document, this.now());
    return { document, ageMs, stale: ageMs === null || ageMs > this.staleAfterMs };
  }

  close() {
    this.watches.stopAll();
  }

  private createContext(origin: string): CommandContext {
    return {
      origin,
      manager: this.manager,
      watches: this.watches,
      intervals: this.intervals,
      readMonitor: () => this.readMonitor()
    };
  }

  private errorReply(type: CommandType, origin: string, error: unknown): CommandReply {
    const prefix = `${REPLY_PREFIXES[type]}: ERROR.`;
    if (error instanceof StateChannelUnavailableError) {
      this.log.warn({ err: error, origin, command: type }, 'State channel unavailable while handling command');
      return { ok: false, text: `${prefix} status unknown, retry. ${error.message}` };
    }
    if (error instanceof MonitorError) {
      this.log.info({ origin, command: type, code: error.code }, error.message);
      return { ok: false, text: `${prefix} ${error.message}` };
    }
    this.log.error({ err: error, origin, command: type }, 'Calibration command failed');
    return { ok: false, text: `${prefix} internal error` };
  }

  private emitWatch(origin: string, context: WatchTickContext): boolean {
    let text: string;
    let keepGoing = true;
    try {
      this.manager.sync();
      const session = this.manager.currentSession();
      if (!session || session.startedAt !== context.sessionStartedAt || !session.watchActive) {
        this.log.info(
          { origin, phase: session?.phase ?? null, watchActive: session?.watchActive ?? false },
          'Watch no longer matches the calibration session; stopping watches'
        );
        this.watches.stopAll();
        return false;
      }
      text = `Calibration: OK. ${formatStatus(this.manager.status(), this.readMonitor())}`;
    } catch (error) {
      if (!(error instanceof MonitorError)) {
        throw error;
      }
      text = `Calibration: ERROR. status unknown, retry. ${error.message}`;
      keepGoing = false;
    }
    if (context.isCancelled()) {
      return false;
    }
    this.sink.send(origin, text);
    this.metrics.recordWatchEmission();
    return keepGoing;
  }
}
