import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { StateChannelUnavailableError, toError } from '../errors.js';
import { CHANNEL_DOCUMENT_VERSION, type StatusDocument } from '../channel/documents.js';
import type { SnapshotChannel } from '../channel/fileChannel.js';
import type { CalibrationManager } from '../calibration/manager.js';
import type { EventBus, DispatchResult } from '../eventBus.js';
import type { CooldownController } from '../gating/cooldown.js';
import type { GatingEngine } from '../gating/engine.js';
import type { ParameterStore } from '../gating/parameters.js';
import type { AlertBlock, EventRecord, GatingOutcome, OutcomeSummary, ScoreSet } from '../types.js';
import type { ScoreSource } from './scoreSource.js';

export type WindowReport = {
  outcome: GatingOutcome;
  blockedBy: AlertBlock;
  event: EventRecord | null;
  dispatch: DispatchResult | null;
};

export type RunOptions = {
  signal?: AbortSignal;
  maxWindows?: number;
};

export type RunSummary = {
  windows: number;
  confirmed: number;
  dispatched: number;
  blocked: number;
};

export type MonitorLoopOptions = {
  engine: GatingEngine;
  cooldown: CooldownController;
  calibration: CalibrationManager;
  parameters: ParameterStore;
  events: EventBus;
  statusChannel?: SnapshotChannel<StatusDocument> | null;
  pollIntervalMs: number;
  clock?: () => number;
  clipReference?: (scores: ScoreSet) => string | null;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export function summarizeOutcome(outcome: GatingOutcome): OutcomeSummary {
  const { scores, diagnostics } = outcome;
  return {
    kind: outcome.kind,
    reason: outcome.reason,
    windowId: scores?.windowId ?? null,
    timestamp: scores?.timestamp ?? null,
    primaryScore: scores?.primaryScore ?? null,
    babyScore: scores?.babyScore ?? null,
    catScore: scores?.catScore ?? null,
    margin: diagnostics.margin,
    persistedCount: diagnostics.persistedCount
  };
}

function resolveBlock(outcome: GatingOutcome, calibrationActive: boolean): AlertBlock {
  if (outcome.kind === 'confirmed' && calibrationActive) {
    return 'calibration';
  }
  if (outcome.reason === 'cooldown') {
    return 'cooldown';
  }
  if (outcome.reason === 'cat-dominant') {
    return 'cat';
  }
  return 'none';
}

/**
 * The audio-side loop: one window at a time, poll control, evaluate, admit
 * through cooldown, dispatch, publish status. Channel, store and notifier
 * failures are logged and never end the loop.
 */
export class MonitorLoop {
  private readonly engine: GatingEngine;
  private readonly cooldown: CooldownController;
  private readonly calibration: CalibrationManager;
  private readonly parameters: ParameterStore;
  private readonly events: EventBus;
  private readonly statusChannel: SnapshotChannel<StatusDocument> | null;
  private readonly pollIntervalMs: number;
  private readonly clock: () => number;
  private readonly clipReference: (scores: ScoreSet) => string | null;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private lastPollAt: number | null = null;

  constructor(options: MonitorLoopOptions) {
    this.engine = options.engine;
    this.cooldown = options.cooldown;
    this.calibration = options.calibration;
    this.parameters = options.parameters;
    this.events = options.events;
    this.statusChannel = options.statusChannel ?? null;
    this.pollIntervalMs = options.pollIntervalMs;
    this.clock = options.clock ?? Date.now;
    this.clipReference = options.clipReference ?? (() => null);
    this.log = options.logger ?? defaultLogger.child({ component: 'monitor' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  async processWindow(input: unknown): Promise<WindowReport> {
    const now = this.clock();
    this.pollControl(now);

    const startedAt = performance.now();
    const evaluated = this.engine.evaluate(input);
    const outcome = this.cooldown.admit(evaluated, evaluated.scores?.timestamp ?? now);
    this.metrics.observeLatency('gating.evaluate', performance.now() - startedAt);

    const blockedBy = resolveBlock(outcome, this.calibration.alertsSuppressed());
    let event: EventRecord | null = null;
    let dispatch: DispatchResult | null = null;
    if (outcome.kind === 'confirmed' && outcome.scores) {
      if (blockedBy === 'calibration') {
        this.metrics.recordCalibrationBlock();
        this.log.info({ windowId: outcome.scores.windowId }, 'Confirmed event withheld during calibration');
      } else {
        event = {
          eventId: randomUUID(),
          timestamp: outcome.scores.timestamp,
          scores: outcome.scores,
          clipReference: this.clipReference(outcome.scores)
        };
        dispatch = await this.events.dispatch(event);
      }
    }

    const summary = summarizeOutcome(outcome);
    this.calibration.recordOutcome(summary);
    this.metrics.recordOutcome(outcome.kind, outcome.reason);
    if (outcome.kind !== 'none') {
      this.log.debug({ ...summary, blockedBy }, 'Window evaluated');
    }
    this.publishStatus(summary, blockedBy, now);
    return { outcome, blockedBy, event, dispatch };
  }

  async run(source: ScoreSource, options: RunOptions = {}): Promise<RunSummary> {
    const summary: RunSummary = { windows: 0, confirmed: 0, dispatched: 0, blocked: 0 };
    const limit = options.maxWindows ?? Number.POSITIVE_INFINITY;
    if (limit <= 0) {
      return summary;
    }
    for await (const input of source) {
      if (options.signal?.aborted) {
        break;
      }
      const report = await this.processWindow(input);
      summary.windows += 1;
      if (report.outcome.kind === 'confirmed') {
        summary.confirmed += 1;
      }
      if (report.dispatch) {
        summary.dispatched += 1;
      }
      if (report.blockedBy === 'calibration') {
        summary.blocked += 1;
      }
      if (summary.windows >= limit) {
        break;
      }
    }
    this.log.info(summary, 'Monitor loop finished');
    return summary;
  }

  private pollControl(now: number) {
    if (this.lastPollAt !== null && now - this.lastPollAt < this.pollIntervalMs) {
      return;
    }
    this.lastPollAt = now;
    try {
      this.calibration.sync();
    } catch (error) {
      this.metrics.recordChannelFailure('read', error);
      if (error instanceof StateChannelUnavailableError) {
        this.log.warn({ err: error, path: error.filePath }, 'Calibration control unreadable; keeping last state');
      } else {
        this.log.error({ err: toError(error) }, 'Calibration sync failed');
      }
    }
  }

  private publishStatus(summary: OutcomeSummary, blockedBy: AlertBlock, now: number) {
    if (!this.statusChannel) {
      return;
    }
    try {
      this.statusChannel.publish({
        version: CHANNEL_DOCUMENT_VERSION,
        publishedAt: new Date(now).toISOString(),
        controlRevision: this.calibration.currentRevision(),
        session: this.calibration.currentSession(),
        parameters: this.parameters.effective(),
        lastOutcome: summary,
        alertsSuppressed: this.calibration.alertsSuppressed(),
        blockedBy
      });
    } catch (error) {
      this.metrics.recordChannelFailure('publish', error);
      this.log.warn({ err: toError(error) }, 'Failed to publish monitor status');
    }
  }
}
