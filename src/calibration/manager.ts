import { randomUUID } from 'node:crypto';
import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { CalibrationStateError, OutOfScopeParameterError, ValidationError } from '../errors.js';
import type { CalibrationIntervalConfig } from '../config/index.js';
import { CHANNEL_DOCUMENT_VERSION, type ControlDocument } from '../channel/documents.js';
import type { SnapshotChannel } from '../channel/fileChannel.js';
import {
  assertParameterValue,
  normalizeParameterName,
  parseParameterValue,
  type ParameterStore
} from '../gating/parameters.js';
import {
  PARAMETER_NAMES,
  type CalibrationPhase,
  type CalibrationSession,
  type OutcomeSummary,
  type ParameterName,
  type ParameterOverrides,
  type Parameters
} from '../types.js';
import { PHASE_PARAMETERS, isAllowedInPhase, isCalibrationPhase, restrictToPhase } from './phases.js';

export type CalibrationState = 'idle' | 'active';

export type CalibrationStatus = {
  state: CalibrationState;
  session: CalibrationSession | null;
  parameters: Parameters;
  overrides: ParameterOverrides;
  lastOutcome: OutcomeSummary | null;
  alertsSuppressed: boolean;
  revision: number;
};

export type CalibrationParams = {
  phase: CalibrationPhase | null;
  allowed: readonly ParameterName[];
  parameters: Parameters;
  overrides: ParameterOverrides;
};

export type StopSummary = {
  wasActive: boolean;
  phase: CalibrationPhase | null;
  intervalSeconds: number | null;
  overrides: ParameterOverrides;
  /** Commands that reproduce the stopped session. */
  replay: string[];
  parameters: Parameters;
};

export type SetResult = {
  parameter: ParameterName;
  value: number;
  parameters: Parameters;
};

export type CalibrationManagerOptions = {
  parameters: ParameterStore;
  intervals: CalibrationIntervalConfig;
  channel?: SnapshotChannel<ControlDocument> | null;
  clock?: () => Date;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

type ControlState = {
  session: CalibrationSession | null;
  overrides: ParameterOverrides;
};

/**
 * Calibration session state machine (idle, active phase1, active phase2).
 * Owns the override layer of the parameter store. Every mutation is written
 * to the control channel before it takes effect in memory.
 */
export class CalibrationManager {
  private readonly parameters: ParameterStore;
  private readonly intervals: CalibrationIntervalConfig;
  private readonly channel: SnapshotChannel<ControlDocument> | null;
  private readonly clock: () => Date;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private session: CalibrationSession | null = null;
  private revision = 0;
  private writeId: string | null = null;
  private lastOutcome: OutcomeSummary | null = null;

  constructor(options: CalibrationManagerOptions) {
    this.parameters = options.parameters;
    this.intervals = options.intervals;
    this.channel = options.channel ?? null;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? defaultLogger.child({ component: 'calibration' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  start(phase: string, intervalSeconds?: number | null): CalibrationSession {
    const normalized = phase.trim().toLowerCase();
    if (!isCalibrationPhase(normalized)) {
      throw new ValidationError('phase must be phase1 or phase2');
    }
    const session: CalibrationSession = {
      phase: normalized,
      startedAt: this.clock().toISOString(),
      intervalSeconds: this.clampInterval(intervalSeconds),
      watchActive: false
    };
    const replaced = this.session;
    this.commit({ session, overrides: {} });
    this.metrics.recordSessionStart(session.phase);
    this.log.info(
      { phase: session.phase, intervalSeconds: session.intervalSeconds, replaced: replaced?.phase ?? null },
      'Calibration started'
    );
    return { ...session };
  }

  set(parameter: string, raw: string | number): SetResult {
    const session = this.requireSession('set');
    const name = normalizeParameterName(parameter);
    if (!isAllowedInPhase(session.phase, name)) {
      throw new OutOfScopeParameterError(name, session.phase, PHASE_PARAMETERS[session.phase]);
    }
    const value = typeof raw === 'string' ? parseParameterValue(name, raw) : assertParameterValue(name, raw);
    const overrides = this.parameters.checkOverride(name, value);
    this.commit({ session, overrides });
    this.log.info({ phase: session.phase, parameter: name, value }, 'Calibration override applied');
    return { parameter: name, value, parameters: this.parameters.effective() };
  }

  params(): CalibrationParams {
    const phase = this.session?.phase ?? null;
    return {
      phase,
      allowed: phase ? PHASE_PARAMETERS[phase] : [],
      parameters: this.parameters.effective(),
      overrides: this.parameters.overrides()
    };
  }

  status(): CalibrationStatus {
    return {
      state: this.session ? 'active' : 'idle',
      session: this.session ? { ...this.session } : null,
      parameters: this.parameters.effective(),
      overrides: this.parameters.overrides(),
      lastOutcome: this.lastOutcome,
      alertsSuppressed: this.alertsSuppressed(),
      revision: this.revision
    };
  }

  watch(intervalSeconds?: number | null): CalibrationSession {
    const session = this.requireSession('watch');
    const next: CalibrationSession = {
      ...session,
      intervalSeconds:
        intervalSeconds === undefined || intervalSeconds === null
          ? session.intervalSeconds
          : this.clampInterval(intervalSeconds),
      watchActive: true
    };
    this.commit({ session: next, overrides: this.parameters.overrides() });
    return { ...next };
  }

  /** Clears the watch flag. A no-op when no watch is active. */
  watchStop(): CalibrationSession | null {
    const session = this.session;
    if (!session || !session.watchActive) {
      return session ? { ...session } : null;
    }
    const next: CalibrationSession = { ...session, watchActive: false };
    this.commit({ session: next, overrides: this.parameters.overrides() });
    return { ...next };
  }

  stop(): StopSummary {
    const session = this.session;
    if (!session) {
      return {
        wasActive: false,
        phase: null,
        intervalSeconds: null,
        overrides: {},
        replay: [],
        parameters: this.parameters.effective()
      };
    }

    const overrides = this.parameters.overrides();
    this.commit({ session: null, overrides: {} });
    const replay = [`/cal_start ${session.phase} ${session.intervalSeconds}`];
    for (const name of [...PARAMETER_NAMES].sort()) {
      const value = overrides[name];
      if (value !== undefined) {
        replay.push(`/cal_set ${name} ${value}`);
      }
    }
    this.log.info({ phase: session.phase, overrides }, 'Calibration stopped');
    return {
      wasActive: true,
      phase: session.phase,
      intervalSeconds: session.intervalSeconds,
      overrides,
      replay,
      parameters: this.parameters.effective()
    };
  }

  isActive() {
    return this.session !== null;
  }

  alertsSuppressed() {
    return this.session !== null;
  }

  currentSession(): CalibrationSession | null {
    return this.session ? { ...this.session } : null;
  }

  currentRevision() {
    return this.revision;
  }

  recordOutcome(summary: OutcomeSummary) {
    this.lastOutcome = summary;
  }

  /**
   * Re-reads the control document and adopts it when its revision or write id
   * differs from the one in memory. Returns true when the document was adopted.
   */
  sync(): boolean {
    if (!this.channel) {
      return false;
    }
    const document = this.channel.read();
    if (!document || (document.revision === this.revision && document.writeId === this.writeId)) {
      return false;
    }
    this.adopt(document);
    return true;
  }

  adopt(document: ControlDocument) {
    const overrides = restrictToPhase(document.session?.phase ?? null, document.overrides);
    try {
      this.parameters.replaceOverrides(overrides);
    } catch (error) {
      this.revision = document.revision;
      this.writeId = document.writeId;
      this.log.warn(
        { err: error, revision: document.revision, writeId: document.writeId },
        'Ignoring calibration control document with invalid overrides'
      );
      return;
    }
    const previousPhase = this.session?.phase ?? null;
    this.session = document.session ? { ...document.session } : null;
    this.revision = document.revision;
    this.writeId = document.writeId;
    this.metrics.recordRevisionAdopted();
    this.log.info(
      {
        revision: document.revision,
        writeId: document.writeId,
        phase: this.session?.phase ?? null,
        previousPhase
      },
      'Adopted calibration control document'
    );
  }

  private requireSession(operation: string): CalibrationSession {
    if (!this.session) {
      throw new CalibrationStateError(`calibration is not active (${operation} requires /cal_start)`);
    }
    return this.session;
  }

  private clampInterval(value: number | null | undefined) {
    const { defaultIntervalSeconds, minIntervalSeconds, maxIntervalSeconds } = this.intervals;
    if (value === undefined || value === null || !Number.isFinite(value)) {
      return defaultIntervalSeconds;
    }
    return Math.max(minIntervalSeconds, Math.min(Math.trunc(value), maxIntervalSeconds));
  }

  private commit(next: ControlState) {
    const revision = this.revision + 1;
    const writeId = randomUUID();
    if (this.channel) {
      this.channel.publish({
        version: CHANNEL_DOCUMENT_VERSION,
        revision,
        writeId,
        session: next.session,
        overrides: next.overrides,
        updatedAt: this.clock().toISOString()
      });
    }
    this.parameters.replaceOverrides(next.overrides);
    this.session = next.session ? { ...next.session } : null;
    this.revision = revision;
    this.writeId = writeId;
  }
}
