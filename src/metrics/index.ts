import pino from 'pino';
import type { CalibrationPhase, OutcomeKind, OutcomeReason } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type LogContext = {
  message?: string;
  component?: string;
};

type FailureSnapshot = {
  message: string;
  at: string;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: ReturnType<MetricsRegistry['exportLogLevelMetrics']>;
  windows: {
    total: number;
    invalid: number;
    lastWindowId: number | null;
    lastEvaluatedAt: string | null;
  };
  outcomes: {
    byKind: CounterMap;
    byReason: CounterMap;
    blockedByCalibration: number;
  };
  dispatch: {
    notified: number;
    notifyFailures: number;
    notifyRetries: number;
    storeFailures: number;
    lastFailure: FailureSnapshot | null;
  };
  channel: {
    publishFailures: number;
    readFailures: number;
    adoptedRevisions: number;
    lastFailure: FailureSnapshot | null;
  };
  calibration: {
    commands: CounterMap;
    errors: CounterMap;
    sessionsStarted: CounterMap;
    watchEmissions: number;
  };
  latencies: Record<string, LatencyStats>;
};

type PrometheusSample = {
  value: number;
  labels?: Record<string, string>;
};

type PrometheusMetric = {
  name: string;
  help: string;
  type: 'counter' | 'gauge';
  samples: PrometheusSample[];
};

type PrometheusOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByComponent = new Map<string, Map<string, number>>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;

  private windowsTotal = 0;
  private windowsInvalid = 0;
  private lastWindowId: number | null = null;
  private lastEvaluatedAt: number | null = null;
  private readonly outcomesByKind = new Map<string, number>();
  private readonly outcomesByReason = new Map<string, number>();
  private blockedByCalibration = 0;

  private notified = 0;
  private notifyFailures = 0;
  private notifyRetries = 0;
  private storeFailures = 0;
  private lastDispatchFailure: { message: string; at: number } | null = null;

  private channelPublishFailures = 0;
  private channelReadFailures = 0;
  private adoptedRevisions = 0;
  private lastChannelFailure: { message: string; at: number } | null = null;

  private readonly calibrationCommands = new Map<string, number>();
  private readonly calibrationErrors = new Map<string, number>();
  private readonly sessionsStarted = new Map<string, number>();
  private watchEmissions = 0;

  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByComponent.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.windowsTotal = 0;
    this.windowsInvalid = 0;
    this.lastWindowId = null;
    this.lastEvaluatedAt = null;
    this.outcomesByKind.clear();
    this.outcomesByReason.clear();
    this.blockedByCalibration = 0;
    this.notified = 0;
    this.notifyFailures = 0;
    this.notifyRetries = 0;
    this.storeFailures = 0;
    this.lastDispatchFailure = null;
    this.channelPublishFailures = 0;
    this.channelReadFailures = 0;
    this.adoptedRevisions = 0;
    this.lastChannelFailure = null;
    this.calibrationCommands.clear();
    this.calibrationErrors.clear();
    this.sessionsStarted.clear();
    this.watchEmissions = 0;
    this.latencyStats.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: LogContext) {
    const normalized = level.toLowerCase();
    increment(this.logLevelCounters, normalized);

    if (context?.component) {
      const componentMap = this.logLevelByComponent.get(context.component) ?? new Map<string, number>();
      increment(componentMap, normalized);
      this.logLevelByComponent.set(context.component, componentMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.lastLogLevelChangeAt = Date.now();
    increment(this.logLevelChangeCounters, normalized);
  }

  recordWindow(windowId: number | null) {
    this.windowsTotal += 1;
    this.lastEvaluatedAt = Date.now();
    if (windowId !== null) {
      this.lastWindowId = windowId;
    }
  }

  recordInvalidWindow() {
    this.windowsInvalid += 1;
  }

  recordOutcome(kind: OutcomeKind, reason: OutcomeReason) {
    increment(this.outcomesByKind, kind);
    increment(this.outcomesByReason, reason);
  }

  recordCalibrationBlock() {
    this.blockedByCalibration += 1;
  }

  recordNotification(success: boolean, attempts = 1) {
    if (success) {
      this.notified += 1;
    } else {
      this.notifyFailures += 1;
    }
    if (attempts > 1) {
      this.notifyRetries += attempts - 1;
    }
  }

  recordDispatchFailure(kind: 'notify' | 'store', error: unknown) {
    if (kind === 'store') {
      this.storeFailures += 1;
    }
    this.lastDispatchFailure = { message: describe(error), at: Date.now() };
  }

  recordChannelFailure(operation: 'publish' | 'read', error: unknown) {
    if (operation === 'publish') {
      this.channelPublishFailures += 1;
    } else {
      this.channelReadFailures += 1;
    }
    this.lastChannelFailure = { message: describe(error), at: Date.now() };
  }

  recordRevisionAdopted() {
    this.adoptedRevisions += 1;
  }

  recordCalibrationCommand(command: string, ok: boolean) {
    increment(this.calibrationCommands, command);
    if (!ok) {
      increment(this.calibrationErrors, command);
    }
  }

  recordSessionStart(phase: CalibrationPhase) {
    increment(this.sessionsStarted, phase);
  }

  recordWatchEmission() {
    this.watchEmissions += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapFrom(this.logLevelCounters),
      byComponent: mapFromNested(this.logLevelByComponent),
      levelIndex: mapLogLevelIndex(this.logLevelCounters),
      lastErrorAt: toIso(this.lastErrorAt),
      lastErrorMessage: this.lastErrorMessage,
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: toIso(this.lastLogLevelChangeAt),
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      windows: {
        total: this.windowsTotal,
        invalid: this.windowsInvalid,
        lastWindowId: this.lastWindowId,
        lastEvaluatedAt: toIso(this.lastEvaluatedAt)
      },
      outcomes: {
        byKind: mapFrom(this.outcomesByKind),
        byReason: mapFrom(this.outcomesByReason),
        blockedByCalibration: this.blockedByCalibration
      },
      dispatch: {
        notified: this.notified,
        notifyFailures: this.notifyFailures,
        notifyRetries: this.notifyRetries,
        storeFailures: this.storeFailures,
        lastFailure: toFailure(this.lastDispatchFailure)
      },
      channel: {
        publishFailures: this.channelPublishFailures,
        readFailures: this.channelReadFailures,
        adoptedRevisions: this.adoptedRevisions,
        lastFailure: toFailure(this.lastChannelFailure)
      },
      calibration: {
        commands: mapFrom(this.calibrationCommands),
        errors: mapFrom(this.calibrationErrors),
        sessionsStarted: mapFrom(this.sessionsStarted),
        watchEmissions: this.watchEmissions
      },
      latencies: mapFromLatencies(this.latencyStats)
    };
  }

  exportPrometheus(options: PrometheusOptions = {}) {
    const prefix = options.prefix ?? 'lullwatch';
    const baseLabels = options.labels ?? {};
    const metrics: PrometheusMetric[] = [
      {
        name: 'log_level_total',
        help: 'Total log events grouped by Pino level',
        type: 'counter',
        samples: Array.from(this.logLevelCounters.entries()).map(([level, value]) => ({
          value,
          labels: { level }
        }))
      },
      {
        name: 'log_level_state',
        help: 'Current active Pino log level',
        type: 'gauge',
        samples: [{ value: 1, labels: { level: this.currentLogLevel } }]
      },
      {
        name: 'windows_total',
        help: 'Audio windows evaluated by the gating engine',
        type: 'counter',
        samples: [{ value: this.windowsTotal }]
      },
      {
        name: 'windows_invalid_total',
        help: 'Score sets rejected during validation',
        type: 'counter',
        samples: [{ value: this.windowsInvalid }]
      },
      {
        name: 'outcomes_total',
        help: 'Gating outcomes grouped by kind and reason',
        type: 'counter',
        samples: Array.from(this.outcomesByReason.entries()).map(([reason, value]) => ({
          value,
          labels: { reason }
        }))
      },
      {
        name: 'alerts_blocked_calibration_total',
        help: 'Confirmed events withheld because calibration was active',
        type: 'counter',
        samples: [{ value: this.blockedByCalibration }]
      },
      {
        name: 'notifications_total',
        help: 'Notification attempts grouped by result',
        type: 'counter',
        samples: [
          { value: this.notified, labels: { result: 'success' } },
          { value: this.notifyFailures, labels: { result: 'failure' } }
        ]
      },
      {
        name: 'event_store_failures_total',
        help: 'Event records that could not be persisted',
        type: 'counter',
        samples: [{ value: this.storeFailures }]
      },
      {
        name: 'state_channel_failures_total',
        help: 'State channel failures grouped by operation',
        type: 'counter',
        samples: [
          { value: this.channelPublishFailures, labels: { operation: 'publish' } },
          { value: this.channelReadFailures, labels: { operation: 'read' } }
        ]
      },
      {
        name: 'calibration_commands_total',
        help: 'Calibration commands handled grouped by command',
        type: 'counter',
        samples: Array.from(this.calibrationCommands.entries()).map(([command, value]) => ({
          value,
          labels: { command }
        }))
      }
    ];

    const lines: string[] = [];
    for (const metric of metrics) {
      const block = formatPrometheusMetric(`${prefix}_${metric.name}`, metric, baseLabels);
      if (block) {
        lines.push(block);
      }
    }
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function describe(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

function toFailure(value: { message: string; at: number } | null): FailureSnapshot | null {
  return value ? { message: value.message, at: new Date(value.at).toISOString() } : null;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, inner] of ordered) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function mapLogLevelIndex(source: Map<string, number>): Record<string, number> {
  const result: Record<string, number> = {};
  for (const level of source.keys()) {
    const value = pino.levels.values[level];
    if (typeof value === 'number') {
      result[level] = value;
    }
  }
  return result;
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
      maxMs: stats.maxMs,
      averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count
    };
  }
  return result;
}

function formatPrometheusMetric(
  name: string,
  metric: PrometheusMetric,
  baseLabels: Record<string, string>
): string {
  const samples = metric.samples.filter(sample => Number.isFinite(sample.value));
  if (samples.length === 0) {
    return '';
  }
  const metricName = sanitizePrometheusName(name);
  const rendered = samples
    .map(sample => `${metricName}${formatPrometheusLabels({ ...baseLabels, ...sample.labels })} ${formatPrometheusValue(sample.value)}`)
    .sort();
  return [
    `# HELP ${metricName} ${escapePrometheusHelp(metric.help)}`,
    `# TYPE ${metricName} ${metric.type}`,
    ...rendered
  ].join('\n');
}

function sanitizePrometheusName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'metric';
  }
  return /^[0-9]/.test(lower) ? `_${lower}` : lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export type { MetricsSnapshot, LatencyStats, PrometheusOptions };
export { MetricsRegistry };
export default defaultRegistry;
