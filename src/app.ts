import path from 'node:path';
import logger from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { toError } from './errors.js';
import {
  ConfigManager,
  loadDefaultConfig,
  type LullwatchConfig
} from './config/index.js';
import { createControlChannel, createStatusChannel } from './channel/fileChannel.js';
import { CalibrationManager } from './calibration/manager.js';
import { CommandService, MemoryOutbox } from './commands/service.js';
import { createEventStore, type EventStore } from './db.js';
import { EventBus } from './eventBus.js';
import { CooldownController } from './gating/cooldown.js';
import { GatingEngine } from './gating/engine.js';
import { ParameterStore } from './gating/parameters.js';
import { MonitorLoop } from './monitor/loop.js';
import { LogNotifier, WebhookNotifier, type Notifier } from './notify/notifier.js';

type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheckResult = {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: HealthIndicatorContext): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: { error: toError(error).message }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({ name: entry.name, status: 'error', error: toError(error) });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export type ConfigSource = {
  config: LullwatchConfig;
  manager: ConfigManager | null;
};

/** Loads an explicit JSON file (hot-reloadable) or the layered node-config sources. */
export function loadAppConfig(configPath?: string | null): ConfigSource {
  if (configPath) {
    const manager = new ConfigManager(configPath);
    return { config: manager.getConfig(), manager };
  }
  return { config: loadDefaultConfig(), manager: null };
}

export function withArtifactDir(config: LullwatchConfig, artifactDir: string | null | undefined): LullwatchConfig {
  if (!artifactDir) {
    return config;
  }
  return { ...config, artifacts: { ...config.artifacts, dir: artifactDir } };
}

export function createNotifier(config: LullwatchConfig): Notifier {
  const url = config.notifier.webhookUrl.trim();
  if (url) {
    return new WebhookNotifier({ url, timeoutMs: config.notifier.timeoutMs });
  }
  return new LogNotifier();
}

export type MonitorRuntimeOverrides = {
  notifier?: Notifier;
  store?: EventStore;
  clock?: () => number;
};

export type MonitorRuntime = {
  config: LullwatchConfig;
  parameters: ParameterStore;
  engine: GatingEngine;
  cooldown: CooldownController;
  calibration: CalibrationManager;
  events: EventBus;
  store: EventStore;
  loop: MonitorLoop;
  /** Applies a reloaded configuration's base parameters and dominance window. */
  applyConfig: (next: LullwatchConfig) => void;
  close: () => void;
};

export function createMonitorRuntime(
  config: LullwatchConfig,
  overrides: MonitorRuntimeOverrides = {}
): MonitorRuntime {
  const artifactDir = path.resolve(config.artifacts.dir);
  const parameters = new ParameterStore(config.gating.parameters);
  const engine = new GatingEngine({ parameters, dominance: config.gating.dominance });
  const cooldown = new CooldownController(parameters);
  const calibration = new CalibrationManager({
    parameters,
    intervals: config.calibration,
    channel: createControlChannel(artifactDir)
  });
  const store = overrides.store ?? createEventStore(config.artifacts.databasePath);
  const events = new EventBus({
    store: event => {
      store.storeEvent(event);
    },
    notifier: overrides.notifier ?? createNotifier(config)
  });
  const loop = new MonitorLoop({
    engine,
    cooldown,
    calibration,
    parameters,
    events,
    statusChannel: createStatusChannel(artifactDir),
    pollIntervalMs: config.channel.pollIntervalMs,
    clock: overrides.clock,
    clipReference: scores => path.join(artifactDir, 'clips', `window-${scores.windowId}.wav`)
  });

  return {
    config,
    parameters,
    engine,
    cooldown,
    calibration,
    events,
    store,
    loop,
    applyConfig: next => {
      parameters.setBase(next.gating.parameters);
      engine.setDominance(next.gating.dominance);
      logger.info({ parameters: next.gating.parameters }, 'Applied reloaded gating configuration');
    },
    close: () => {
      store.close();
    }
  };
}

export type CommandRuntimeOverrides = {
  now?: () => number;
};

export type CommandRuntime = {
  config: LullwatchConfig;
  parameters: ParameterStore;
  calibration: CalibrationManager;
  outbox: MemoryOutbox;
  service: CommandService;
  close: () => void;
};

/**
 * Wires the command side: a calibration manager that owns the control
 * document, recovered from disk on start, and the command service on top.
 */
export function createCommandRuntime(
  config: LullwatchConfig,
  overrides: CommandRuntimeOverrides = {}
): CommandRuntime {
  const artifactDir = path.resolve(config.artifacts.dir);
  const parameters = new ParameterStore(config.gating.parameters);
  const calibration = new CalibrationManager({
    parameters,
    intervals: config.calibration,
    channel: createControlChannel(artifactDir)
  });
  try {
    if (calibration.sync()) {
      logger.info({ session: calibration.currentSession() }, 'Recovered calibration session from control document');
    }
  } catch (error) {
    logger.warn({ err: toError(error) }, 'Calibration control unreadable at startup');
  }

  const outbox = new MemoryOutbox();
  const service = new CommandService({
    manager: calibration,
    statusChannel: createStatusChannel(artifactDir),
    intervals: config.calibration,
    staleAfterMs: config.channel.staleAfterMs,
    sink: outbox,
    now: overrides.now
  });

  return {
    config,
    parameters,
    calibration,
    outbox,
    service,
    close: () => {
      service.close();
    }
  };
}
