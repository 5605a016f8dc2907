import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import config from 'config';
import { ConfigurationError, toError } from '../errors.js';
import type { Parameters } from '../types.js';
import { validateAgainstSchema, type JsonSchema } from '../utils/schema.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type ArtifactsConfig = {
  dir: string;
  databasePath: string;
};

export type MonitorConfig = {
  windowSeconds: number;
};

export type DominanceConfig = {
  windowSize: number;
  headroom: number;
};

export type GatingConfig = {
  parameters: Parameters;
  dominance: DominanceConfig;
};

export type CalibrationIntervalConfig = {
  defaultIntervalSeconds: number;
  minIntervalSeconds: number;
  maxIntervalSeconds: number;
};

export type ChannelConfig = {
  pollIntervalMs: number;
  staleAfterMs: number;
};

export type NotifierConfig = {
  webhookUrl: string;
  timeoutMs: number;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type LullwatchConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  artifacts: ArtifactsConfig;
  monitor: MonitorConfig;
  gating: GatingConfig;
  calibration: CalibrationIntervalConfig;
  channel: ChannelConfig;
  notifier: NotifierConfig;
  server: ServerConfig;
};

const unitSchema: JsonSchema = { type: 'number', minimum: 0, maximum: 1 };

const lullwatchConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'artifacts', 'monitor', 'gating', 'calibration', 'channel', 'notifier', 'server'],
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      properties: { name: { type: 'string' } }
    },
    logging: {
      type: 'object',
      required: ['level'],
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    artifacts: {
      type: 'object',
      required: ['dir', 'databasePath'],
      properties: {
        dir: { type: 'string' },
        databasePath: { type: 'string' }
      }
    },
    monitor: {
      type: 'object',
      required: ['windowSeconds'],
      properties: {
        windowSeconds: { type: 'number', minimum: 0.01 }
      }
    },
    gating: {
      type: 'object',
      required: ['parameters', 'dominance'],
      properties: {
        parameters: {
          type: 'object',
          required: [
            'PRIMARY_CRY_THRESHOLD',
            'CRY_THRESHOLD',
            'CAT_THRESHOLD',
            'CAT_WEIGHT',
            'MARGIN_THRESHOLD',
            'NON_CRY_WEIGHT',
            'CONFIRM_N',
            'CONFIRM_M',
            'ALERT_COOLDOWN_SECONDS'
          ],
          additionalProperties: false,
          properties: {
            PRIMARY_CRY_THRESHOLD: unitSchema,
            CRY_THRESHOLD: unitSchema,
            CAT_THRESHOLD: unitSchema,
            CAT_WEIGHT: { type: 'number' },
            MARGIN_THRESHOLD: { type: 'number' },
            NON_CRY_WEIGHT: { type: 'number' },
            CONFIRM_N: { type: 'integer', minimum: 1 },
            CONFIRM_M: { type: 'integer', minimum: 1 },
            ALERT_COOLDOWN_SECONDS: { type: 'integer', minimum: 0 }
          }
        },
        dominance: {
          type: 'object',
          required: ['windowSize', 'headroom'],
          properties: {
            windowSize: { type: 'integer', minimum: 1 },
            headroom: { type: 'number', minimum: 0 }
          }
        }
      }
    },
    calibration: {
      type: 'object',
      required: ['defaultIntervalSeconds', 'minIntervalSeconds', 'maxIntervalSeconds'],
      properties: {
        defaultIntervalSeconds: { type: 'number', minimum: 1 },
        minIntervalSeconds: { type: 'number', minimum: 1 },
        maxIntervalSeconds: { type: 'number', minimum: 1 }
      }
    },
    channel: {
      type: 'object',
      required: ['pollIntervalMs', 'staleAfterMs'],
      properties: {
        pollIntervalMs: { type: 'integer', minimum: 0 },
        staleAfterMs: { type: 'integer', minimum: 0 }
      }
    },
    notifier: {
      type: 'object',
      required: ['webhookUrl', 'timeoutMs'],
      properties: {
        webhookUrl: { type: 'string' },
        timeoutMs: { type: 'integer', minimum: 1 }
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      properties: {
        host: { type: 'string' },
        port: { type: 'integer', minimum: 0, maximum: 65535 }
      }
    }
  }
};

function assertConfigShape(config: unknown): asserts config is LullwatchConfig {
  const errors = validateAgainstSchema(lullwatchConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new ConfigurationError(errors.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is LullwatchConfig {
  assertConfigShape(config);
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): LullwatchConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse configuration: ${toError(error).message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): LullwatchConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/** Resolves the layered node-config sources (default, NODE_ENV, environment variables). */
export function loadDefaultConfig(): LullwatchConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}

function validateLogicalConfig(config: LullwatchConfig) {
  const messages: string[] = [];
  const { parameters } = config.gating;

  if (parameters.CONFIRM_N > parameters.CONFIRM_M) {
    messages.push(
      `config.gating.parameters.CONFIRM_N (${parameters.CONFIRM_N}) must not exceed CONFIRM_M (${parameters.CONFIRM_M})`
    );
  }

  const windowMs = config.monitor.windowSeconds * 1000;
  if (config.channel.pollIntervalMs > windowMs) {
    messages.push(
      `config.channel.pollIntervalMs (${config.channel.pollIntervalMs}) must not exceed the window length (${windowMs}ms)`
    );
  }

  const { defaultIntervalSeconds, minIntervalSeconds, maxIntervalSeconds } = config.calibration;
  if (minIntervalSeconds > maxIntervalSeconds) {
    messages.push('config.calibration.minIntervalSeconds must not exceed maxIntervalSeconds');
  } else if (defaultIntervalSeconds < minIntervalSeconds || defaultIntervalSeconds > maxIntervalSeconds) {
    messages.push(
      `config.calibration.defaultIntervalSeconds must be within ${minIntervalSeconds}-${maxIntervalSeconds}`
    );
  }

  const webhookUrl = config.notifier.webhookUrl.trim();
  if (webhookUrl && !/^https?:\/\//i.test(webhookUrl)) {
    messages.push('config.notifier.webhookUrl must be an http(s) URL');
  }

  if (messages.length > 0) {
    throw new ConfigurationError(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: LullwatchConfig;
  next: LullwatchConfig;
};

/**
 * Watches a JSON configuration file and re-validates it on change. A reload
 * that fails validation emits `error` and writes the last good file back.
 */
export class ConfigManager extends EventEmitter {
  private currentConfig: LullwatchConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath: string) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): LullwatchConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): LullwatchConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        if (this.listenerCount('error') > 0) {
          this.emit('error', toError(error));
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher(): fs.FSWatcher {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }
      if (eventType === 'rename') {
        this.closeWatcher();
        this.watcher = this.createWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: LullwatchConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    return { config: parseConfig(contents), raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', toError(error));
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

export { lullwatchConfigSchema };
