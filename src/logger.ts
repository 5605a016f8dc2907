import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';
import { isRecord } from './utils/schema.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'lullwatch';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase()).concat('silent')
);

const levelEvents = new EventEmitter();

type LogContext = {
  message?: string;
  component?: string;
};

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let component: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (isRecord(value)) {
      if (typeof value.component === 'string' && value.component.length > 0 && !component) {
        component = value.component;
      }
      if (value.err instanceof Error && !message) {
        message = value.err.message;
      }
    }
  }

  return { message, component };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      const context = extractContext(inputArgs);
      metrics.incrementLogLevel(resolvedLevel, context);
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
let lastLevelChangePrevious: string | null = null;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, lastLevelChangePrevious ?? currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  lastLevelChangePrevious = previous;
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string | null) => void) {
  levelEvents.on('change', listener);
  return () => {
    levelEvents.off('change', listener);
  };
}

export function getLogLevelMetrics() {
  return metrics.exportLogLevelMetrics();
}

export type Logger = pino.Logger;

export default logger;
