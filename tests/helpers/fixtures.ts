import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { LullwatchConfig } from '../../src/config/index.js';
import type { Parameters, ScoreSet } from '../../src/types.js';

export function baseParameters(overrides: Partial<Parameters> = {}): Parameters {
  return {
    PRIMARY_CRY_THRESHOLD: 0.5,
    CRY_THRESHOLD: 0.45,
    CAT_THRESHOLD: 0.45,
    CAT_WEIGHT: 1,
    MARGIN_THRESHOLD: 0.15,
    NON_CRY_WEIGHT: 1,
    CONFIRM_N: 3,
    CONFIRM_M: 5,
    ALERT_COOLDOWN_SECONDS: 30,
    ...overrides
  };
}

/** A window both stages accept: margin 0.8. */
export function cryWindow(windowId: number, overrides: Partial<ScoreSet> = {}): ScoreSet {
  return {
    primaryDecision: true,
    primaryScore: 0.9,
    babyScore: 0.9,
    catScore: 0.1,
    otherSuppressScore: 0,
    windowId,
    timestamp: windowId * 1000,
    ...overrides
  };
}

/** A quiet window: margin 0.05, primary below threshold. */
export function quietWindow(windowId: number, overrides: Partial<ScoreSet> = {}): ScoreSet {
  return {
    primaryDecision: false,
    primaryScore: 0.1,
    babyScore: 0.1,
    catScore: 0.05,
    otherSuppressScore: 0,
    windowId,
    timestamp: windowId * 1000,
    ...overrides
  };
}

export function makeTempDir(prefix: string) {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(artifactDir: string, overrides: Partial<LullwatchConfig> = {}): LullwatchConfig {
  return {
    app: { name: 'lullwatch-test' },
    logging: { level: 'silent' },
    artifacts: { dir: artifactDir, databasePath: ':memory:' },
    monitor: { windowSeconds: 0.96 },
    gating: {
      parameters: baseParameters(),
      dominance: { windowSize: 3, headroom: 0.1 }
    },
    calibration: { defaultIntervalSeconds: 15, minIntervalSeconds: 2, maxIntervalSeconds: 600 },
    channel: { pollIntervalMs: 0, staleAfterMs: 10000 },
    notifier: { webhookUrl: '', timeoutMs: 1000 },
    server: { host: '127.0.0.1', port: 0 },
    ...overrides
  };
}
