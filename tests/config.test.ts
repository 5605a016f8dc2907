import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigManager,
  loadDefaultConfig,
  parseConfig,
  validateConfig,
  type ConfigReloadEvent
} from '../src/config/index.js';
import { ConfigurationError } from '../src/errors.js';
import { baseParameters, makeTempDir, testConfig } from './helpers/fixtures.js';

describe('validateConfig', () => {
  it('accepts a complete configuration', () => {
    expect(() => validateConfig(testConfig('artifacts'))).not.toThrow();
  });

  it('reports schema violations with their path', () => {
    const config = testConfig('artifacts', { server: { host: '127.0.0.1', port: 70000 } });

    expect(() => validateConfig(config)).toThrow(new ConfigurationError('config.server.port must be <= 65535'));
  });

  it('rejects unknown gating parameters', () => {
    const config = testConfig('artifacts');
    const tampered = {
      ...config,
      gating: { ...config.gating, parameters: { ...config.gating.parameters, VOLUME: 3 } }
    };

    expect(() => validateConfig(tampered)).toThrow('config.gating.parameters.VOLUME is not allowed');
  });

  it('rejects a persistence rule that can never be met', () => {
    const config = testConfig('artifacts', {
      gating: { parameters: baseParameters({ CONFIRM_N: 6 }), dominance: { windowSize: 3, headroom: 0.1 } }
    });

    expect(() => validateConfig(config)).toThrow(
      'config.gating.parameters.CONFIRM_N (6) must not exceed CONFIRM_M (5)'
    );
  });

  it('rejects a poll interval longer than one window', () => {
    const config = testConfig('artifacts', { channel: { pollIntervalMs: 2000, staleAfterMs: 10000 } });

    expect(() => validateConfig(config)).toThrow('config.channel.pollIntervalMs (2000) must not exceed the window length');
  });

  it('rejects a default report interval outside its bounds', () => {
    const config = testConfig('artifacts', {
      calibration: { defaultIntervalSeconds: 1, minIntervalSeconds: 2, maxIntervalSeconds: 600 }
    });

    expect(() => validateConfig(config)).toThrow('config.calibration.defaultIntervalSeconds must be within 2-600');
  });

  it('rejects a webhook that is not http(s)', () => {
    const config = testConfig('artifacts', { notifier: { webhookUrl: 'ftp://hooks.test', timeoutMs: 1000 } });

    expect(() => validateConfig(config)).toThrow('config.notifier.webhookUrl must be an http(s) URL');
  });
});

describe('parseConfig', () => {
  it('wraps JSON syntax errors', () => {
    expect(() => parseConfig('{ "app": ')).toThrow(/^Failed to parse configuration: /);
  });
});

describe('loadDefaultConfig', () => {
  it('layers the test environment over the defaults', () => {
    const config = loadDefaultConfig();

    expect(config.logging.level).toBe('silent');
    expect(config.artifacts.databasePath).toBe(':memory:');
    expect(config.gating.parameters.ALERT_COOLDOWN_SECONDS).toBe(60);
    expect(config.gating.dominance).toEqual({ windowSize: 3, headroom: 0.1 });
  });
});

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = makeTempDir('lullwatch-config-');
    configPath = path.join(tempDir, 'lullwatch.json');
    fs.writeFileSync(configPath, JSON.stringify(testConfig(tempDir)), 'utf-8');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reloads the file and reports both versions', () => {
    const manager = new ConfigManager(configPath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => events.push(event));

    fs.writeFileSync(
      configPath,
      JSON.stringify(testConfig(tempDir, { logging: { level: 'debug' } })),
      'utf-8'
    );
    const next = manager.reload();

    expect(next.logging.level).toBe('debug');
    expect(manager.getConfig()).toBe(next);
    expect(events).toHaveLength(1);
    expect(events[0]?.previous.logging.level).toBe('silent');
    expect(manager.getPath()).toBe(path.resolve(configPath));
  });

  it('keeps the previous configuration when a reload is invalid', () => {
    const manager = new ConfigManager(configPath);
    const before = manager.getConfig();

    fs.writeFileSync(configPath, JSON.stringify({ app: { name: 'broken' } }), 'utf-8');

    expect(() => manager.reload()).toThrow(ConfigurationError);
    expect(manager.getConfig()).toBe(before);
  });

  it('stops watching once every subscriber has unsubscribed', () => {
    const manager = new ConfigManager(configPath);
    const first = manager.watch();
    const second = manager.watch();

    first();
    second();
    second();

    expect(manager.getConfig().app.name).toBe('lullwatch-test');
  });
});
