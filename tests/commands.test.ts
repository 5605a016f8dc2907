import fs from 'node:fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CalibrationManager } from '../src/calibration/manager.js';
import { createControlChannel, createStatusChannel, type SnapshotChannel } from '../src/channel/fileChannel.js';
import type { StatusDocument } from '../src/channel/documents.js';
import { parseCommand } from '../src/commands/parse.js';
import { CommandService, MemoryOutbox } from '../src/commands/service.js';
import { WatchRegistry } from '../src/commands/watch.js';
import { StateChannelUnavailableError } from '../src/errors.js';
import { ParameterStore } from '../src/gating/parameters.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { baseParameters, makeTempDir } from './helpers/fixtures.js';

const intervals = { defaultIntervalSeconds: 15, minIntervalSeconds: 2, maxIntervalSeconds: 600 };
const NOW = Date.parse('2026-03-01T08:00:10.000Z');
const SESSION_STARTED_AT = '2026-03-01T08:00:00.000Z';
const RESTORED =
  'restored: PRIMARY_CRY_THRESHOLD=0.5, CRY_THRESHOLD=0.45, CAT_THRESHOLD=0.45, CAT_WEIGHT=1, ' +
  'MARGIN_THRESHOLD=0.15, NON_CRY_WEIGHT=1, CONFIRM_N=3, CONFIRM_M=5, ALERT_COOLDOWN_SECONDS=30';

function createManager(artifactDir: string) {
  return new CalibrationManager({
    parameters: new ParameterStore(baseParameters()),
    intervals,
    channel: createControlChannel(artifactDir),
    metrics: new MetricsRegistry()
  });
}

function createService(artifactDir: string, statusChannel?: SnapshotChannel<StatusDocument>) {
  const manager = createManager(artifactDir);
  const outbox = new MemoryOutbox();
  const metrics = new MetricsRegistry();
  const service = new CommandService({
    manager,
    statusChannel: statusChannel ?? createStatusChannel(artifactDir),
    intervals,
    staleAfterMs: 10_000,
    sink: outbox,
    now: () => NOW,
    metrics
  });
  return { manager, outbox, service, metrics };
}

function statusDocument(publishedAt: string): StatusDocument {
  return {
    version: 1,
    publishedAt,
    controlRevision: 0,
    session: null,
    parameters: baseParameters(),
    lastOutcome: {
      kind: 'candidate',
      reason: 'candidate',
      windowId: 12,
      timestamp: 12000,
      primaryScore: 0.9,
      babyScore: 0.9,
      catScore: 0.1,
      margin: 0.8,
      persistedCount: 1
    },
    alertsSuppressed: false,
    blockedBy: 'none'
  };
}

describe('parseCommand', () => {
  it('parses each command with its arguments', () => {
    expect(parseCommand('/cal_start phase2 30')).toEqual({
      ok: true,
      command: { type: 'start', payload: { phase: 'phase2', intervalSeconds: 30 } }
    });
    expect(parseCommand('/cal_set CONFIRM_N 4')).toEqual({
      ok: true,
      command: { type: 'set', payload: { parameter: 'CONFIRM_N', value: '4' } }
    });
    expect(parseCommand('/cal_watch')).toEqual({ ok: true, command: { type: 'watch', payload: { intervalSeconds: null } } });
    expect(parseCommand('  /CAL_STATUS@nursery_bot ')).toEqual({ ok: true, command: { type: 'status', payload: {} } });
  });

  it('reports usage errors per command', () => {
    expect(parseCommand('/cal_start')).toEqual({
      ok: false,
      type: 'start',
      error: 'Usage: /cal_start phase1|phase2 [interval_sec]'
    });
    expect(parseCommand('/cal_start phase1 soon')).toEqual({
      ok: false,
      type: 'start',
      error: 'Interval must be a positive number of seconds.'
    });
    expect(parseCommand('/cal_set CONFIRM_N')).toEqual({ ok: false, type: 'set', error: 'Usage: /cal_set <param> <value>' });
    expect(parseCommand('/cal_set CONFIRM_N 4 5')).toEqual({
      ok: false,
      type: 'set',
      error: 'Usage: /cal_set <param> <value>'
    });
    expect(parseCommand('/cal_watch often')).toEqual({ ok: false, type: 'watch', error: 'Usage: /cal_watch [interval_sec]' });
  });

  it('rejects unknown commands', () => {
    expect(parseCommand('/calibrate')).toEqual({
      ok: false,
      type: null,
      error: 'Unknown command /calibrate. Send /cal for help.'
    });
    expect(parseCommand('')).toEqual({ ok: false, type: null, error: 'Unknown command (empty). Send /cal for help.' });
  });
});

describe('CommandService', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('lullwatch-commands-');
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('starts a session and applies an override', () => {
    const { service, metrics } = createService(tempDir);

    const started = service.execute('chat-1', '/cal_start phase1 10');
    const set = service.execute('chat-1', '/cal_set confirm_n 4');

    expect(started).toEqual({
      ok: true,
      text:
        'Calibration start: OK. phase1 active, interval 10s. Alerts suppressed until /cal_stop. ' +
        'Allowed: PRIMARY_CRY_THRESHOLD, CONFIRM_N, CONFIRM_M, ALERT_COOLDOWN_SECONDS'
    });
    expect(set).toEqual({ ok: true, text: 'Calibration set: OK. CONFIRM_N=4' });
    expect(metrics.snapshot().calibration.commands).toEqual({ set: 1, start: 1 });
  });

  it('renders the replay lines when a session stops', () => {
    const { service } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase1 10');
    service.execute('chat-1', '/cal_set CONFIRM_N 4');

    const reply = service.execute('chat-1', '/cal_stop');

    expect(reply.ok).toBe(true);
    expect(reply.text).toBe(
      [
        'Calibration stop: OK. Calibration stopped for phase1. Alerts re-enabled and defaults restored.',
        'Final command state:',
        '/cal_start phase1 10',
        '/cal_set CONFIRM_N 4',
        RESTORED
      ].join('\n')
    );
  });

  it('notes a session that applied no overrides', () => {
    const { service } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase2');

    const reply = service.execute('chat-1', '/cal_stop');

    expect(reply.text.split('\n')).toEqual([
      'Calibration stop: OK. Calibration stopped for phase2. Alerts re-enabled and defaults restored.',
      'Final command state:',
      '/cal_start phase2 15',
      '(no parameter overrides were applied)',
      RESTORED
    ]);
  });

  it('answers stop while idle', () => {
    const { service } = createService(tempDir);

    expect(service.execute('chat-1', '/cal_stop')).toEqual({
      ok: true,
      text: 'Calibration stop: OK. Calibration was not active.'
    });
  });

  it('maps calibration errors to ERROR replies', () => {
    const { service, metrics } = createService(tempDir);

    const idleSet = service.execute('chat-1', '/cal_set CONFIRM_N 4');
    service.execute('chat-1', '/cal_start phase1');
    const outOfScope = service.execute('chat-1', '/cal_set CAT_WEIGHT 2');
    const badPhase = service.execute('chat-1', '/cal_start phase9');

    expect(idleSet).toEqual({
      ok: false,
      text: 'Calibration set: ERROR. calibration is not active (set requires /cal_start)'
    });
    expect(outOfScope).toEqual({
      ok: false,
      text:
        'Calibration set: ERROR. parameter CAT_WEIGHT not allowed for phase1. ' +
        'allowed: PRIMARY_CRY_THRESHOLD, CONFIRM_N, CONFIRM_M, ALERT_COOLDOWN_SECONDS'
    });
    expect(badPhase).toEqual({ ok: false, text: 'Calibration start: ERROR. phase must be phase1 or phase2' });
    expect(metrics.snapshot().calibration.errors).toEqual({ set: 2, start: 1 });
  });

  it('renders help without touching the state channel', () => {
    const { service } = createService(tempDir);

    const reply = service.execute('chat-1', '/cal');

    expect(reply.ok).toBe(true);
    expect(reply.text.split('\n')[0]).toBe('Calibration commands:');
    expect(reply.text.split('\n').at(-1)).toBe('default interval: 15s');
  });

  it('shows the monitor view in the status reply', () => {
    const statusChannel = createStatusChannel(tempDir);
    statusChannel.publish(statusDocument('2026-03-01T08:00:08.000Z'));
    const { service } = createService(tempDir, statusChannel);

    const reply = service.execute('chat-1', '/cal_status');

    expect(reply.text.split('\n')).toEqual([
      'Calibration: OK. state=idle',
      'params: PRIMARY_CRY_THRESHOLD=0.5, CRY_THRESHOLD=0.45, CAT_THRESHOLD=0.45, CAT_WEIGHT=1, ' +
        'MARGIN_THRESHOLD=0.15, NON_CRY_WEIGHT=1, CONFIRM_N=3, CONFIRM_M=5, ALERT_COOLDOWN_SECONDS=30',
      'overrides: none',
      'monitor: updated 2.0s ago | last=candidate (candidate) window=12 baby=0.900 cat=0.100 margin=0.800 ' +
        'persisted=1 | alerts=enabled'
    ]);
  });

  it('flags a stale monitor snapshot', () => {
    const statusChannel = createStatusChannel(tempDir);
    statusChannel.publish(statusDocument('2026-03-01T07:59:50.000Z'));
    const { service } = createService(tempDir, statusChannel);

    const view = service.readMonitor();

    expect(view.stale).toBe(true);
    expect(view.ageMs).toBe(20_000);
    expect(service.statusText().split('\n').at(-1)).toBe('monitor: stale (last update 20.0s ago)');
  });

  it('asks the caller to retry when the status channel is unreadable', () => {
    const failing: SnapshotChannel<StatusDocument> = {
      filePath: '/tmp/calibration_status.json',
      publish: () => {},
      read: () => {
        throw new StateChannelUnavailableError('Failed to read calibration_status.json: EACCES', '/tmp/calibration_status.json');
      }
    };
    const { service } = createService(tempDir, failing);

    expect(service.execute('chat-1', '/cal_status')).toEqual({
      ok: false,
      text: 'Calibration: ERROR. status unknown, retry. Failed to read calibration_status.json: EACCES'
    });
  });

  it('emits watch updates on the interval until the session stops', () => {
    vi.useFakeTimers();
    const { service, outbox } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase1');

    const reply = service.execute('chat-1', '/cal_watch 5');
    vi.advanceTimersByTime(1);
    vi.advanceTimersByTime(5000);

    expect(reply).toEqual({ ok: true, text: 'Calibration watch enabled every 5s. Use /cal_watch_stop to stop.' });
    const messages = outbox.drain('chat-1');
    expect(messages).toHaveLength(2);
    expect(messages[0]?.split('\n')[0]).toMatch(/^Calibration: OK\. state=active phase=phase1 interval=5s watch=on started=/);

    service.execute('chat-1', '/cal_stop');
    vi.advanceTimersByTime(20_000);

    expect(outbox.pending('chat-1')).toBe(0);
    expect(service.watches.size).toBe(0);
  });

  it('stops a single origin watch and clears the flag once none remain', () => {
    vi.useFakeTimers();
    const { service, manager } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase1');

    expect(service.execute('chat-1', '/cal_watch_stop').text).toBe('Calibration watch is not active for this origin.');

    service.execute('chat-1', '/cal_watch');
    service.execute('chat-2', '/cal_watch');
    expect(service.execute('chat-1', '/cal_watch_stop').text).toBe('Calibration watch stopped.');
    expect(manager.currentSession()?.watchActive).toBe(true);

    expect(service.execute('chat-2', '/cal_watch_stop').text).toBe('Calibration watch stopped.');
    expect(manager.currentSession()?.watchActive).toBe(false);
  });

  it('ends watches when another process stops the session', () => {
    vi.useFakeTimers();
    const { service, outbox } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase1');
    service.execute('chat-1', '/cal_watch 5');
    vi.advanceTimersByTime(1);
    outbox.drain('chat-1');

    const other = createManager(tempDir);
    other.sync();
    other.stop();
    vi.advanceTimersByTime(5000);

    expect(outbox.pending('chat-1')).toBe(0);
    expect(service.watches.size).toBe(0);
  });

  it('ends watches when a new session replaces the watched one', () => {
    vi.useFakeTimers();
    const { service, outbox, manager } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase1');
    service.execute('chat-1', '/cal_watch 5');
    vi.advanceTimersByTime(1);
    outbox.drain('chat-1');

    service.execute('chat-1', '/cal_start phase2');
    vi.advanceTimersByTime(5000);

    expect(manager.currentSession()?.watchActive).toBe(false);
    expect(outbox.pending('chat-1')).toBe(0);
    expect(service.watches.size).toBe(0);
  });

  it('ends watches when another process replaces the session', () => {
    vi.useFakeTimers();
    const { service, outbox } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase1');
    service.execute('chat-1', '/cal_watch 5');
    vi.advanceTimersByTime(1);
    outbox.drain('chat-1');

    const other = createManager(tempDir);
    other.sync();
    other.start('phase2');
    vi.advanceTimersByTime(5000);

    expect(outbox.pending('chat-1')).toBe(0);
    expect(service.watches.size).toBe(0);
  });

  it('ends watches when another process clears the watch flag', () => {
    vi.useFakeTimers();
    const { service, outbox, manager } = createService(tempDir);
    service.execute('chat-1', '/cal_start phase1');
    service.execute('chat-1', '/cal_watch 5');
    vi.advanceTimersByTime(1);
    outbox.drain('chat-1');

    const other = createManager(tempDir);
    other.sync();
    expect(other.watchStop()?.watchActive).toBe(false);
    vi.advanceTimersByTime(5000);

    expect(outbox.pending('chat-1')).toBe(0);
    expect(service.watches.size).toBe(0);
    expect(manager.currentSession()?.phase).toBe('phase1');
  });
});

describe('WatchRegistry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('replaces an existing watch for the same origin', () => {
    vi.useFakeTimers();
    const tick = vi.fn(() => true);
    const registry = new WatchRegistry(tick);

    registry.start('chat-1', 10, SESSION_STARTED_AT);
    registry.start('chat-1', 10, SESSION_STARTED_AT);
    vi.advanceTimersByTime(1);

    expect(tick).toHaveBeenCalledTimes(1);
    expect(registry.origins()).toEqual(['chat-1']);
    registry.stopAll();
  });

  it('hands each tick the session the watch was started for', () => {
    vi.useFakeTimers();
    const seen: string[] = [];
    const registry = new WatchRegistry((_origin, context) => {
      seen.push(context.sessionStartedAt);
      return !context.isCancelled();
    });

    registry.start('chat-1', 2, SESSION_STARTED_AT);
    vi.advanceTimersByTime(2001);
    registry.stopAll();

    expect(seen).toEqual([SESSION_STARTED_AT, SESSION_STARTED_AT]);
  });

  it('drops a watch whose tick throws', () => {
    vi.useFakeTimers();
    const tick = vi.fn(() => {
      throw new Error('boom');
    });
    const registry = new WatchRegistry(tick);

    registry.start('chat-1', 2, SESSION_STARTED_AT);
    vi.advanceTimersByTime(10_000);

    expect(tick).toHaveBeenCalledTimes(1);
    expect(registry.has('chat-1')).toBe(false);
  });

  it('never ticks a cancelled watch', () => {
    vi.useFakeTimers();
    const tick = vi.fn(() => true);
    const registry = new WatchRegistry(tick);

    registry.start('chat-1', 2, SESSION_STARTED_AT);
    expect(registry.stop('chat-1')).toBe(true);
    vi.advanceTimersByTime(10_000);

    expect(tick).not.toHaveBeenCalled();
    expect(registry.stop('chat-1')).toBe(false);
  });
});
