import type { CalibrationIntervalConfig } from '../config/index.js';
import type { StatusDocument } from '../channel/documents.js';
import type { CalibrationManager, CalibrationStatus } from '../calibration/manager.js';
import { PHASE_PARAMETERS } from '../calibration/phases.js';
import { PARAMETER_NAMES, type ParameterOverrides, type Parameters } from '../types.js';
import type { CommandPayloads, CommandType } from './parse.js';
import type { WatchRegistry } from './watch.js';

export type CommandReply = {
  ok: boolean;
  text: string;
};

export type MonitorView = {
  document: StatusDocument | null;
  ageMs: number | null;
  stale: boolean;
};

export type CommandContext = {
  origin: string;
  manager: CalibrationManager;
  watches: WatchRegistry;
  intervals: CalibrationIntervalConfig;
  /** Reads the monitor's last status snapshot; throws when the channel is unreadable. */
  readMonitor: () => MonitorView;
};

type CommandHandler<K extends CommandType> = (payload: CommandPayloads[K], context: CommandContext) => CommandReply;

export const REPLY_PREFIXES: { readonly [K in CommandType]: string } = {
  help: 'Calibration',
  start: 'Calibration start',
  set: 'Calibration set',
  params: 'Calibration params',
  status: 'Calibration',
  watch: 'Calibration watch',
  watchStop: 'Calibration watch',
  stop: 'Calibration stop'
};

function ok(type: CommandType, detail: string): CommandReply {
  return { ok: true, text: `${REPLY_PREFIXES[type]}: OK. ${detail}` };
}

export function formatParameters(parameters: Parameters): string {
  return PARAMETER_NAMES.map(name => `${name}=${parameters[name]}`).join(', ');
}

export function formatOverrides(overrides: ParameterOverrides): string {
  const entries: string[] = [];
  for (const name of PARAMETER_NAMES) {
    const value = overrides[name];
    if (value !== undefined) {
      entries.push(`${name}=${value}`);
    }
  }
  return entries.length > 0 ? entries.join(', ') : 'none';
}

function formatScore(value: number | null) {
  return value === null ? 'n/a' : value.toFixed(3);
}

function formatMonitor(view: MonitorView, revision: number): string {
  const { document } = view;
  if (!document) {
    return 'monitor: no status published yet';
  }
  const age = view.ageMs === null ? 'unknown age' : `${(view.ageMs / 1000).toFixed(1)}s ago`;
  if (view.stale) {
    return `monitor: stale (last update ${age})`;
  }
  const parts = [`monitor: updated ${age}`];
  const outcome = document.lastOutcome;
  if (outcome) {
    parts.push(
      `last=${outcome.kind} (${outcome.reason}) window=${outcome.windowId ?? 'n/a'} ` +
        `baby=${formatScore(outcome.babyScore)} cat=${formatScore(outcome.catScore)} ` +
        `margin=${formatScore(outcome.margin)} persisted=${outcome.persistedCount}`
    );
  }
  parts.push(document.alertsSuppressed ? `alerts=suppressed (${document.blockedBy})` : `alerts=enabled`);
  if (document.controlRevision < revision) {
    parts.push(`pending revision ${revision}`);
  }
  return parts.join(' | ');
}

export function formatStatus(status: CalibrationStatus, monitor: MonitorView): string {
  const { session } = status;
  const lines = [
    session
      ? `state=active phase=${session.phase} interval=${session.intervalSeconds}s watch=${session.watchActive ? 'on' : 'off'} started=${session.startedAt}`
      : 'state=idle',
    `params: ${formatParameters(status.parameters)}`,
    `overrides: ${formatOverrides(status.overrides)}`,
    formatMonitor(monitor, status.revision)
  ];
  return lines.join('\n');
}

export function buildHelpText(intervals: CalibrationIntervalConfig): string {
  return [
    'Calibration commands:',
    '/cal',
    '/cal_start phase1 [interval_sec]',
    '/cal_start phase2 [interval_sec]',
    '/cal_set <param> <value>',
    '/cal_params',
    '/cal_status',
    '/cal_watch [interval_sec]',
    '/cal_watch_stop',
    '/cal_stop',
    '',
    `phase1 params: ${PHASE_PARAMETERS.phase1.join(', ')}`,
    `phase2 params: ${PHASE_PARAMETERS.phase2.join(', ')}`,
    `default interval: ${intervals.defaultIntervalSeconds}s`
  ].join('\n');
}

const handlers: { [K in CommandType]: CommandHandler<K> } = {
  help: (_payload, context) => ({ ok: true, text: buildHelpText(context.intervals) }),

  start: (payload, context) => {
    const session = context.manager.start(payload.phase, payload.intervalSeconds);
    context.watches.stopAll();
    return ok(
      'start',
      `${session.phase} active, interval ${session.intervalSeconds}s. Alerts suppressed until /cal_stop. ` +
        `Allowed: ${PHASE_PARAMETERS[session.phase].join(', ')}`
    );
  },

  set: (payload, context) => {
    const result = context.manager.set(payload.parameter, payload.value);
    return ok('set', `${result.parameter}=${result.value}`);
  },

  params: (_payload, context) => {
    const params = context.manager.params();
    const scope = params.phase ? `phase=${params.phase} allowed=${params.allowed.join(', ')}` : 'phase=none (idle)';
    return ok(
      'params',
      [scope, `effective: ${formatParameters(params.parameters)}`, `overrides: ${formatOverrides(params.overrides)}`].join(
        '\n'
      )
    );
  },

  status: (_payload, context) => ok('status', formatStatus(context.manager.status(), context.readMonitor())),

  watch: (payload, context) => {
    const session = context.manager.watch(payload.intervalSeconds);
    context.watches.start(context.origin, session.intervalSeconds, session.startedAt);
    return {
      ok: true,
      text: `Calibration watch enabled every ${session.intervalSeconds}s. Use /cal_watch_stop to stop.`
    };
  },

  watchStop: (_payload, context) => {
    const existed = context.watches.stop(context.origin);
    if (context.watches.size === 0) {
      context.manager.watchStop();
    }
    return {
      ok: true,
      text: existed ? 'Calibration watch stopped.' : 'Calibration watch is not active for this origin.'
    };
  },

  stop: (_payload, context) => {
    const summary = context.manager.stop();
    context.watches.stopAll();
    if (!summary.wasActive) {
      return ok('stop', 'Calibration was not active.');
    }
    const lines = [
      `Calibration stopped for ${summary.phase}. Alerts re-enabled and defaults restored.`,
      'Final command state:',
      ...summary.replay
    ];
    if (summary.replay.length === 1) {
      lines.push('(no parameter overrides were applied)');
    }
    lines.push(`restored: ${formatParameters(summary.parameters)}`);
    return ok('stop', lines.join('\n'));
  }
};

export function invokeHandler<K extends CommandType>(
  type: K,
  payload: CommandPayloads[K],
  context: CommandContext
): CommandReply {
  const handler: CommandHandler<K> = handlers[type];
  return handler(payload, context);
}
