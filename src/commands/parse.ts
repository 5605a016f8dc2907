export type CommandPayloads = {
  help: Record<string, never>;
  start: { phase: string; intervalSeconds: number | null };
  set: { parameter: string; value: string };
  params: Record<string, never>;
  status: Record<string, never>;
  watch: { intervalSeconds: number | null };
  watchStop: Record<string, never>;
  stop: Record<string, never>;
};

export type CommandType = keyof CommandPayloads;

export type CalibrationCommand = {
  [K in CommandType]: { type: K; payload: CommandPayloads[K] };
}[CommandType];

export type ParseResult =
  | { ok: true; command: CalibrationCommand }
  | { ok: false; type: CommandType | null; error: string };

export const COMMAND_NAMES: { readonly [K in CommandType]: string } = {
  help: '/cal',
  start: '/cal_start',
  set: '/cal_set',
  params: '/cal_params',
  status: '/cal_status',
  watch: '/cal_watch',
  watchStop: '/cal_watch_stop',
  stop: '/cal_stop'
};

const COMMAND_LOOKUP = new Map<string, CommandType>();
for (const [type, name] of Object.entries(COMMAND_NAMES)) {
  if (isCommandType(type)) {
    COMMAND_LOOKUP.set(name, type);
  }
}

function isCommandType(value: string): value is CommandType {
  return value in COMMAND_NAMES;
}

function parseInterval(raw: string | undefined): number | null | undefined {
  if (raw === undefined) {
    return null;
  }
  if (!/^\d+(\.\d+)?$/.test(raw)) {
    return undefined;
  }
  return Number(raw);
}

/**
 * Parses a chat-style command line ("/cal_set CONFIRM_N 4"). A bot mention
 * suffix on the command ("/cal_status@nursery_bot") is ignored.
 */
export function parseCommand(text: string): ParseResult {
  const parts = text.trim().split(/\s+/).filter(part => part.length > 0);
  const head = (parts[0] ?? '').toLowerCase().split('@')[0] ?? '';
  const type = COMMAND_LOOKUP.get(head);
  if (!type) {
    return { ok: false, type: null, error: `Unknown command ${head || '(empty)'}. Send /cal for help.` };
  }
  const args = parts.slice(1);

  switch (type) {
    case 'start': {
      const phase = args[0];
      if (!phase) {
        return { ok: false, type, error: 'Usage: /cal_start phase1|phase2 [interval_sec]' };
      }
      const intervalSeconds = parseInterval(args[1]);
      if (intervalSeconds === undefined) {
        return { ok: false, type, error: 'Interval must be a positive number of seconds.' };
      }
      return { ok: true, command: { type, payload: { phase, intervalSeconds } } };
    }
    case 'set': {
      const parameter = args[0];
      const value = args[1];
      if (!parameter || value === undefined || args.length > 2) {
        return { ok: false, type, error: 'Usage: /cal_set <param> <value>' };
      }
      return { ok: true, command: { type, payload: { parameter, value } } };
    }
    case 'watch': {
      const intervalSeconds = parseInterval(args[0]);
      if (intervalSeconds === undefined) {
        return { ok: false, type, error: 'Usage: /cal_watch [interval_sec]' };
      }
      return { ok: true, command: { type, payload: { intervalSeconds } } };
    }
    case 'help':
    case 'params':
    case 'status':
    case 'watchStop':
    case 'stop':
      return { ok: true, command: { type, payload: {} } };
  }
}
