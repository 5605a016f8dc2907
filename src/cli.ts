import process from 'node:process';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import { StateChannelUnavailableError, toError } from './errors.js';
import {
  collectHealthChecks,
  createCommandRuntime,
  createMonitorRuntime,
  loadAppConfig,
  registerHealthIndicator,
  registerShutdownHook,
  runShutdownHooks,
  withArtifactDir,
  type ConfigSource
} from './app.js';
import { createEventStore } from './db.js';
import { openScoreInput, readJsonLines } from './monitor/scoreSource.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import type { HealthReport } from './server/routes/commands.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  stdin?: Readable;
};

type GlobalOptions = {
  configPath: string | null;
  artifactDir: string | null;
  rest: string[];
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr, stdin: process.stdin };

const CLI_ORIGIN = 'cli';

const USAGE_LINES = [
  'lullwatch CLI',
  '',
  'Usage:',
  '  lullwatch monitor [--input <file|->] [--max-windows <n>]',
  '                                   Gate JSON-lines score windows and dispatch confirmed events',
  '  lullwatch serve [--port <n>] [--host <host>]',
  '                                   Serve the calibration command API over HTTP',
  '  lullwatch cal [<sub> [args...]]  Run a calibration command (e.g. "cal start phase1 15", "cal watch-stop")',
  '  lullwatch status [--json]        Print calibration and monitor status',
  '  lullwatch log-level [get|set <level>]',
  '  lullwatch help                   Show this help',
  '',
  'Global options:',
  '  --config <path>                  Load configuration from a JSON file (reloaded on change)',
  '  --artifacts <dir>                Override the artifact directory holding the state documents'
];

const MONITOR_USAGE = 'Usage: lullwatch monitor [--input <file|->] [--max-windows <n>]';
const SERVE_USAGE = 'Usage: lullwatch serve [--port <n>] [--host <host>]';
const LOG_LEVEL_USAGE = [
  'Usage: lullwatch log-level [get|set <level>]',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const globals = parseGlobalOptions(argv);
  if (globals.errors.length > 0) {
    for (const message of globals.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  const [command = 'help', ...args] = globals.rest;

  switch (command) {
    case 'monitor': {
      return withConfig(globals, io, source => runMonitorCommand(args, source, io));
    }
    case 'serve': {
      return withConfig(globals, io, source => runServeCommand(args, source, io));
    }
    case 'cal': {
      return withConfig(globals, io, source => runCalibrationCommand(args, source, io));
    }
    case 'status': {
      const json = args.includes('--json') || args.includes('-j');
      return withConfig(globals, io, source => printStatus(source, io, { json }));
    }
    case 'log-level': {
      return runLogLevelCommand(args, io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

function parseGlobalOptions(argv: string[]): GlobalOptions {
  const result: GlobalOptions = { configPath: null, artifactDir: null, rest: [], errors: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === '--config' || token === '--artifacts') {
      const value = argv[index + 1];
      if (!value || value.startsWith('--')) {
        result.errors.push(`Missing value for ${token}`);
        continue;
      }
      if (token === '--config') {
        result.configPath = value;
      } else {
        result.artifactDir = value;
      }
      index += 1;
      continue;
    }
    result.rest.push(token);
  }
  return result;
}

async function withConfig(
  globals: GlobalOptions,
  io: CliIo,
  run: (source: ConfigSource) => Promise<number>
): Promise<number> {
  let source: ConfigSource;
  try {
    source = loadAppConfig(globals.configPath);
  } catch (error) {
    io.stderr.write(`Failed to load configuration: ${toError(error).message}\n`);
    return 1;
  }
  const config = withArtifactDir(source.config, globals.artifactDir);
  if (config.logging.level !== getLogLevel()) {
    setLogLevel(config.logging.level);
  }
  return run({ config, manager: source.manager });
}

function parsePositiveInteger(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) {
    return null;
  }
  const value = Number.parseInt(raw, 10);
  return value > 0 ? value : null;
}

async function runMonitorCommand(args: string[], source: ConfigSource, io: CliIo): Promise<number> {
  let inputPath: string | null = null;
  let maxWindows: number | undefined;
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--input' || token === '-i') {
      inputPath = args[index + 1] ?? null;
      index += 1;
    } else if (token === '--max-windows') {
      const parsed = parsePositiveInteger(args[index + 1]);
      if (parsed === null) {
        io.stderr.write('--max-windows expects a positive integer\n');
        io.stderr.write(`${MONITOR_USAGE}\n`);
        return 1;
      }
      maxWindows = parsed;
      index += 1;
    } else {
      io.stderr.write(`Unknown option: ${token}\n`);
      io.stderr.write(`${MONITOR_USAGE}\n`);
      return 1;
    }
  }

  const stdin = io.stdin ?? process.stdin;
  const runtime = createMonitorRuntime(source.config);
  const input = openScoreInput(inputPath, stdin);
  const controller = new AbortController();
  const stopWatching = watchConfig(source, next => runtime.applyConfig(next));
  registerShutdownHook('monitor-runtime', () => {
    runtime.close();
  });

  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Monitor stopping');
    controller.abort();
    input.destroy();
  };
  const removeSignalHandlers = registerSignalHandlers(handleSignal);

  try {
    const summary = await runtime.loop.run(readJsonLines(input), { signal: controller.signal, maxWindows });
    io.stdout.write(`${JSON.stringify(summary)}\n`);
    return 0;
  } catch (error) {
    if (controller.signal.aborted) {
      return 0;
    }
    io.stderr.write(`Monitor failed: ${toError(error).message}\n`);
    return 1;
  } finally {
    removeSignalHandlers();
    stopWatching();
    await runShutdownHooks({ reason: 'monitor-finished' });
  }
}

async function runServeCommand(args: string[], source: ConfigSource, io: CliIo): Promise<number> {
  let port = source.config.server.port;
  let host = source.config.server.host;
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--port') {
      const raw = args[index + 1];
      const parsed = raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
      if (!Number.isInteger(parsed) || parsed > 65535) {
        io.stderr.write('--port expects an integer between 0 and 65535\n');
        io.stderr.write(`${SERVE_USAGE}\n`);
        return 1;
      }
      port = parsed;
      index += 1;
    } else if (token === '--host') {
      const value = args[index + 1];
      if (!value) {
        io.stderr.write('Missing value for --host\n');
        return 1;
      }
      host = value;
      index += 1;
    } else {
      io.stderr.write(`Unknown option: ${token}\n`);
      io.stderr.write(`${SERVE_USAGE}\n`);
      return 1;
    }
  }

  const runtime = createCommandRuntime(source.config);
  const store = createEventStore(source.config.artifacts.databasePath);
  const startedAt = Date.now();
  const stopWatching = watchConfig(source, next => runtime.parameters.setBase(next.gating.parameters));

  registerHealthIndicator('calibration', () => ({
    status: 'ok',
    details: { state: runtime.calibration.status().state, revision: runtime.calibration.currentRevision() }
  }));
  registerHealthIndicator('monitor', () => {
    const monitor = runtime.service.readMonitor();
    if (!monitor.document) {
      return { status: 'degraded', details: { reason: 'no monitor status published' } };
    }
    return {
      status: monitor.stale ? 'degraded' : 'ok',
      details: { ageMs: monitor.ageMs, stale: monitor.stale }
    };
  });

  const health = async (): Promise<HealthReport> => {
    const checks = await collectHealthChecks({ service: { status: 'running', startedAt } });
    const status = checks.every(check => check.status === 'ok') ? 'ok' : 'degraded';
    return { status, checks };
  };

  let server: HttpServerRuntime;
  try {
    server = await startHttpServer({
      port,
      host,
      service: runtime.service,
      manager: runtime.calibration,
      outbox: runtime.outbox,
      store,
      health
    });
  } catch (error) {
    stopWatching();
    runtime.close();
    store.close();
    io.stderr.write(`Failed to start HTTP server: ${toError(error).message}\n`);
    return 1;
  }

  registerShutdownHook('event-store', () => {
    store.close();
  });
  registerShutdownHook('command-runtime', () => {
    runtime.close();
  });
  registerShutdownHook('http-server', () => server.close());
  io.stdout.write(`lullwatch serving on ${host}:${server.port}\n`);

  const signal = await new Promise<NodeJS.Signals>(resolve => {
    const remove = registerSignalHandlers(received => {
      remove();
      resolve(received);
    });
  });

  stopWatching();
  const results = await runShutdownHooks({ reason: 'signal', signal });
  const failures = results.filter(result => result.status === 'error');
  for (const failure of failures) {
    io.stderr.write(`Hook ${failure.name} failed: ${failure.error?.message ?? 'unknown error'}\n`);
  }
  return failures.length > 0 ? 1 : 0;
}

async function runCalibrationCommand(args: string[], source: ConfigSource, io: CliIo): Promise<number> {
  const [sub, ...rest] = args;
  const name = sub ? `/cal_${sub.replace(/-/g, '_')}` : '/cal';
  const text = [name, ...rest].join(' ');

  const runtime = createCommandRuntime(source.config);
  try {
    const reply = runtime.service.execute(CLI_ORIGIN, text);
    const stream = reply.ok ? io.stdout : io.stderr;
    stream.write(`${reply.text}\n`);
    return reply.ok ? 0 : 1;
  } finally {
    runtime.close();
  }
}

async function printStatus(source: ConfigSource, io: CliIo, options: { json?: boolean } = {}): Promise<number> {
  const runtime = createCommandRuntime(source.config);
  try {
    if (options.json) {
      runtime.calibration.sync();
      const monitor = runtime.service.readMonitor();
      io.stdout.write(`${JSON.stringify({ calibration: runtime.calibration.status(), monitor })}\n`);
      return 0;
    }
    io.stdout.write(`${runtime.service.statusText()}\n`);
    return 0;
  } catch (error) {
    if (error instanceof StateChannelUnavailableError) {
      io.stderr.write(`status unknown, retry. ${error.message}\n`);
      return 1;
    }
    throw error;
  } finally {
    runtime.close();
  }
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${toError(error).message}\n`);
    return 1;
  }
}

function watchConfig(source: ConfigSource, apply: (next: ConfigSource['config']) => void): () => void {
  const { manager } = source;
  if (!manager) {
    return () => {};
  }
  const onReload = ({ next }: { next: ConfigSource['config'] }) => {
    try {
      apply(next);
      if (next.logging.level !== getLogLevel()) {
        setLogLevel(next.logging.level);
      }
    } catch (error) {
      logger.error({ err: toError(error) }, 'Failed to apply reloaded configuration');
    }
  };
  const onError = (error: Error) => {
    logger.warn({ err: error }, 'Configuration reload rejected; keeping last good file');
  };
  manager.on('reload', onReload);
  manager.on('error', onError);
  const unwatch = manager.watch();
  return () => {
    unwatch();
    manager.off('reload', onReload);
    manager.off('error', onError);
  };
}

function registerSignalHandlers(handler: (signal: NodeJS.Signals) => void): () => void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.once(signal, handler);
  }
  return () => {
    for (const signal of signals) {
      process.off(signal, handler);
    }
  };
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: toError(error) }, 'lullwatch CLI failed');
      process.exit(1);
    }
  );
}
