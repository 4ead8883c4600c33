import fs from 'node:fs';
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import { bootstrap, registerShutdownHook, runShutdownHooks, type BootstrapOptions } from './app.js';
import { loadConfigFromFile } from './config/index.js';
import { pruneEventsOlderThan } from './db.js';
import { startHttpServer } from './server/http.js';

type ServiceStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type ServiceState = {
  status: ServiceStatus;
  startedAt: number | null;
  stopResolver: (() => void) | null;
  shutdownPromise: Promise<Error | null> | null;
  exitCode: number;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'Usage: camlight <command> [options]',
  '',
  'Commands:',
  '  start                      Start the camera service and HTTP server',
  '  check-config [--config p]  Validate a configuration file',
  '  log-level [get|set <lvl>]  Show or change the log level',
  '  prune-events --days <n>    Delete journal events older than n days',
  '  version                    Print the package version',
  '  help                       Show this message'
];

const LOG_LEVEL_USAGE = 'Usage: camlight log-level [get|set <level>]';
const DAY_MS = 24 * 60 * 60 * 1000;

const state: ServiceState = {
  status: 'idle',
  startedAt: null,
  stopResolver: null,
  shutdownPromise: null,
  exitCode: 0
};

let startOptions: BootstrapOptions = {};

function resetServiceState() {
  state.status = 'idle';
  state.startedAt = null;
  state.stopResolver = null;
  state.shutdownPromise = null;
  state.exitCode = 0;
}

/** Finds package.json from both `src/` and the compiled `dist/src/`. */
export function readPackageVersion(startUrl: string = import.meta.url): string {
  let directory = path.dirname(fileURLToPath(startUrl));
  for (let depth = 0; depth < 4; depth += 1) {
    const candidate = path.join(directory, 'package.json');
    if (fs.existsSync(candidate)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
      return 'unknown';
    }
    directory = path.dirname(directory);
  }
  return 'unknown';
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'start';

  switch (command) {
    case 'start': {
      return startDaemon(io);
    }
    case 'check-config': {
      return runCheckConfigCommand(argv.slice(1), io);
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'prune-events': {
      return runPruneEventsCommand(argv.slice(1), io);
    }
    case 'version':
    case '--version':
    case '-v': {
      io.stdout.write(`${readPackageVersion()}\n`);
      return 0;
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

function runCheckConfigCommand(args: string[], io: CliIo): number {
  let configPath = 'config/default.json';
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--config' || arg === '-c') {
      const value = args[index + 1];
      if (!value) {
        io.stderr.write('Missing value for --config\n');
        return 1;
      }
      configPath = value;
      index += 1;
    } else if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
    } else {
      io.stderr.write(`Unknown option: ${arg}\n`);
      return 1;
    }
  }

  try {
    loadConfigFromFile(configPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Configuration invalid (${configPath}): ${message}\n`);
    return 1;
  }

  io.stdout.write(`Configuration OK (${configPath})\n`);
  return 0;
}

function runPruneEventsCommand(args: string[], io: CliIo): number {
  let rawDays: string | undefined;
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--days') {
      rawDays = args[index + 1];
      index += 1;
    } else if (arg.startsWith('--days=')) {
      rawDays = arg.slice('--days='.length);
    } else {
      io.stderr.write(`Unknown option: ${arg}\n`);
      return 1;
    }
  }

  const days = Number(rawDays);
  if (rawDays === undefined || rawDays.trim() === '' || !Number.isFinite(days) || days < 0) {
    io.stderr.write('--days must be a non-negative number\n');
    return 1;
  }

  const removed = pruneEventsOlderThan(Date.now() - days * DAY_MS);
  logger.info({ days, removed }, 'Event journal pruned');
  io.stdout.write(`Removed ${removed} event(s) older than ${days} day(s)\n`);
  return 0;
}

function runLogLevelCommand(args: string[], io: CliIo): number {
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

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
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
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

async function startDaemon(io: CliIo): Promise<number> {
  if (state.status === 'running' || state.status === 'starting') {
    io.stdout.write('camlight is already running\n');
    return 0;
  }

  state.status = 'starting';
  state.exitCode = 0;

  try {
    const { service, config } = await metrics.time('service.startup.ms', () => bootstrap(startOptions));
    const server = await startHttpServer({ service, port: config.server.port, host: config.server.host });
    registerShutdownHook('http-server', () => server.close());

    service.once('fatal', () => {
      state.exitCode = 1;
      void performShutdown('fatal');
    });
  } catch (error) {
    logger.error({ err: error }, 'camlight failed to start');
    io.stderr.write('camlight failed to start. Check logs for details.\n');
    await runShutdownHooks({ reason: 'start-failed' });
    state.status = 'stopped';
    return 1;
  }

  if (state.status !== 'starting') {
    return state.exitCode;
  }

  state.status = 'running';
  state.startedAt = Date.now();
  logger.info({ startedAt: state.startedAt }, 'camlight started');
  io.stdout.write('camlight started\n');

  await new Promise<void>(resolve => {
    state.stopResolver = resolve;
    registerSignalHandlers();
  });

  return state.exitCode;
}

function registerSignalHandlers() {
  const handleSignal = (signal: NodeJS.Signals) => {
    void performShutdown('signal', signal);
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
}

async function performShutdown(reason: string, signal?: NodeJS.Signals): Promise<Error | null> {
  if (state.status === 'idle' || state.status === 'stopped') {
    return null;
  }
  if (state.shutdownPromise) {
    return state.shutdownPromise;
  }

  state.status = 'stopping';
  logger.info({ reason, signal }, 'camlight shutting down');

  const shutdownTask = (async () => {
    let failure: Error | null = null;
    const results = await runShutdownHooks({ reason, signal });
    for (const result of results) {
      if (result.status === 'error') {
        failure = failure ?? result.error ?? null;
        logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
      }
    }
    if (failure) {
      state.exitCode = 1;
    }

    state.status = 'stopped';
    state.startedAt = null;
    state.stopResolver?.();
    state.stopResolver = null;
    logger.info({ reason, signal }, 'camlight stopped');
    return failure;
  })();

  state.shutdownPromise = shutdownTask;
  return shutdownTask;
}

export const __test__ = {
  getState: () => ({ ...state }),
  setStartOptions(options: BootstrapOptions) {
    startOptions = options;
  },
  shutdown: (reason = 'test') => performShutdown(reason),
  reset() {
    resetServiceState();
    startOptions = {};
  }
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'camlight CLI failed');
      process.exit(1);
    }
  );
}
