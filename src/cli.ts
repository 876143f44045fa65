#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import logger, { getLogLevel, setLogLevel } from './logger.js';
import {
  ConfigManager,
  loadConfigFromFile,
  loadDefaultConfig,
  parseListenAddress,
  staticConfigSource,
  withConfigOverrides,
  type ConfigOverrides,
  type ConfigReloadEvent,
  type ConfigSource,
  type ExporterConfig
} from './config/index.js';
import { StatusExporter } from './exporter.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { detectDialect, readStatusInput } from './status/index.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliOptions = {
  /** Stops a running `start` command; defaults to SIGINT/SIGTERM. */
  shutdownSignal?: AbortSignal;
  onListening?: (runtime: HttpServerRuntime) => void;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'OpenVPN status exporter',
  '',
  'Usage:',
  '  vpn-status-exporter start [options]         Serve metrics over HTTP (default command)',
  '  vpn-status-exporter scrape [options] [path...]  Scrape once and print the exposition',
  '  vpn-status-exporter detect <path>           Print the status file dialect',
  '',
  'Options for "start" and "scrape":',
  '  -c, --config <path>              Load configuration from a JSON file (watched by "start")',
  '  --web.listen-address <addr>      Address to listen on, e.g. :9176',
  '  --web.telemetry-path <path>      Path under which metrics are exposed',
  '  --openvpn.status_paths <paths>   Comma separated status file paths',
  '  --ignore.individuals             Label server metrics by common name only',
  '  -h, --help                       Show this help message'
];

type ExporterArgs = {
  configPath: string | null;
  overrides: ConfigOverrides;
  positionals: string[];
  help: boolean;
  errors: string[];
};

const VALUE_OPTIONS = new Set([
  '--config',
  '-c',
  '--web.listen-address',
  '--web.telemetry-path',
  '--openvpn.status_paths'
]);

function splitPaths(value: string): string[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function parseExporterArgs(argv: string[]): ExporterArgs {
  const parsed: ExporterArgs = {
    configPath: null,
    overrides: {},
    positionals: [],
    help: false,
    errors: []
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (!token.startsWith('-')) {
      parsed.positionals.push(token);
      continue;
    }

    if (token === '--help' || token === '-h') {
      parsed.help = true;
      continue;
    }

    const equalsIndex = token.indexOf('=');
    const option = equalsIndex >= 0 ? token.slice(0, equalsIndex) : token;
    let value: string | undefined;
    if (equalsIndex >= 0) {
      value = token.slice(equalsIndex + 1);
    }

    if (option === '--ignore.individuals') {
      if (value === undefined || value === 'true') {
        parsed.overrides.ignoreIndividuals = true;
      } else if (value === 'false') {
        parsed.overrides.ignoreIndividuals = false;
      } else {
        parsed.errors.push(`Invalid value for --ignore.individuals: ${value}`);
      }
      continue;
    }

    if (!VALUE_OPTIONS.has(option)) {
      parsed.errors.push(`Unknown option: ${token}`);
      continue;
    }

    if (value === undefined) {
      value = argv[index + 1];
      index += 1;
    }
    if (!value) {
      parsed.errors.push(`Missing value for ${option}`);
      continue;
    }

    switch (option) {
      case '--config':
      case '-c':
        parsed.configPath = value;
        break;
      case '--web.listen-address':
        parsed.overrides.listenAddress = value;
        break;
      case '--web.telemetry-path':
        parsed.overrides.telemetryPath = value;
        break;
      case '--openvpn.status_paths':
        parsed.overrides.statusPaths = splitPaths(value);
        break;
    }
  }

  return parsed;
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  options: CliOptions = {}
): Promise<number> {
  const [first] = argv;
  const command = !first || first.startsWith('-') ? 'start' : first;
  const args = command === first ? argv.slice(1) : argv;

  switch (command) {
    case 'start': {
      return startCommand(args, io, options);
    }
    case 'scrape': {
      return scrapeCommand(args, io);
    }
    case 'detect': {
      return detectCommand(args, io);
    }
    case 'help': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

function reportArgErrors(parsed: ExporterArgs, io: CliIo): number | null {
  if (parsed.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }
  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
    return 1;
  }
  return null;
}

function resolveOneShotConfig(parsed: ExporterArgs): ExporterConfig {
  const base = parsed.configPath ? loadConfigFromFile(parsed.configPath) : loadDefaultConfig();
  const overrides: ConfigOverrides = { ...parsed.overrides };
  if (parsed.positionals.length > 0) {
    overrides.statusPaths = parsed.positionals;
  }
  return withConfigOverrides(staticConfigSource(base), overrides).getConfig();
}

async function scrapeCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseExporterArgs(args);
  const early = reportArgErrors(parsed, io);
  if (early !== null) {
    return early;
  }

  let config: ExporterConfig;
  try {
    config = resolveOneShotConfig(parsed);
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }

  setLogLevel(config.logging.level);
  const exporter = new StatusExporter({
    statusPaths: config.openvpn.statusPaths,
    ignoreIndividuals: config.openvpn.ignoreIndividuals,
    namespace: config.openvpn.namespace
  });
  const { text, sources } = await exporter.scrapeAll();
  io.stdout.write(text);

  const failed = sources.filter(source => !source.up);
  for (const source of failed) {
    io.stderr.write(`${source.statusPath}: ${describeError(source.error)}\n`);
  }
  return failed.length > 0 ? 1 : 0;
}

async function detectCommand(args: string[], io: CliIo): Promise<number> {
  const [statusPath] = args;
  if (!statusPath || args.length > 1) {
    io.stderr.write('Usage: vpn-status-exporter detect <path>\n');
    return 1;
  }

  try {
    const document = await readStatusInput(fs.createReadStream(statusPath));
    io.stdout.write(`${detectDialect(document)}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${statusPath}: ${describeError(error)}\n`);
    return 1;
  }
}

async function startCommand(args: string[], io: CliIo, options: CliOptions): Promise<number> {
  const parsed = parseExporterArgs(args);
  const early = reportArgErrors(parsed, io);
  if (early !== null) {
    return early;
  }
  if (parsed.positionals.length > 0) {
    io.stderr.write(`Unexpected argument: ${parsed.positionals[0]}\n`);
    return 1;
  }

  let stopWatching = () => {};
  let runtime: HttpServerRuntime;
  try {
    let source: ConfigSource;
    if (parsed.configPath) {
      const manager = new ConfigManager(parsed.configPath);
      manager.on('reload', (event: ConfigReloadEvent) => {
        setLogLevel(event.next.logging.level);
        logger.info(
          { statusPaths: event.next.openvpn.statusPaths, path: manager.getPath() },
          'Configuration reloaded'
        );
      });
      manager.on('error', (error: Error) => {
        logger.warn({ err: error, path: manager.getPath() }, 'Configuration reload failed');
      });
      stopWatching = manager.watch();
      source = manager;
    } else {
      source = staticConfigSource(loadDefaultConfig());
    }

    const merged = withConfigOverrides(source, parsed.overrides);
    const config = merged.getConfig();
    setLogLevel(config.logging.level);
    const address = parseListenAddress(config.web.listenAddress);
    if (!address) {
      throw new Error(`Invalid listen address: ${config.web.listenAddress}`);
    }
    runtime = await startHttpServer({
      config: merged,
      port: address.port,
      host: address.host || '0.0.0.0'
    });
    logger.info(
      {
        statusPaths: config.openvpn.statusPaths,
        telemetryPath: config.web.telemetryPath,
        logLevel: getLogLevel()
      },
      'Exporter started'
    );
  } catch (error) {
    stopWatching();
    logger.error({ err: error }, 'Exporter failed to start');
    io.stderr.write(`Exporter failed to start: ${describeError(error)}\n`);
    return 1;
  }

  io.stdout.write(`Listening on port ${runtime.port}\n`);
  options.onListening?.(runtime);

  const signal = await waitForShutdown(options.shutdownSignal);
  logger.info({ signal }, 'Exporter stopping');
  stopWatching();
  await runtime.close();
  return 0;
}

function waitForShutdown(abortSignal?: AbortSignal): Promise<string> {
  if (abortSignal) {
    if (abortSignal.aborted) {
      return Promise.resolve('abort');
    }
    return new Promise(resolve => {
      abortSignal.addEventListener('abort', () => resolve('abort'), { once: true });
    });
  }

  return new Promise(resolve => {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
    const handleSignal = (signal: NodeJS.Signals) => {
      for (const other of signals) {
        process.off(other, handleSignal);
      }
      resolve(signal);
    };
    for (const signal of signals) {
      process.once(signal, handleSignal);
    }
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const __test__ = {
  parseExporterArgs
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Exporter CLI failed');
      process.exit(1);
    }
  );
}
