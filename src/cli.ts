#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   slideshow-conductor [options] [paths...]
 *
 * Paths are image files, directories or `@file` lists. Without `--web` the
 * slideshow runs in the terminal; with it, an HTTP server serves one
 * independent session per browser tab.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { App } from './App';
import { ConfigStore, USER_CONFIG_NAMES } from './config/ConfigStore';
import { resolveSettings } from './config/settings';
import { AppError, describeError } from './core/errors';
import { discoverItems } from './core/sequence/ItemDiscovery';
import { ConsoleSlideshow } from './desktop/ConsoleSlideshow';
import { SlideshowServer } from './network/SlideshowServer';
import { Logger, parseLogLevel } from './utils/Logger';

const log = new Logger('cli');

export type CliOptions = {
  recursive?: boolean;
  exclude?: string[];
  speed?: number;
  repeat?: boolean;
  repeatMode?: string;
  shuffle?: boolean;
  paused?: boolean;
  status?: string;
  alwaysOnTop?: boolean;
  web?: boolean;
  port?: number;
  host?: string;
  gallery?: boolean;
  externalTools?: string;
  config?: string;
  initConfig?: string | true;
  seed?: number;
  logLevel?: string;
};

function packageVersion(): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path.resolve(__dirname, '../package.json'), 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (err) {
    log.debug('Cannot read package version:', err);
  }
  return '0.0.0';
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

/** `-x` may repeat, and each value may hold several `;`-separated patterns. */
function collectPatterns(value: string, previous: string[] | undefined): string[] {
  const patterns = value
    .split(';')
    .map((p) => p.trim())
    .filter((p) => p !== '');
  return [...(previous ?? []), ...patterns];
}

export function createCli(): Command {
  return new Command()
    .name('slideshow-conductor')
    .description('Image slideshow driven by hotkeys, gestures and a per-session web API')
    .version(packageVersion())
    .argument('[paths...]', 'image files, directories or @files listing paths')
    .option('-r, --recursive', 'search directories recursively')
    .option('-x, --exclude <patterns>', 'exclude file names matching glob patterns (";"-separated, repeatable)', collectPatterns)
    .option('-s, --speed <seconds>', 'seconds between images', parseNumber)
    .option('--repeat', 'start over after the last image')
    .addOption(
      new Option('--repeat-mode <mode>', 'order used on each repeat').choices(['fixed', 'shuffle', 'shuffle-each'])
    )
    .option('--shuffle', 'start on a random order')
    .option('--paused', 'start paused')
    .option('--status <format>', 'status line template, or a preset $1..$6')
    .option('--always-on-top', 'keep the window above others')
    .option('--web', 'serve the slideshow over HTTP instead of the terminal')
    .option('--port <port>', 'HTTP port', parseInteger)
    .option('--host <host>', 'HTTP host')
    .option('--gallery', 'enable gallery mode in the web client')
    .option('--external-tools <base>', 'bind tools named <base>0, <base>1, ... in the tool directory')
    .option('--seed <seed>', 'seed for shuffling, for reproducible runs', parseInteger)
    .addOption(new Option('--log-level <level>', 'log verbosity').choices(['debug', 'info', 'warn', 'error']))
    .option('--config <file>', 'configuration file to load instead of searching')
    .option('--init-config [file]', `write the effective configuration (default ${USER_CONFIG_NAMES[0]}) and exit`);
}

/** Map parsed options onto dotted config keys. Options not given stay undefined. */
export function toOverrides(options: CliOptions): Record<string, unknown> {
  return {
    'images.recursive': options.recursive,
    'images.exclude_patterns': options.exclude,
    'slideshow.speed': options.speed,
    'slideshow.repeat': options.repeat,
    'slideshow.repeat_mode': options.repeatMode,
    'slideshow.shuffle': options.shuffle,
    'slideshow.paused_on_start': options.paused,
    'slideshow.status_format': options.status,
    'slideshow.always_on_top': options.alwaysOnTop,
    'slideshow.seed': options.seed,
    'web.port': options.port,
    'web.host': options.host,
    'gallery.enabled': options.gallery,
    'external_tools.base_name': options.externalTools,
    'logging.level': options.logLevel,
  };
}

export interface RunOptions {
  cwd?: string;
  homeDir?: string;
  stderr?: NodeJS.WritableStream;
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/** Run the program; resolves with the exit code. */
export async function run(argv: readonly string[], runOptions: RunOptions = {}): Promise<number> {
  const cwd = runOptions.cwd ?? process.cwd();
  const stderr = runOptions.stderr ?? process.stderr;

  const program = createCli();
  program.parse([...argv]);
  const options = program.opts<CliOptions>();
  const paths = program.args;

  const store = await ConfigStore.load({ explicitPath: options.config, cwd, homeDir: runOptions.homeDir });
  store.applyOverrides(toOverrides(options));

  if (options.initConfig !== undefined) {
    const name = options.initConfig === true ? (USER_CONFIG_NAMES[0] ?? 'slideshow.yaml') : options.initConfig;
    await store.writeTo(path.resolve(cwd, name));
    return 0;
  }

  const settings = resolveSettings(store);
  if (options.logLevel !== undefined || parseLogLevel(process.env.LOG_LEVEL) === null) {
    Logger.setLevel(settings.logging.level);
  }

  if (paths.length === 0) {
    stderr.write('No paths given. Pass image files or directories.\n');
    return 1;
  }
  const items = await discoverItems(paths, {
    recursive: settings.images.recursive,
    exclude: settings.images.excludePatterns,
    extraExtensions: settings.images.extensions,
    cwd,
  });
  if (items.length === 0) {
    stderr.write('No images found.\n');
    return 1;
  }

  const app = await App.create({ settings, items, context: options.web ? 'web' : 'desktop', cwd });
  try {
    if (options.web) {
      const server = new SlideshowServer(app.createRequestHandler());
      await server.listen(settings.web.port, settings.web.host);
      app.sessions.startIdleSweep();
      const signal = await waitForSignal();
      log.info(`Received ${signal}, shutting down`);
      await server.close();
    } else {
      app.sessions.create('desktop');
      const slideshow = new ConsoleSlideshow({
        sessionId: 'desktop',
        sessions: app.sessions,
        dispatcher: app.dispatcher,
        hotkeys: app.hotkeys,
        describer: app.registry,
      });
      try {
        await slideshow.start();
      } finally {
        slideshow.dispose();
      }
    }
  } finally {
    app.dispose();
  }
  return 0;
}

if (require.main === module) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      if (err instanceof AppError) {
        process.stderr.write(`Error: ${err.message}\n`);
      } else {
        log.error('Unexpected failure:', err);
        process.stderr.write(`Error: ${describeError(err)}\n`);
      }
      process.exitCode = 1;
    }
  );
}
