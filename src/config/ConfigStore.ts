/**
 * ConfigStore - layered YAML configuration with dotted-path access.
 *
 * Layers, lowest first: the bundled `config/default.yaml`, one user file,
 * then command-line overrides. Objects merge key by key; arrays and
 * scalars replace.
 */

import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { dump as dumpYaml, load as loadYaml } from 'js-yaml';
import { ConfigError, describeError } from '../core/errors';
import { Logger } from '../utils/Logger';

const log = new Logger('ConfigStore');

export type ConfigObject = Record<string, unknown>;

export const DEFAULT_CONFIG_FILE = path.resolve(__dirname, '../../config/default.yaml');

export const USER_CONFIG_NAMES: readonly string[] = ['slideshow.yaml', 'slideshow.yml'];

export function userConfigDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.config', 'slideshow-conductor');
}

export function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(base: ConfigObject, overlay: ConfigObject): ConfigObject {
  const out: ConfigObject = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;
    const existing = out[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      out[key] = deepMerge(existing, value);
      continue;
    }
    // Arrays and scalars replace.
    out[key] = value;
  }
  return out;
}

/** Parse YAML whose top level must be a mapping. An empty document is `{}`. */
export function parseYamlObject(content: string, source: string): ConfigObject {
  let parsed: unknown;
  try {
    parsed = loadYaml(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${source}: ${describeError(err)}`);
  }
  if (parsed === undefined || parsed === null) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${source} must contain a mapping at the top level`);
  }
  return parsed;
}

async function fileExists(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

async function readYamlFile(file: string): Promise<ConfigObject> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${file}: ${describeError(err)}`);
  }
  return parseYamlObject(content, file);
}

export interface ConfigSearchOptions {
  /** Path given with `--config`; it must exist. */
  explicitPath?: string;
  cwd?: string;
  homeDir?: string;
}

/**
 * Locate the user config file: the explicit path, else `slideshow.yaml` or
 * `slideshow.yml` in the working directory, else in the user config
 * directory. Returns null when there is none.
 */
export async function findUserConfig(options: ConfigSearchOptions = {}): Promise<string | null> {
  const cwd = options.cwd ?? process.cwd();
  if (options.explicitPath) {
    const explicit = path.resolve(cwd, options.explicitPath);
    if (!(await fileExists(explicit))) {
      throw new ConfigError(`Config file not found: ${options.explicitPath}`);
    }
    return explicit;
  }
  for (const dir of [cwd, userConfigDir(options.homeDir)]) {
    for (const name of USER_CONFIG_NAMES) {
      const candidate = path.join(dir, name);
      if (await fileExists(candidate)) return candidate;
    }
  }
  return null;
}

export interface ConfigLoadOptions extends ConfigSearchOptions {
  defaultsFile?: string;
}

export class ConfigStore {
  private data: ConfigObject;
  private _sourcePath: string | null = null;

  constructor(initial: ConfigObject = {}) {
    this.data = structuredClone(initial);
  }

  /** Defaults plus the user file, if one is found. */
  static async load(options: ConfigLoadOptions = {}): Promise<ConfigStore> {
    const store = new ConfigStore(await readYamlFile(options.defaultsFile ?? DEFAULT_CONFIG_FILE));
    const userFile = await findUserConfig(options);
    if (userFile) {
      await store.mergeFile(userFile);
    }
    return store;
  }

  /** File the user layer came from, or null when only defaults are loaded. */
  get sourcePath(): string | null {
    return this._sourcePath;
  }

  async mergeFile(file: string): Promise<void> {
    this.merge(await readYamlFile(file));
    this._sourcePath = file;
    log.info(`Loaded configuration from ${file}`);
  }

  merge(overlay: ConfigObject): void {
    this.data = deepMerge(this.data, structuredClone(overlay));
  }

  /** Value at a dotted path such as `slideshow.speed`, or `fallback` when absent. */
  get(keyPath: string, fallback?: unknown): unknown {
    let value: unknown = this.data;
    for (const key of keyPath.split('.')) {
      if (!isPlainObject(value) || !(key in value)) return fallback;
      value = value[key];
    }
    return value;
  }

  has(keyPath: string): boolean {
    const missing = Symbol('missing');
    return this.get(keyPath, missing) !== missing;
  }

  /** Set a dotted path, creating (or replacing non-object) intermediate levels. */
  set(keyPath: string, value: unknown): void {
    const keys = keyPath.split('.');
    const last = keys.pop();
    if (last === undefined || last === '') {
      throw new ConfigError(`Invalid config path: "${keyPath}"`);
    }
    let target = this.data;
    for (const key of keys) {
      const next = target[key];
      if (isPlainObject(next)) {
        target = next;
      } else {
        const created: ConfigObject = {};
        target[key] = created;
        target = created;
      }
    }
    target[last] = value;
  }

  /** Apply `dotted.path -> value` overrides; undefined values are skipped. */
  applyOverrides(overrides: Readonly<Record<string, unknown>>): void {
    for (const [keyPath, value] of Object.entries(overrides)) {
      if (value !== undefined) this.set(keyPath, value);
    }
  }

  /** A detached deep copy of the merged configuration. */
  toObject(): ConfigObject {
    return structuredClone(this.data);
  }

  toYaml(): string {
    return dumpYaml(this.data, { lineWidth: 100 });
  }

  /** Write the merged configuration as YAML. An existing file is never replaced. */
  async writeTo(file: string): Promise<void> {
    try {
      await fs.writeFile(file, this.toYaml(), { encoding: 'utf8', flag: 'wx' });
    } catch (err) {
      throw new ConfigError(`Cannot write config file ${file}: ${describeError(err)}`);
    }
    log.info(`Wrote configuration to ${file}`);
  }
}
