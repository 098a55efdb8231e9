/**
 * Typed view of the merged configuration.
 *
 * `resolveSettings` is the only place that reads raw config values; every
 * other module receives an `AppSettings`.
 */

import type { ActionContext } from '../actions/Action';
import type { RepeatMode } from '../core/session/SessionState';
import { ConfigError } from '../core/errors';
import type { BindingLayer, BindingTable } from '../utils/input/BindingResolver';
import { LogLevel, parseLogLevel } from '../utils/Logger';
import type { GestureThresholds } from './InputConfig';
import { DEFAULT_GESTURE_THRESHOLDS } from './InputConfig';
import { DEFAULT_HISTORY_CAPACITY, DEFAULT_SPEED_SECONDS, MAX_SPEED_SECONDS, MIN_SPEED_SECONDS } from './PlaybackConfig';
import { isPlainObject, type ConfigStore } from './ConfigStore';

export interface SlideshowSettings {
  speed: number;
  repeat: boolean;
  repeatMode: RepeatMode;
  shuffle: boolean;
  alwaysOnTop: boolean;
  pausedOnStart: boolean;
  statusFormat: string;
  rememberFile: string;
  notesFile: string;
  seed: number | null;
}

export interface AppSettings {
  slideshow: SlideshowSettings;
  images: { recursive: boolean; excludePatterns: string[]; extensions: string[] };
  web: { port: number; host: string };
  gallery: { enabled: boolean };
  externalTools: { baseName: string | null; searchDir: string };
  fileOperations: { enableTrash: boolean; trashDir: string; enableUndo: boolean; maxUndoHistory: number };
  gestureDetection: GestureThresholds;
  hotkeys: BindingTable;
  gestures: BindingTable;
  logging: { level: LogLevel };
}

const REPEAT_MODES: readonly RepeatMode[] = ['fixed', 'shuffle', 'shuffle-each'];

const BINDING_LAYERS: ReadonlyArray<'common' | ActionContext> = ['common', 'desktop', 'web'];

function readBoolean(store: ConfigStore, key: string, fallback: boolean): boolean {
  const value = store.get(key);
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') throw new ConfigError(`${key} must be true or false`);
  return value;
}

function readNumber(
  store: ConfigStore,
  key: string,
  fallback: number,
  range: { min?: number; max?: number; integer?: boolean } = {}
): number {
  const value = store.get(key);
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new ConfigError(`${key} must be a number`);
  if (range.integer && !Number.isInteger(value)) throw new ConfigError(`${key} must be an integer`);
  if ((range.min !== undefined && value < range.min) || (range.max !== undefined && value > range.max)) {
    throw new ConfigError(`${key} must be between ${range.min ?? '-inf'} and ${range.max ?? 'inf'}`);
  }
  return value;
}

function readString(store: ConfigStore, key: string, fallback: string): string {
  const value = store.get(key);
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') throw new ConfigError(`${key} must be a string`);
  return value;
}

function readOptionalString(store: ConfigStore, key: string): string | null {
  const value = readString(store, key, '');
  return value === '' ? null : value;
}

function readStringList(store: ConfigStore, key: string): string[] {
  const value = store.get(key);
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${key} must be a list of strings`);
  }
  return value;
}

function readBindingTable(store: ConfigStore, key: string): BindingTable {
  const raw = store.get(key);
  if (raw === undefined || raw === null) return {};
  if (!isPlainObject(raw)) throw new ConfigError(`${key} must be a mapping of contexts`);

  const table: Partial<Record<'common' | ActionContext, BindingLayer>> = {};
  for (const layerName of BINDING_LAYERS) {
    const layer = raw[layerName];
    if (layer === undefined || layer === null) continue;
    if (!isPlainObject(layer)) throw new ConfigError(`${key}.${layerName} must be a mapping of actions`);

    const bindings: Record<string, string | string[]> = {};
    for (const [action, tokens] of Object.entries(layer)) {
      if (tokens === null || tokens === undefined) continue;
      if (typeof tokens === 'string' || typeof tokens === 'number') {
        bindings[action] = String(tokens);
      } else if (Array.isArray(tokens)) {
        bindings[action] = tokens.map((t: unknown) => {
          if (typeof t !== 'string' && typeof t !== 'number') {
            throw new ConfigError(`${key}.${layerName}.${action} must list strings`);
          }
          return String(t);
        });
      } else {
        throw new ConfigError(`${key}.${layerName}.${action} must be a string or a list`);
      }
    }
    table[layerName] = bindings;
  }
  return table;
}

/**
 * `slideshow.repeat_mode` also takes the older boolean form: `false`,
 * `"false"` or `"none"` turn repeat off, `true` or `"true"` turn it on
 * with a fixed order. `repeat` is null when the mode leaves it alone.
 */
function readRepeatMode(store: ConfigStore): { mode: RepeatMode; repeat: boolean | null } {
  const value = store.get('slideshow.repeat_mode');
  if (value === false || value === 'false' || value === 'none') return { mode: 'fixed', repeat: false };
  if (value === true || value === 'true') return { mode: 'fixed', repeat: true };
  const name = readString(store, 'slideshow.repeat_mode', 'fixed');
  const mode = REPEAT_MODES.find((m) => m === name);
  if (!mode) throw new ConfigError(`slideshow.repeat_mode must be one of ${REPEAT_MODES.join(', ')}`);
  return { mode, repeat: null };
}

function readSeed(store: ConfigStore): number | null {
  const value = store.get('slideshow.seed');
  if (value === undefined || value === null) return null;
  return readNumber(store, 'slideshow.seed', 0, { integer: true });
}

function readLogLevel(store: ConfigStore): LogLevel {
  const name = readString(store, 'logging.level', 'info');
  const level = parseLogLevel(name);
  if (level === null) throw new ConfigError(`logging.level must be debug, info, warn or error`);
  return level;
}

/** Validate the merged configuration. Throws ConfigError naming the first bad key. */
export function resolveSettings(store: ConfigStore): AppSettings {
  const d = DEFAULT_GESTURE_THRESHOLDS;
  const repeatMode = readRepeatMode(store);
  return {
    slideshow: {
      speed: readNumber(store, 'slideshow.speed', DEFAULT_SPEED_SECONDS, {
        min: MIN_SPEED_SECONDS,
        max: MAX_SPEED_SECONDS,
      }),
      repeat: repeatMode.repeat ?? readBoolean(store, 'slideshow.repeat', false),
      repeatMode: repeatMode.mode,
      shuffle: readBoolean(store, 'slideshow.shuffle', false),
      alwaysOnTop: readBoolean(store, 'slideshow.always_on_top', false),
      pausedOnStart: readBoolean(store, 'slideshow.paused_on_start', false),
      statusFormat: readString(store, 'slideshow.status_format', ''),
      rememberFile: readString(store, 'slideshow.remember_file', 'remember.txt'),
      notesFile: readString(store, 'slideshow.notes_file', 'slideshow_notes.txt'),
      seed: readSeed(store),
    },
    images: {
      recursive: readBoolean(store, 'images.recursive', false),
      excludePatterns: readStringList(store, 'images.exclude_patterns'),
      extensions: readStringList(store, 'images.extensions'),
    },
    web: {
      port: readNumber(store, 'web.port', 8000, { min: 0, max: 65535, integer: true }),
      host: readString(store, 'web.host', '0.0.0.0'),
    },
    gallery: { enabled: readBoolean(store, 'gallery.enabled', false) },
    externalTools: {
      baseName: readOptionalString(store, 'external_tools.base_name'),
      searchDir: readString(store, 'external_tools.search_dir', '.'),
    },
    fileOperations: {
      enableTrash: readBoolean(store, 'file_operations.enable_trash', true),
      trashDir: readString(store, 'file_operations.trash_dir', '.trash'),
      enableUndo: readBoolean(store, 'file_operations.enable_undo', true),
      maxUndoHistory: readNumber(store, 'file_operations.max_undo_history', DEFAULT_HISTORY_CAPACITY, {
        min: 1,
        integer: true,
      }),
    },
    gestureDetection: {
      swipeThreshold: readNumber(store, 'gesture_detection.swipe_threshold', d.swipeThreshold, { min: 0 }),
      pinchThreshold: readNumber(store, 'gesture_detection.pinch_threshold', d.pinchThreshold, { min: 0 }),
      longPressMs: readNumber(store, 'gesture_detection.long_press_ms', d.longPressMs, { min: 0 }),
      doubleTapMs: readNumber(store, 'gesture_detection.double_tap_ms', d.doubleTapMs, { min: 0 }),
      episodeTimeoutMs: readNumber(store, 'gesture_detection.episode_timeout_ms', d.episodeTimeoutMs, { min: 0 }),
    },
    hotkeys: readBindingTable(store, 'hotkeys'),
    gestures: readBindingTable(store, 'gestures'),
    logging: { level: readLogLevel(store) },
  };
}
