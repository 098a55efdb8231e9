import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigStore, deepMerge, findUserConfig, parseYamlObject, userConfigDir } from './ConfigStore';
import { resolveSettings } from './settings';
import { ConfigError } from '../core/errors';
import { LogLevel } from '../utils/Logger';

describe('deepMerge', () => {
  it('CS-001: merges objects and replaces arrays and scalars', () => {
    const merged = deepMerge(
      { a: { b: 1, c: [1, 2] }, d: 'x' },
      { a: { c: [3], e: true }, d: 'y', f: undefined }
    );
    expect(merged).toEqual({ a: { b: 1, c: [3], e: true }, d: 'y' });
  });
});

describe('parseYamlObject', () => {
  it('CS-002: parses a mapping', () => {
    expect(parseYamlObject('slideshow:\n  speed: 5\n', 'test.yaml')).toEqual({ slideshow: { speed: 5 } });
  });

  it('CS-003: an empty document is an empty mapping', () => {
    expect(parseYamlObject('', 'empty.yaml')).toEqual({});
  });

  it('CS-004: rejects a non-mapping top level', () => {
    expect(() => parseYamlObject('- a\n- b\n', 'list.yaml')).toThrow('list.yaml must contain a mapping at the top level');
  });

  it('CS-005: rejects malformed YAML', () => {
    expect(() => parseYamlObject('a: [1, 2', 'bad.yaml')).toThrow(ConfigError);
  });
});

describe('ConfigStore', () => {
  it('CS-006: reads dotted paths with a fallback', () => {
    const store = new ConfigStore({ slideshow: { speed: 3 } });
    expect(store.get('slideshow.speed')).toBe(3);
    expect(store.get('slideshow.missing', 'none')).toBe('none');
    expect(store.get('slideshow.speed.deeper')).toBeUndefined();
    expect(store.has('slideshow')).toBe(true);
    expect(store.has('web')).toBe(false);
  });

  it('CS-007: set creates intermediate levels', () => {
    const store = new ConfigStore({ web: 'not-an-object' });
    store.set('web.port', 9000);
    store.set('gallery.enabled', true);
    expect(store.toObject()).toEqual({ web: { port: 9000 }, gallery: { enabled: true } });
  });

  it('CS-008: rejects an empty path', () => {
    expect(() => new ConfigStore().set('', 1)).toThrow(ConfigError);
  });

  it('CS-009: overrides skip undefined values', () => {
    const store = new ConfigStore({ slideshow: { speed: 3, repeat: false } });
    store.applyOverrides({ 'slideshow.speed': 7, 'slideshow.repeat': undefined });
    expect(store.get('slideshow.speed')).toBe(7);
    expect(store.get('slideshow.repeat')).toBe(false);
  });

  it('CS-010: does not share state with the initial object', () => {
    const initial = { slideshow: { speed: 3 } };
    const store = new ConfigStore(initial);
    store.set('slideshow.speed', 9);
    expect(initial.slideshow.speed).toBe(3);
    const copy = store.toObject();
    store.set('slideshow.speed', 10);
    expect(copy).toEqual({ slideshow: { speed: 9 } });
  });

  it('CS-011: toYaml round-trips through the parser', () => {
    const store = new ConfigStore({ web: { port: 8000 } });
    expect(parseYamlObject(store.toYaml(), 'dump')).toEqual({ web: { port: 8000 } });
  });
});

describe('user config files', () => {
  let dir: string;
  let home: string;
  let defaultsFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-'));
    home = path.join(dir, 'home');
    defaultsFile = path.join(dir, 'defaults.yaml');
    await fs.writeFile(defaultsFile, 'slideshow:\n  speed: 3\n  repeat: false\nimages:\n  extensions: [".raw"]\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('CS-012: finds slideshow.yaml in the working directory first', async () => {
    await fs.mkdir(userConfigDir(home), { recursive: true });
    await fs.writeFile(path.join(userConfigDir(home), 'slideshow.yaml'), 'a: 1\n');
    await fs.writeFile(path.join(dir, 'slideshow.yml'), 'a: 2\n');
    expect(await findUserConfig({ cwd: dir, homeDir: home })).toBe(path.join(dir, 'slideshow.yml'));
  });

  it('CS-013: falls back to the user config directory', async () => {
    await fs.mkdir(userConfigDir(home), { recursive: true });
    await fs.writeFile(path.join(userConfigDir(home), 'slideshow.yaml'), 'a: 1\n');
    expect(await findUserConfig({ cwd: dir, homeDir: home })).toBe(
      path.join(home, '.config', 'slideshow-conductor', 'slideshow.yaml')
    );
  });

  it('CS-014: returns null when there is no user file', async () => {
    expect(await findUserConfig({ cwd: dir, homeDir: home })).toBeNull();
  });

  it('CS-015: a missing explicit file is an error', async () => {
    await expect(findUserConfig({ cwd: dir, explicitPath: 'nope.yaml' })).rejects.toThrow(
      'Config file not found: nope.yaml'
    );
  });

  it('CS-016: load merges the user file over the defaults', async () => {
    await fs.writeFile(path.join(dir, 'custom.yaml'), 'slideshow:\n  speed: 8\nimages:\n  extensions: [".heic"]\n');
    const store = await ConfigStore.load({ defaultsFile, cwd: dir, homeDir: home, explicitPath: 'custom.yaml' });
    expect(store.sourcePath).toBe(path.join(dir, 'custom.yaml'));
    expect(store.get('slideshow')).toEqual({ speed: 8, repeat: false });
    expect(store.get('images.extensions')).toEqual(['.heic']);
  });

  it('CS-017: writeTo saves YAML and never overwrites', async () => {
    const target = path.join(dir, 'out.yaml');
    const store = new ConfigStore({ web: { port: 9000 } });
    await store.writeTo(target);
    expect(parseYamlObject(await fs.readFile(target, 'utf8'), target)).toEqual({ web: { port: 9000 } });
    await expect(store.writeTo(target)).rejects.toThrow(`Cannot write config file ${target}`);
  });
});

describe('resolveSettings', () => {
  it('ST-001: fills every field from defaults when the store is empty', () => {
    const settings = resolveSettings(new ConfigStore());
    expect(settings.slideshow).toEqual({
      speed: 3,
      repeat: false,
      repeatMode: 'fixed',
      shuffle: false,
      alwaysOnTop: false,
      pausedOnStart: false,
      statusFormat: '',
      rememberFile: 'remember.txt',
      notesFile: 'slideshow_notes.txt',
      seed: null,
    });
    expect(settings.hotkeys).toEqual({});
    expect(settings.logging.level).toBe(LogLevel.INFO);
  });

  it('ST-002: normalizes binding tables', () => {
    const settings = resolveSettings(
      new ConfigStore({ hotkeys: { desktop: { external_tool_1: 1, quit: ['q', 'Escape'], note: null } } })
    );
    expect(settings.hotkeys).toEqual({ desktop: { external_tool_1: '1', quit: ['q', 'Escape'] } });
  });

  it('ST-003: rejects a speed outside the allowed range', () => {
    expect(() => resolveSettings(new ConfigStore({ slideshow: { speed: 0.1 } }))).toThrow(
      'slideshow.speed must be between 0.5 and 60'
    );
  });

  it('ST-004: rejects an unknown repeat mode', () => {
    expect(() => resolveSettings(new ConfigStore({ slideshow: { repeat_mode: 'sometimes' } }))).toThrow(
      'slideshow.repeat_mode must be one of fixed, shuffle, shuffle-each'
    );
  });

  it('ST-008: boolean repeat modes switch repeat off or on with a fixed order', () => {
    const read = (repeatMode: unknown, repeat: boolean) =>
      resolveSettings(new ConfigStore({ slideshow: { repeat_mode: repeatMode, repeat } })).slideshow;

    for (const off of [false, 'false', 'none']) {
      expect(read(off, true)).toMatchObject({ repeat: false, repeatMode: 'fixed' });
    }
    for (const on of [true, 'true']) {
      expect(read(on, false)).toMatchObject({ repeat: true, repeatMode: 'fixed' });
    }
  });

  it('ST-009: named repeat modes leave the repeat flag to slideshow.repeat', () => {
    const settings = resolveSettings(new ConfigStore({ slideshow: { repeat_mode: 'shuffle-each', repeat: true } }));
    expect(settings.slideshow).toMatchObject({ repeat: true, repeatMode: 'shuffle-each' });
  });

  it('ST-005: rejects values of the wrong type', () => {
    expect(() => resolveSettings(new ConfigStore({ images: { recursive: 'yes' } }))).toThrow(
      'images.recursive must be true or false'
    );
    expect(() => resolveSettings(new ConfigStore({ images: { exclude_patterns: [1] } }))).toThrow(
      'images.exclude_patterns must be a list of strings'
    );
    expect(() => resolveSettings(new ConfigStore({ hotkeys: { web: { undo: { key: 'z' } } } }))).toThrow(
      'hotkeys.web.undo must be a string or a list'
    );
  });

  it('ST-006: accepts a single exclude pattern as a string', () => {
    const settings = resolveSettings(new ConfigStore({ images: { exclude_patterns: '*.tmp' } }));
    expect(settings.images.excludePatterns).toEqual(['*.tmp']);
  });

  it('ST-007: reads the seed, external tools and log level', () => {
    const settings = resolveSettings(
      new ConfigStore({
        slideshow: { seed: 42 },
        external_tools: { base_name: 'tool' },
        logging: { level: 'DEBUG' },
      })
    );
    expect(settings.slideshow.seed).toBe(42);
    expect(settings.externalTools).toEqual({ baseName: 'tool', searchDir: '.' });
    expect(settings.logging.level).toBe(LogLevel.DEBUG);
  });
});
