/**
 * ItemDiscovery - collects image files from the paths given on the command line.
 *
 * Accepts directories (optionally recursive), single files and
 * `@response-file` arguments listing one path per line. Duplicates are
 * removed by resolved path, keeping the first occurrence.
 */

import { promises as fs, type Stats } from 'node:fs';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { DEFAULT_IMAGE_EXTENSIONS } from '../../config/MediaConfig';
import { Logger } from '../../utils/Logger';
import { createItem, createItemSequence, type Item, type ItemSequence } from './ItemSequence';

const log = new Logger('ItemDiscovery');

export interface DiscoveryOptions {
  recursive?: boolean;
  /** Glob patterns matched against the file name (not the full path). */
  exclude?: readonly string[];
  /** Extra extensions (with or without the leading dot) on top of the defaults. */
  extraExtensions?: readonly string[];
  cwd?: string;
}

function buildExtensionSet(extra: readonly string[] = []): Set<string> {
  const set = new Set(DEFAULT_IMAGE_EXTENSIONS.map((e) => e.toLowerCase()));
  for (const ext of extra) {
    const trimmed = ext.trim().toLowerCase();
    if (!trimmed) continue;
    set.add(trimmed.startsWith('.') ? trimmed : `.${trimmed}`);
  }
  return set;
}

function isExcluded(fileName: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => minimatch(fileName, p, { dot: true }));
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (err) {
    log.debug(`stat failed for ${target}:`, err);
    return null;
  }
}

async function walkDirectory(dir: string, recursive: boolean): Promise<string[]> {
  const found: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) found.push(...(await walkDirectory(full, recursive)));
    } else if (entry.isFile()) {
      found.push(full);
    }
  }
  return found;
}

/** Parse a response file: one path per line, blank lines and `#` comments skipped. */
export function parseResponseFileContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Resolve the user's path arguments to a list of image file paths, in
 * discovery order, without duplicates.
 */
export async function collectImagePaths(
  args: readonly string[],
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const extensions = buildExtensionSet(options.extraExtensions);
  const exclude = options.exclude ?? [];
  const hasImageExtension = (p: string) => extensions.has(path.extname(p).toLowerCase());
  const collected: string[] = [];

  for (const arg of args) {
    if (arg.startsWith('@')) {
      const responseFile = path.resolve(cwd, arg.slice(1));
      let content: string;
      try {
        content = await fs.readFile(responseFile, 'utf8');
      } catch (err) {
        log.warn(`Cannot read response file ${responseFile}:`, err);
        continue;
      }
      for (const line of parseResponseFileContent(content)) {
        const st = await statOrNull(path.resolve(cwd, line));
        if (st?.isFile() && hasImageExtension(line)) collected.push(line);
      }
      continue;
    }

    const absolute = path.resolve(cwd, arg);
    const st = await statOrNull(absolute);
    if (!st) {
      log.warn(`Path does not exist: ${arg}`);
    } else if (st.isDirectory()) {
      const files = await walkDirectory(absolute, options.recursive ?? false);
      // keep paths in the form the user wrote them
      const images = files
        .filter((f) => hasImageExtension(f) && !isExcluded(path.basename(f), exclude))
        .map((f) => path.join(arg, path.relative(absolute, f)))
        .sort();
      collected.push(...images);
    } else if (st.isFile()) {
      if (!hasImageExtension(arg)) {
        log.warn(`${arg} is not a recognized image file`);
      } else if (!isExcluded(path.basename(arg), exclude)) {
        collected.push(arg);
      }
    }
  }

  const seen = new Set<string>();
  return collected.filter((p) => {
    const resolved = path.resolve(cwd, p);
    if (seen.has(resolved)) return false;
    seen.add(resolved);
    return true;
  });
}

/** Discover images and capture their file sizes into a frozen sequence. */
export async function discoverItems(
  args: readonly string[],
  options: DiscoveryOptions = {}
): Promise<ItemSequence> {
  const cwd = options.cwd ?? process.cwd();
  const paths = await collectImagePaths(args, options);
  const items: Item[] = [];
  for (const p of paths) {
    const st = await statOrNull(path.resolve(cwd, p));
    items.push(createItem(p, { cwd, sizeBytes: st?.size }));
  }
  log.info(`Discovered ${items.length} item(s)`);
  return createItemSequence(items);
}
