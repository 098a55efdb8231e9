/**
 * ItemSequence - the shared, read-only list of items every session plays.
 *
 * Built once at startup and frozen. Sessions refer to items by their
 * position in this list and never hold copies.
 */

import * as path from 'node:path';

export interface Item {
  /** Path as given by the user or discovery (may be relative). */
  path: string;
  /** File name with extension. */
  name: string;
  /** File name without extension. */
  baseName: string;
  /** Extension including the leading dot, or '' when there is none. */
  extension: string;
  absolutePath: string;
  /** File size captured at discovery time. */
  sizeBytes?: number;
  width?: number;
  height?: number;
}

export type ItemSequence = readonly Readonly<Item>[];

export interface ItemInit {
  sizeBytes?: number;
  width?: number;
  height?: number;
  /** Base directory for resolving relative paths. Defaults to the process cwd. */
  cwd?: string;
}

export function createItem(filePath: string, init: ItemInit = {}): Item {
  const name = path.basename(filePath);
  const extension = path.extname(name);
  return {
    path: filePath,
    name,
    baseName: extension ? name.slice(0, -extension.length) : name,
    extension,
    absolutePath: path.resolve(init.cwd ?? process.cwd(), filePath),
    sizeBytes: init.sizeBytes,
    width: init.width,
    height: init.height,
  };
}

/** Freeze a list of items into a sequence. The input array is copied. */
export function createItemSequence(items: Iterable<Item>): ItemSequence {
  return Object.freeze(Array.from(items, (item) => Object.freeze({ ...item })));
}

/** Convenience for tests and programmatic hosts: build a sequence from bare paths. */
export function sequenceFromPaths(paths: readonly string[], cwd?: string): ItemSequence {
  return createItemSequence(paths.map((p) => createItem(p, { cwd })));
}
