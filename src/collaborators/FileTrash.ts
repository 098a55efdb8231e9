/**
 * FileTrash - moves files into a trash directory and can put them back.
 *
 * A `manifest.json` inside the trash directory maps each trashed name to
 * the file's original location, so items can be restored after a restart.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { CollaboratorError, describeError } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { TrashReceipt, TrashService } from './types';

const log = new Logger('FileTrash');

export interface TrashManifestEntry {
  original_path: string;
  deleted_at: string;
  original_name: string;
  size: number;
}

export type TrashManifest = Record<string, TrashManifestEntry>;

export interface TrashItem extends TrashManifestEntry {
  trash_name: string;
  exists: boolean;
}

function isManifestEntry(value: unknown): value is TrashManifestEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'original_path' in value &&
    typeof value.original_path === 'string' &&
    'deleted_at' in value &&
    typeof value.deleted_at === 'string' &&
    'original_name' in value &&
    typeof value.original_name === 'string' &&
    'size' in value &&
    typeof value.size === 'number'
  );
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function trashTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (err) {
    // rename cannot cross devices; fall back to copy + unlink
    if (err instanceof Error && 'code' in err && err.code === 'EXDEV') {
      await fs.copyFile(from, to);
      await fs.unlink(from);
      return;
    }
    throw err;
  }
}

export class FileTrash implements TrashService {
  readonly trashDir: string;
  private readonly manifestFile: string;
  private manifest: TrashManifest | null = null;
  private counter = 0;

  constructor(
    trashDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.trashDir = path.resolve(trashDir);
    this.manifestFile = path.join(this.trashDir, 'manifest.json');
  }

  async trash(filePath: string): Promise<TrashReceipt> {
    const originalPath = path.resolve(filePath);
    const manifest = await this.loadManifest();
    try {
      const stat = await fs.stat(originalPath);
      await fs.mkdir(this.trashDir, { recursive: true });
      const stamp = trashTimestamp(this.now());
      let trashName: string;
      do {
        trashName = `${stamp}_${++this.counter}_${path.basename(originalPath)}`;
      } while (manifest[trashName] || (await exists(path.join(this.trashDir, trashName))));

      const trashPath = path.join(this.trashDir, trashName);
      await moveFile(originalPath, trashPath);
      manifest[trashName] = {
        original_path: originalPath,
        deleted_at: stamp,
        original_name: path.basename(originalPath),
        size: stat.size,
      };
      await this.saveManifest();
      log.info(`Trashed ${originalPath}`);
      return { trashName, originalPath, trashPath };
    } catch (err) {
      throw new CollaboratorError(`Cannot move ${originalPath} to trash: ${describeError(err)}`);
    }
  }

  async restore(receipt: TrashReceipt): Promise<string> {
    const manifest = await this.loadManifest();
    const entry = manifest[receipt.trashName];
    if (!entry) {
      throw new CollaboratorError(`${receipt.trashName} is not in the trash`);
    }
    const trashPath = path.join(this.trashDir, receipt.trashName);
    if (!(await exists(trashPath))) {
      delete manifest[receipt.trashName];
      await this.saveManifest();
      throw new CollaboratorError(`${receipt.trashName} was permanently deleted`);
    }

    let target = entry.original_path;
    const ext = path.extname(target);
    const base = path.basename(target, ext);
    for (let n = 1; await exists(target); n++) {
      target = path.join(path.dirname(entry.original_path), `${base}_restored_${n}${ext}`);
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await moveFile(trashPath, target);
    } catch (err) {
      throw new CollaboratorError(`Cannot restore ${receipt.trashName}: ${describeError(err)}`);
    }
    delete manifest[receipt.trashName];
    await this.saveManifest();
    log.info(`Restored ${target}`);
    return target;
  }

  /** Items currently in the trash, most recently deleted first. */
  async list(): Promise<TrashItem[]> {
    const manifest = await this.loadManifest();
    const items: TrashItem[] = [];
    for (const [trashName, entry] of Object.entries(manifest)) {
      items.push({
        ...entry,
        trash_name: trashName,
        exists: await exists(path.join(this.trashDir, trashName)),
      });
    }
    return items.sort((a, b) => b.deleted_at.localeCompare(a.deleted_at));
  }

  /** Permanently delete everything in the trash. */
  async empty(): Promise<number> {
    const manifest = await this.loadManifest();
    const names = Object.keys(manifest);
    for (const name of names) {
      await fs.rm(path.join(this.trashDir, name), { force: true });
      delete manifest[name];
    }
    await this.saveManifest();
    return names.length;
  }

  private async loadManifest(): Promise<TrashManifest> {
    if (this.manifest) return this.manifest;
    const manifest: TrashManifest = {};
    let raw: string | null = null;
    try {
      raw = await fs.readFile(this.manifestFile, 'utf8');
    } catch (err) {
      log.debug('No trash manifest yet:', describeError(err));
    }
    if (raw !== null) {
      try {
        const parsed: unknown = JSON.parse(raw);
        if (typeof parsed === 'object' && parsed !== null) {
          for (const [name, entry] of Object.entries(parsed)) {
            if (isManifestEntry(entry)) manifest[name] = entry;
          }
        }
      } catch (err) {
        log.warn(`Ignoring unreadable trash manifest ${this.manifestFile}:`, describeError(err));
      }
    }
    this.manifest = manifest;
    return manifest;
  }

  private async saveManifest(): Promise<void> {
    await fs.mkdir(this.trashDir, { recursive: true });
    await fs.writeFile(this.manifestFile, JSON.stringify(this.manifest ?? {}, null, 2), 'utf8');
  }
}
