/**
 * ExternalToolManager - finds user scripts next to the slideshow and turns
 * them into `external_tool_<id>` actions.
 *
 * With base name `tool`, the files `tool0`..`tool99`, `tool_0`..`tool_99`,
 * `toola`..`toolz` and `tool_a`..`tool_z` (any extension, letters
 * case-insensitive) are picked up when they are executable or carry a
 * script extension.
 */

import { constants, promises as fs, type Dirent } from 'node:fs';
import * as path from 'node:path';
import { SCRIPT_EXTENSIONS } from '../config/MediaConfig';
import type { ToolRunner } from '../collaborators/types';
import { Logger } from '../utils/Logger';
import type { ActionRegistry } from './ActionRegistry';
import { createExternalToolAction } from './builtin/externalTool';

const log = new Logger('ExternalToolManager');

export interface ExternalTool {
  id: string;
  path: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Tool id for a file name, or null when the name does not follow the pattern. */
export function matchToolId(fileName: string, baseName: string): string | null {
  const base = escapeRegExp(baseName);
  const numeric = new RegExp(`^${base}_?(\\d{1,2})(\\..*)?$`).exec(fileName);
  if (numeric?.[1] !== undefined) return numeric[1];
  const alpha = new RegExp(`^${base}_?([a-zA-Z])(\\..*)?$`).exec(fileName);
  if (alpha?.[1] !== undefined) return alpha[1].toLowerCase();
  return null;
}

/** Numbers first in numeric order, then letters. */
export function compareToolIds(a: string, b: string): number {
  const aNum = /^\d+$/.test(a);
  const bNum = /^\d+$/.test(b);
  if (aNum && bNum) return Number(a) - Number(b);
  if (aNum !== bNum) return aNum ? -1 : 1;
  return a.localeCompare(b);
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    await fs.access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class ExternalToolManager {
  private tools = new Map<string, string>();

  constructor(
    readonly baseName: string = 'tool',
    readonly searchDir: string = process.cwd()
  ) {}

  /** Scan `searchDir`. Calling it again rescans from scratch. */
  async discover(): Promise<ExternalTool[]> {
    this.tools.clear();
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.searchDir, { withFileTypes: true });
    } catch (err) {
      log.warn(`Cannot scan ${this.searchDir} for tools:`, err);
      return [];
    }

    // readdir order is unspecified; sort so the first of two same-id files wins consistently
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const id = matchToolId(entry.name, this.baseName);
      if (id === null || this.tools.has(id)) continue;

      const file = path.join(this.searchDir, entry.name);
      const hasScriptExt = SCRIPT_EXTENSIONS.includes(path.extname(entry.name).toLowerCase());
      if (hasScriptExt || (await isExecutable(file))) {
        this.tools.set(id, file);
      }
    }
    const found = this.list();
    log.info(`Found ${found.length} external tool(s) for "${this.baseName}"`);
    return found;
  }

  get(id: string): string | undefined {
    return this.tools.get(id);
  }

  list(): ExternalTool[] {
    return [...this.tools.entries()]
      .map(([id, p]) => ({ id, path: p }))
      .sort((a, b) => compareToolIds(a.id, b.id));
  }

  /** Register one action per discovered tool. */
  registerActions(registry: ActionRegistry, runner: ToolRunner): void {
    for (const tool of this.list()) {
      registry.register(createExternalToolAction(tool.id, tool.path, runner));
    }
  }
}
