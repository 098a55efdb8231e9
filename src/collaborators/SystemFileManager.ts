import { spawn } from 'node:child_process';
import * as path from 'node:path';
import { CollaboratorError, describeError } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { FileManager } from './types';

const log = new Logger('SystemFileManager');

/** Start `command` without waiting for it to exit. Rejects when it cannot be started. */
export type Launcher = (command: string, args: readonly string[]) => Promise<void>;

/** Tried in order on Linux and other freedesktop systems. */
export const LINUX_FILE_MANAGERS: readonly string[] = ['xdg-open', 'nautilus', 'dolphin', 'thunar', 'pcmanfm'];

export const spawnDetached: Launcher = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { detached: true, stdio: 'ignore' });
    child.once('error', reject);
    child.once('spawn', () => {
      child.off('error', reject);
      child.unref();
      resolve();
    });
  });

function isMissingCommand(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export interface SystemFileManagerOptions {
  platform?: NodeJS.Platform;
  launch?: Launcher;
}

/**
 * Opens folders with `explorer` on Windows, `open` on macOS and the first
 * installed file manager on Linux. Reveal selects the file with
 * `explorer /select,`, `open -R` or `nautilus --select`; other Linux file
 * managers just open the folder.
 */
export class SystemFileManager implements FileManager {
  readonly platform: NodeJS.Platform;
  private readonly launch: Launcher;

  constructor(options: SystemFileManagerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.launch = options.launch ?? spawnDetached;
  }

  async openFolder(folder: string): Promise<void> {
    switch (this.platform) {
      case 'win32':
        return this.start('explorer', [folder]);
      case 'darwin':
        return this.start('open', [folder]);
      case 'linux':
      case 'freebsd':
      case 'openbsd':
        return this.startFirstInstalled(() => [folder]);
      default:
        throw new CollaboratorError(`Unsupported platform: ${this.platform}`);
    }
  }

  async reveal(file: string): Promise<void> {
    switch (this.platform) {
      case 'win32':
        return this.start('explorer', ['/select,', file]);
      case 'darwin':
        return this.start('open', ['-R', file]);
      case 'linux':
      case 'freebsd':
      case 'openbsd':
        return this.startFirstInstalled((cmd) => (cmd === 'nautilus' ? ['--select', file] : [path.dirname(file)]));
      default:
        throw new CollaboratorError(`Unsupported platform: ${this.platform}`);
    }
  }

  private async start(command: string, args: readonly string[]): Promise<void> {
    try {
      await this.launch(command, args);
    } catch (err) {
      throw new CollaboratorError(`Cannot start ${command}: ${describeError(err)}`);
    }
    log.debug(`Started ${command} ${args.join(' ')}`);
  }

  private async startFirstInstalled(argsFor: (command: string) => readonly string[]): Promise<void> {
    for (const command of LINUX_FILE_MANAGERS) {
      try {
        await this.launch(command, argsFor(command));
        log.debug(`Started ${command}`);
        return;
      } catch (err) {
        if (!isMissingCommand(err)) {
          throw new CollaboratorError(`Cannot start ${command}: ${describeError(err)}`);
        }
      }
    }
    throw new CollaboratorError('No file manager found');
  }
}
