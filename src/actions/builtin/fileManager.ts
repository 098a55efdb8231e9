/**
 * `open_folder` and `reveal_file` show the current item in the desktop's
 * file manager. Desktop only; a missing file manager is an error result.
 */

import * as path from 'node:path';
import type { FileManager } from '../../collaborators/types';
import { failure, success, type Action } from '../Action';
import { NO_ITEMS_ERROR } from './navigation';

export function createOpenFolderAction(fileManager: FileManager): Action {
  return {
    name: 'open_folder',
    description: 'Open parent folder in file manager',
    applicability: 'desktop',
    async execute(session) {
      const item = session.currentItem();
      if (!item) return failure(NO_ITEMS_ERROR);
      const folder = path.dirname(item.absolutePath);
      await fileManager.openFolder(folder);
      return success({ opened: folder, platform: fileManager.platform });
    },
  };
}

export function createRevealFileAction(fileManager: FileManager): Action {
  return {
    name: 'reveal_file',
    description: 'Reveal current file in file manager',
    applicability: 'desktop',
    async execute(session) {
      const item = session.currentItem();
      if (!item) return failure(NO_ITEMS_ERROR);
      await fileManager.reveal(item.absolutePath);
      return success({ revealed: item.absolutePath, platform: fileManager.platform });
    },
  };
}
