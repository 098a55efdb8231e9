/**
 * `trash_current` moves the current file to the trash and drops it from
 * the order. Undo restores the file and puts the item back where it was.
 */

import type { TrashReceipt, TrashService } from '../../collaborators/types';
import type { SessionSnapshot } from '../../core/session/SessionState';
import { failure, success, type Action, type ReversibleAction } from '../Action';
import { NO_ITEMS_ERROR } from './navigation';
import { removeCurrentChanges } from './position';

function restoreTrashedAction(trash: TrashService, receipt: TrashReceipt, before: SessionSnapshot): Action {
  return {
    name: 'restore_trashed',
    description: `Restore ${receipt.originalPath}`,
    applicability: 'both',
    async execute(session) {
      const itemIndex = before.order[before.currentIndex];
      if (itemIndex === undefined) return failure('Nothing to restore');
      if (session.order.includes(itemIndex)) {
        return failure(`${receipt.originalPath} is already in the slideshow`);
      }

      const restoredPath = await trash.restore(receipt);
      const order = [...session.order];
      const position = Math.min(before.currentIndex, order.length);
      order.splice(position, 0, itemIndex);
      return success(
        { action: 'restored', restored_path: restoredPath, current_index: position },
        { order, currentIndex: position }
      );
    },
  };
}

export function createTrashCurrentAction(trash: TrashService): ReversibleAction {
  return {
    name: 'trash_current',
    description: 'Move current image to trash',
    applicability: 'desktop',

    async execute(session) {
      const item = session.currentItem();
      if (!item) return failure(NO_ITEMS_ERROR);

      const receipt = await trash.trash(item.absolutePath);
      return success(
        {
          action: 'trashed',
          trashed_path: item.path,
          trash_name: receipt.trashName,
          trash_path: receipt.trashPath,
          original_path: receipt.originalPath,
        },
        removeCurrentChanges(session)
      );
    },

    inverse(before, _params, result) {
      const itemIndex = before.order[before.currentIndex];
      const { trash_name: trashName, trash_path: trashPath, original_path: originalPath } = result;
      if (
        itemIndex === undefined ||
        typeof trashName !== 'string' ||
        typeof trashPath !== 'string' ||
        typeof originalPath !== 'string'
      ) {
        return null;
      }
      return restoreTrashedAction(trash, { trashName, trashPath, originalPath }, before);
    },
  };
}
