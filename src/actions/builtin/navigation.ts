/**
 * Cursor movement: next, previous and jump-to.
 *
 * Forward past the end wraps to the start when repeat is on (counting the
 * cycle) and otherwise stays on the last item. Backward past the start wraps
 * to the end when repeat is on and otherwise stays on the first item, for a
 * single-item list as much as for a longer one.
 */

import { defaultRandom, shuffled, type RandomSource } from '../../utils/shuffle';
import type { SessionChanges } from '../../core/session/SessionState';
import { failure, success, type ReversibleAction } from '../Action';
import { restorePositionAction } from './position';

export const NO_ITEMS_ERROR = 'No images in slideshow';

export function createNavigateNextAction(random: RandomSource = defaultRandom): ReversibleAction {
  return {
    name: 'navigate_next',
    description: 'Go to next image',
    applicability: 'both',

    execute(session) {
      const len = session.order.length;
      if (len === 0) return failure(NO_ITEMS_ERROR);

      const changes: SessionChanges = {};
      let index = session.currentIndex + 1;
      if (index >= len) {
        if (session.repeat) {
          index = 0;
          changes.repeatCount = session.repeatCount + 1;
          if (session.repeatMode === 'shuffle-each') {
            changes.order = shuffled(session.order, random);
          }
        } else {
          index = len - 1;
        }
      }
      changes.currentIndex = index;
      return success(
        { current_index: index, repeat_count: changes.repeatCount ?? session.repeatCount },
        changes
      );
    },

    inverse(before) {
      return restorePositionAction(before);
    },
  };
}

export const navigateNextAction = createNavigateNextAction();

export const navigatePreviousAction: ReversibleAction = {
  name: 'navigate_previous',
  description: 'Go to previous image',
  applicability: 'both',

  execute(session) {
    const len = session.order.length;
    if (len === 0) return failure(NO_ITEMS_ERROR);

    let index = session.currentIndex - 1;
    if (index < 0) index = session.repeat ? len - 1 : 0;
    return success({ current_index: index }, { currentIndex: index });
  },

  inverse(before) {
    return restorePositionAction(before);
  },
};

/** Jump to a 0-based position given as the `index` parameter. */
export const goToAction: ReversibleAction = {
  name: 'go_to',
  description: 'Jump to an image by position',
  applicability: 'both',

  execute(session, params) {
    const len = session.order.length;
    if (len === 0) return failure(NO_ITEMS_ERROR);

    const index = params.index;
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      return failure('index must be an integer');
    }
    if (index < 0 || index >= len) {
      return failure(`index ${index} is outside 0..${len - 1}`);
    }
    return success({ current_index: index }, { currentIndex: index });
  },

  inverse(before) {
    return restorePositionAction(before);
  },
};
