/**
 * Boolean flag toggles. Each one is its own inverse: undo sets the flag
 * back to the value it had before.
 */

import type { SessionChanges, SessionSnapshot } from '../../core/session/SessionState';
import { defaultRandom, shuffled, type RandomSource } from '../../utils/shuffle';
import { failure, success, type Action, type Applicability, type ReversibleAction } from '../Action';

type FlagField = 'paused' | 'repeat' | 'alwaysOnTop' | 'fullscreen' | 'galleryMode';

function flagChanges(field: FlagField, value: boolean): SessionChanges {
  const changes: SessionChanges = {};
  changes[field] = value;
  return changes;
}

function setFlagAction(field: FlagField, resultKey: string, value: boolean): Action {
  return {
    name: 'set_flag',
    description: `Set ${field}`,
    applicability: 'both',
    execute() {
      return success({ [resultKey]: value }, flagChanges(field, value));
    },
  };
}

function createFlagToggle(
  name: string,
  description: string,
  applicability: Applicability,
  field: FlagField,
  resultKey: string
): ReversibleAction {
  return {
    name,
    description,
    applicability,
    execute(session) {
      const value = !session.snapshot()[field];
      return success({ [resultKey]: value }, flagChanges(field, value));
    },
    inverse(before: SessionSnapshot) {
      return setFlagAction(field, resultKey, before[field]);
    },
  };
}

export const togglePauseAction = createFlagToggle(
  'toggle_pause',
  'Pause/resume slideshow',
  'both',
  'paused',
  'is_paused'
);

export const toggleRepeatAction = createFlagToggle(
  'toggle_repeat',
  'Toggle loop mode',
  'both',
  'repeat',
  'repeat'
);

export const toggleAlwaysOnTopAction = createFlagToggle(
  'toggle_always_on_top',
  'Toggle window always on top',
  'desktop',
  'alwaysOnTop',
  'always_on_top'
);

export const toggleFullscreenAction = createFlagToggle(
  'toggle_fullscreen',
  'Enter/exit fullscreen',
  'both',
  'fullscreen',
  'is_fullscreen'
);

/** Gallery view exists only for browser sessions and only when enabled. */
export function createToggleGalleryModeAction(galleryEnabled: boolean): ReversibleAction {
  const toggle = createFlagToggle(
    'toggle_gallery_mode',
    'Toggle gallery/slideshow view',
    'web',
    'galleryMode',
    'gallery_mode_active'
  );
  return {
    ...toggle,
    execute(session, params) {
      if (!galleryEnabled) {
        return failure('Gallery mode not enabled', { gallery_mode_active: false });
      }
      return toggle.execute(session, params);
    },
  };
}

/**
 * Shuffle on: randomize `order` and keep the cursor on the same item.
 * Shuffle off: back to ascending order, cursor still on the same item.
 * The random order is never remembered, so this is not undoable.
 */
export function createToggleShuffleAction(random: RandomSource = defaultRandom): Action {
  return {
    name: 'toggle_shuffle',
    description: 'Toggle shuffle mode',
    applicability: 'both',
    execute(session) {
      const shuffle = !session.shuffle;
      const current = session.currentItemIndex();
      const order = shuffle ? shuffled(session.order, random) : [...session.order].sort((a, b) => a - b);
      const currentIndex = current === null ? 0 : Math.max(0, order.indexOf(current));
      return success({ shuffle, current_index: currentIndex }, { shuffle, order, currentIndex });
    },
  };
}

export const toggleShuffleAction = createToggleShuffleAction();

export const quitAction: Action = {
  name: 'quit',
  description: 'Exit application',
  applicability: 'desktop',
  execute() {
    return success({ action: 'quit' });
  },
};
