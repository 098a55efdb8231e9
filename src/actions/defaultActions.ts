import type { FileManager, RecordLog, TrashService } from '../collaborators/types';
import { defaultRandom, type RandomSource } from '../utils/shuffle';
import type { ActionRegistry } from './ActionRegistry';
import { createOpenFolderAction, createRevealFileAction } from './builtin/fileManager';
import { redoAction, undoAction } from './builtin/history';
import { createNoteAction, createRememberAction, type Clock } from './builtin/memory';
import { createNavigateNextAction, goToAction, navigatePreviousAction } from './builtin/navigation';
import { decreaseSpeedAction, increaseSpeedAction } from './builtin/speed';
import {
  createToggleGalleryModeAction,
  createToggleShuffleAction,
  quitAction,
  toggleAlwaysOnTopAction,
  toggleFullscreenAction,
  togglePauseAction,
  toggleRepeatAction,
} from './builtin/toggles';
import { createTrashCurrentAction } from './builtin/trash';

export interface DefaultActionDeps {
  rememberLog: RecordLog;
  notesLog: RecordLog;
  /** Without a trash service `trash_current` is not registered. */
  trash?: TrashService;
  /** Without a file manager `open_folder` and `reveal_file` are not registered. */
  fileManager?: FileManager;
  galleryEnabled?: boolean;
  random?: RandomSource;
  clock?: Clock;
}

/**
 * Register the built-in actions. External tools are registered separately
 * by `ExternalToolManager.registerActions`.
 */
export function registerDefaultActions(registry: ActionRegistry, deps: DefaultActionDeps): void {
  const random = deps.random ?? defaultRandom;

  registry.register(createNavigateNextAction(random));
  registry.register(navigatePreviousAction);
  registry.register(goToAction);

  registry.register(togglePauseAction);
  registry.register(toggleFullscreenAction);
  registry.register(toggleRepeatAction);
  registry.register(createToggleShuffleAction(random));
  registry.register(toggleAlwaysOnTopAction);
  registry.register(createToggleGalleryModeAction(deps.galleryEnabled ?? false));

  registry.register(increaseSpeedAction);
  registry.register(decreaseSpeedAction);

  registry.register(createRememberAction(deps.rememberLog, deps.clock));
  registry.register(createNoteAction(deps.notesLog, deps.clock));
  if (deps.trash) registry.register(createTrashCurrentAction(deps.trash));
  if (deps.fileManager) {
    registry.register(createOpenFolderAction(deps.fileManager));
    registry.register(createRevealFileAction(deps.fileManager));
  }

  registry.register(undoAction);
  registry.register(redoAction);
  registry.register(quitAction);
}
