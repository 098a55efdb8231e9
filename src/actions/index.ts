/**
 * Actions - public API.
 *
 * Quick start:
 *   const registry = new ActionRegistry();
 *   registerDefaultActions(registry, { rememberLog, notesLog });
 *   await runAction(registry.get('navigate_next'), session);
 */

export * from './Action';
export { ActionRegistry } from './ActionRegistry';
export { runAction } from './runAction';
export { registerDefaultActions, type DefaultActionDeps } from './defaultActions';
export { ExternalToolManager, matchToolId, compareToolIds, type ExternalTool } from './ExternalToolManager';

export { createNavigateNextAction, navigateNextAction, navigatePreviousAction, goToAction } from './builtin/navigation';
export {
  togglePauseAction,
  toggleRepeatAction,
  toggleAlwaysOnTopAction,
  toggleFullscreenAction,
  createToggleGalleryModeAction,
  createToggleShuffleAction,
  toggleShuffleAction,
  quitAction,
} from './builtin/toggles';
export { increaseSpeedAction, decreaseSpeedAction } from './builtin/speed';
export { createRememberAction, createNoteAction, formatRecordTimestamp } from './builtin/memory';
export { createExternalToolAction, EXTERNAL_TOOL_PREFIX } from './builtin/externalTool';
export { createTrashCurrentAction } from './builtin/trash';
export { createOpenFolderAction, createRevealFileAction } from './builtin/fileManager';
export { undoAction, redoAction } from './builtin/history';
